import { Inject } from '@nestjs/common';
import { getModelToken } from './constants';

/**
 * Inject a model kind registered with `XapiandModelModule.forFeature`
 */
export const InjectModel = (modelName: string): ParameterDecorator & PropertyDecorator =>
  Inject(getModelToken(modelName));
