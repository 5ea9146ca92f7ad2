/**
 * xapiand-model NestJS integration
 *
 * A NestJS module and service for xapiand-model, providing dependency
 * injection of the Xapiand client, logging, and lifecycle management.
 */
import 'reflect-metadata';

// Core module and service
export { XapiandModelModule } from './xapiand-model.module';
export { XapiandModelService } from './xapiand-model.service';
export { DefaultClientRegistrar } from './default-client.registrar';
export { InjectModel } from './inject-model.decorator';

// Configuration interfaces
export {
  XapiandModelModuleOptions,
  XapiandModelModuleAsyncOptions,
  XapiandModelOptionsFactory,
} from './interfaces';

// Constants for dependency injection
export {
  XAPIAND_MODEL_MODULE_OPTIONS,
  XAPIAND_CLIENT,
  getModelToken,
} from './constants';

// Re-export everything from the model package for convenience
export * from 'xapiand-model';

// Default export for convenience
export { XapiandModelModule as default } from './xapiand-model.module';
