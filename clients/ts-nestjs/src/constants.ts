export const XAPIAND_MODEL_MODULE_OPTIONS = 'XAPIAND_MODEL_MODULE_OPTIONS';
export const XAPIAND_CLIENT = 'XAPIAND_CLIENT';

/** Injection token of a model kind registered with `forFeature` */
export function getModelToken(modelName: string): string {
  return `XapiandModel<${modelName}>`;
}
