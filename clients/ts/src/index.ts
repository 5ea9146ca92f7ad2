/**
 * xapiand-model
 *
 * Declares document models backed by Xapiand indexes and maps their
 * create/get/filter/save/delete operations onto the HTTP API, provisioning
 * index schemas on first write.
 */

export { XapiandClient } from './client';
export {
  BaseModel,
  defineModel,
  isReserved,
  RESERVED_PREFIX,
  DefinedModel,
  ManagerConstructor,
  ModelClass,
  ModelDefinition,
  ModelOptions,
} from './model';
export { Manager, CreateArgs, GetArgs, FilterArgs, SearchResults } from './manager';
export {
  attemptPut,
  putProvisioned,
  PutOutcome,
  SCHEMA_KEY,
  SCHEMA_MISSING_STATUS,
} from './provisioning';
export { formatTemplate, templateFields } from './template';
export {
  clearDefaultClient,
  DEFAULT_BASE_URL,
  getDefaultClient,
  loadClientConfig,
  resetDefaultClient,
  setDefaultClient,
} from './config';
export {
  ConfigError,
  MissingAttributeError,
  TemplateError,
  UnboundManagerError,
} from './errors';
export {
  ClientConfig,
  DocumentData,
  ErrorResponse,
  GetOptions,
  IndexClient,
  IndexParams,
  Schema,
  SearchOptions,
  SearchResponse,
  XapiandError,
} from './types';
export * from './profiles';

// Default export for convenience
export { XapiandClient as default } from './client';
