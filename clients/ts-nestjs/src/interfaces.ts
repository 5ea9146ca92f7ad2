import { FactoryProvider, InjectionToken, ModuleMetadata, OptionalFactoryDependency, Type } from '@nestjs/common';
import { ClientConfig } from 'xapiand-model';

/**
 * Configuration interface for the NestJS Xapiand model module
 * Extends the base client configuration with NestJS-specific options
 */
export interface XapiandModelModuleOptions extends ClientConfig {
  /**
   * Whether this configuration should be available globally
   * @default false
   */
  isGlobal?: boolean;

  /**
   * Make the module's client the one used by models defined without a client
   * @default true
   */
  registerAsDefault?: boolean;
}

/**
 * Factory function type for creating XapiandModelModuleOptions
 */
export interface XapiandModelOptionsFactory {
  createXapiandModelOptions(): Promise<XapiandModelModuleOptions> | XapiandModelModuleOptions;
}

/**
 * Async configuration options for the NestJS module
 */
export interface XapiandModelModuleAsyncOptions {
  /**
   * Whether this configuration should be available globally
   * @default false
   */
  isGlobal?: boolean;

  /**
   * Modules exporting the providers the factory depends on
   */
  imports?: ModuleMetadata['imports'];

  /**
   * Factory function that returns the module options
   */
  useFactory?: FactoryProvider<Promise<XapiandModelModuleOptions> | XapiandModelModuleOptions>['useFactory'];

  /**
   * Dependencies to inject into the factory function
   */
  inject?: Array<InjectionToken | OptionalFactoryDependency>;

  /**
   * Class that implements XapiandModelOptionsFactory
   */
  useClass?: Type<XapiandModelOptionsFactory>;

  /**
   * Token of an existing provider that implements XapiandModelOptionsFactory
   */
  useExisting?: Type<XapiandModelOptionsFactory>;
}
