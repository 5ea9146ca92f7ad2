import { DynamicModule, Module, ModuleMetadata, Provider, Type } from '@nestjs/common';
import { DefinedModel, IndexClient, XapiandClient } from 'xapiand-model';
import { DefaultClientRegistrar } from './default-client.registrar';
import { XapiandModelService } from './xapiand-model.service';
import {
  XapiandModelModuleOptions,
  XapiandModelModuleAsyncOptions,
  XapiandModelOptionsFactory,
} from './interfaces';
import {
  XAPIAND_MODEL_MODULE_OPTIONS,
  XAPIAND_CLIENT,
  getModelToken,
} from './constants';

const clientProvider: Provider = {
  provide: XAPIAND_CLIENT,
  useFactory: (options: XapiandModelModuleOptions): IndexClient => new XapiandClient(options),
  inject: [XAPIAND_MODEL_MODULE_OPTIONS],
};

function optionsFrom(factory: Type<XapiandModelOptionsFactory>): Provider {
  return {
    provide: XAPIAND_MODEL_MODULE_OPTIONS,
    useFactory: (optionsFactory: XapiandModelOptionsFactory) => optionsFactory.createXapiandModelOptions(),
    inject: [factory],
  };
}

@Module({})
export class XapiandModelModule {
  /**
   * Configure the client from static options
   */
  static forRoot(options: XapiandModelModuleOptions): DynamicModule {
    return this.root([{ provide: XAPIAND_MODEL_MODULE_OPTIONS, useValue: options }], options.isGlobal);
  }

  /**
   * Configure the client from options resolved through dependency injection
   */
  static forRootAsync(options: XapiandModelModuleAsyncOptions): DynamicModule {
    return this.root(this.optionsProviders(options), options.isGlobal, options.imports);
  }

  /**
   * Make model kinds injectable in a feature module with `@InjectModel(name)`.
   * The service and client come from a global root module.
   */
  static forFeature(models: DefinedModel[] = []): DynamicModule {
    const modelProviders: Provider[] = models.map(model => ({
      provide: getModelToken(model.modelName),
      useValue: model,
    }));

    return {
      module: XapiandModelModule,
      providers: [XapiandModelService, ...modelProviders],
      exports: [XapiandModelService, ...models.map(model => getModelToken(model.modelName))],
    };
  }

  private static root(
    optionsProviders: Provider[],
    isGlobal = false,
    imports: ModuleMetadata['imports'] = [],
  ): DynamicModule {
    return {
      module: XapiandModelModule,
      global: isGlobal,
      imports,
      providers: [...optionsProviders, clientProvider, DefaultClientRegistrar, XapiandModelService],
      exports: [XapiandModelService, XAPIAND_CLIENT, XAPIAND_MODEL_MODULE_OPTIONS],
    };
  }

  private static optionsProviders(options: XapiandModelModuleAsyncOptions): Provider[] {
    if (options.useFactory) {
      return [
        {
          provide: XAPIAND_MODEL_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
      ];
    }
    if (options.useClass) {
      return [optionsFrom(options.useClass), options.useClass];
    }
    if (options.useExisting) {
      return [optionsFrom(options.useExisting)];
    }
    throw new Error(
      'Invalid XapiandModelModuleAsyncOptions: must provide useFactory, useClass, or useExisting',
    );
  }
}
