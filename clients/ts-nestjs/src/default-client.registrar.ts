import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { IndexClient, clearDefaultClient, setDefaultClient } from 'xapiand-model';
import { XAPIAND_CLIENT, XAPIAND_MODEL_MODULE_OPTIONS } from './constants';
import { XapiandModelModuleOptions } from './interfaces';

/**
 * Makes the module's client the one used by models defined without a
 * client, for as long as the module is alive.
 */
@Injectable()
export class DefaultClientRegistrar implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DefaultClientRegistrar.name);

  constructor(
    @Inject(XAPIAND_CLIENT)
    private readonly client: IndexClient,
    @Inject(XAPIAND_MODEL_MODULE_OPTIONS)
    private readonly options: XapiandModelModuleOptions,
  ) {}

  onModuleInit() {
    if (this.options.registerAsDefault === false) {
      this.logger.log('Leaving the default model client unchanged');
      return;
    }
    setDefaultClient(this.client);
    this.logger.log('Registered Xapiand client as the default model client');
  }

  onModuleDestroy() {
    // Another module may have registered its own client since
    if (clearDefaultClient(this.client)) {
      this.logger.log('Released the default model client');
    }
  }
}
