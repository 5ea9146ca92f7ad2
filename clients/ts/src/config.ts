import { XapiandClient } from './client';
import { ConfigError } from './errors';
import { ClientConfig, IndexClient } from './types';

export const DEFAULT_BASE_URL = 'http://localhost:8880';

/**
 * Read client configuration from environment variables
 *
 * - `XAPIAND_URL` (default `http://localhost:8880`)
 * - `XAPIAND_USERNAME` / `XAPIAND_PASSWORD`
 * - `XAPIAND_TIMEOUT` in milliseconds
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const config: ClientConfig = {
    baseUrl: env.XAPIAND_URL || DEFAULT_BASE_URL,
  };

  if (env.XAPIAND_USERNAME) {
    config.username = env.XAPIAND_USERNAME;
  }
  if (env.XAPIAND_PASSWORD) {
    config.password = env.XAPIAND_PASSWORD;
  }

  if (env.XAPIAND_TIMEOUT) {
    const timeout = Number(env.XAPIAND_TIMEOUT);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigError(
        `XAPIAND_TIMEOUT must be a positive integer, got '${env.XAPIAND_TIMEOUT}'`,
        'XAPIAND_TIMEOUT'
      );
    }
    config.timeout = timeout;
  }

  return config;
}

let defaultClient: IndexClient | undefined;

/**
 * Client used by models that were defined without one.
 * Built from the environment on first use.
 */
export function getDefaultClient(): IndexClient {
  if (!defaultClient) {
    defaultClient = new XapiandClient(loadClientConfig());
  }
  return defaultClient;
}

export function setDefaultClient(client: IndexClient): void {
  defaultClient = client;
}

export function resetDefaultClient(): void {
  defaultClient = undefined;
}

/**
 * Reset the default client only if it is still `client`. Never builds one.
 */
export function clearDefaultClient(client: IndexClient): boolean {
  if (defaultClient !== client) {
    return false;
  }
  defaultClient = undefined;
  return true;
}
