import type { BrokerOptions } from '../broker/types.js';
import { type EnvConfig, resolveEnvConfig } from '../config/env.js';
import { ConfigurationError } from '../error/configurationError.js';

/** Result of {@link resolveApiKey}. */
export interface ResolvedApiKey {
  apiKey: string;
  /** Loaded settings, handed on to the broker so the file is read once. */
  envConfig: EnvConfig;
}

/**
 * Picks the explicit API key or, failing that, `keyName` from the loaded settings.
 *
 * @throws {ConfigurationError} with `message` when neither is set.
 */
export function resolveApiKey(
  apiKey: string | undefined,
  { envConfig, loadEnvVars = false, envFile }: Pick<BrokerOptions, 'envConfig' | 'loadEnvVars' | 'envFile'>,
  keyName: string,
  message: string,
): ResolvedApiKey {
  const settings = envConfig ?? resolveEnvConfig(loadEnvVars, { path: envFile });
  const key = apiKey || settings[keyName];
  if (!key) {
    throw new ConfigurationError(message);
  }

  return { apiKey: key, envConfig: settings };
}
