import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import dotenv from 'dotenv';
import { ConfigurationError } from '../error/configurationError.js';
import { safeWrap } from '../utils/wrap.js';

/** Flat key/value settings (API keys, proxy variables) resolved once per connector. */
export type EnvConfig = Readonly<Record<string, string>>;

/** Where {@link resolveEnvConfig} reads from. */
export interface EnvConfigSource {
  /**
   * dotenv-formatted settings file, resolved against the working directory.
   * @default '.env'
   */
  path?: string;
  /**
   * Environment variables merged underneath the file's values.
   * @default process.env
   */
  env?: NodeJS.ProcessEnv;
}

function readSettingsFile(path: string): Record<string, string> {
  const [err, contents] = safeWrap(() => readFileSync(path, 'utf8'));
  if (!err) {
    return dotenv.parse(contents);
  }

  if ('code' in err && err.code === 'ENOENT') {
    return {};
  }

  throw new ConfigurationError(`error reading settings file ${path}`, { cause: err });
}

/**
 * Builds the settings mapping for a connector.
 *
 * Returns an empty mapping unless `loadFromFile` is set. Otherwise the environment
 * variables are merged with the settings file, the file winning on conflicts; a
 * missing file simply contributes nothing.
 */
export function resolveEnvConfig(
  loadFromFile: boolean,
  { path = '.env', env = process.env }: EnvConfigSource = {},
): EnvConfig {
  if (!loadFromFile) {
    return {};
  }

  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string') {
      merged[key] = value;
    }
  }

  return Object.freeze({ ...merged, ...readSettingsFile(resolve(path)) });
}
