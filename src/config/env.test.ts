import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../error/configurationError.js';
import { resolveEnvConfig } from './env.js';

describe('resolveEnvConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'env-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns an empty mapping when loading is disabled', () => {
    expect(resolveEnvConfig(false, { env: { IPQS_API_KEY: 'env-key' } })).toEqual({});
  });

  it('returns the environment when the settings file is missing', () => {
    const config = resolveEnvConfig(true, {
      path: join(dir, 'missing.env'),
      env: { IPQS_API_KEY: 'env-key', EMPTY: undefined },
    });

    expect(config).toEqual({ IPQS_API_KEY: 'env-key' });
  });

  it('lets the settings file override the environment', () => {
    const path = join(dir, '.env');
    writeFileSync(path, 'DOMAINTOOLS_API_KEY=file-key\nHTTPS_PROXY="http://proxy.local:3128"\n');

    const config = resolveEnvConfig(true, {
      path,
      env: { DOMAINTOOLS_API_KEY: 'env-key', HOME: '/home/test' },
    });

    expect(config).toEqual({
      DOMAINTOOLS_API_KEY: 'file-key',
      HOME: '/home/test',
      HTTPS_PROXY: 'http://proxy.local:3128',
    });
  });

  it('returns a frozen mapping', () => {
    const config = resolveEnvConfig(true, { path: join(dir, 'missing.env'), env: {} });

    expect(Object.isFrozen(config)).toBe(true);
  });

  it('raises a ConfigurationError for an unreadable settings path', () => {
    const path = join(dir, 'settings');
    mkdirSync(path);

    expect(() => resolveEnvConfig(true, { path, env: {} })).toThrow(ConfigurationError);
  });
});
