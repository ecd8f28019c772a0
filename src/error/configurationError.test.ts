import { describe, expect, it } from 'vitest';
import { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';

describe('ConfigurationError', () => {
  it('returns true for instances of ConfigurationError', () => {
    const err = new ConfigurationError('API key is required');

    expect(isConfigurationError(err)).toBe(true);
    expect(err.name).toBe('ConfigurationError');
  });

  it('returns false for other errors', () => {
    expect(isConfigurationError(new Error('boom'))).toBe(false);
  });

  it('unwraps nested causes', () => {
    const err = new ConfigurationError('bad mounts');

    expect(getConfigurationError(new Error('outer', { cause: err }))).toBe(err);
  });
});
