import { describe, expect, it } from 'vitest';
import { formatCall } from './formatCall.js';

describe('formatCall', () => {
  it('logs a query argument verbatim', () => {
    expect(formatCall('parsedWhois', { query: 'example.com', params: { a: 1 } })).toBe(
      'parsedWhois called with query: example.com',
    );
  });

  it('summarizes object arguments by sorted keys', () => {
    expect(formatCall('irisInvestigate', { params: { ip: '1.1.1.1', domain: 'example.com' } })).toBe(
      "irisInvestigate called with params_keys=['domain', 'ip']",
    );
  });

  it('inspects scalar arguments', () => {
    expect(formatCall('search', { term: 'abc', limit: 5 })).toBe("search called with term='abc', limit=5");
  });

  it('skips undefined arguments', () => {
    expect(formatCall('search', { term: 'abc', limit: undefined })).toBe("search called with term='abc'");
  });

  it('reports a bare call without arguments', () => {
    expect(formatCall('ping')).toBe('ping called');
    expect(formatCall('ping', { params: undefined })).toBe('ping called');
  });
});
