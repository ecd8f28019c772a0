import { describe, expect, it } from 'vitest';
import { appendSearchParams, joinUrl } from './url.js';

describe('joinUrl', () => {
  it('puts exactly one slash between base and endpoint', () => {
    expect(joinUrl('https://api.example.com', 'v1/a')).toBe('https://api.example.com/v1/a');
    expect(joinUrl('https://api.example.com/', 'v1/a')).toBe('https://api.example.com/v1/a');
    expect(joinUrl('https://api.example.com', '/v1/a')).toBe('https://api.example.com/v1/a');
    expect(joinUrl('https://api.example.com/', '/v1/a')).toBe('https://api.example.com/v1/a');
  });

  it('collapses repeated slashes on either side', () => {
    expect(joinUrl('https://api.example.com///', '///v1/a')).toBe('https://api.example.com/v1/a');
  });

  it('keeps trailing slashes on the endpoint and base paths', () => {
    expect(joinUrl('https://ipqualityscore.com/api/json', '/url/')).toBe('https://ipqualityscore.com/api/json/url/');
  });

  it('handles an empty endpoint', () => {
    expect(joinUrl('https://api.example.com/', '')).toBe('https://api.example.com/');
  });
});

describe('appendSearchParams', () => {
  it('returns the url untouched without params', () => {
    expect(appendSearchParams('https://api.example.com/v1/a')).toBe('https://api.example.com/v1/a');
  });

  it('stringifies scalars and drops empty entries', () => {
    const url = appendSearchParams('https://api.example.com/v1/a', {
      domain: 'example.com',
      page: 2,
      active: true,
      skipped: undefined,
      nothing: null,
    });

    expect(url).toBe('https://api.example.com/v1/a?domain=example.com&page=2&active=true');
  });

  it('repeats the key for arrays and keeps existing params', () => {
    const url = appendSearchParams('https://api.example.com/v1/a?x=1', { tld: ['com', 'net'] });

    expect(url).toBe('https://api.example.com/v1/a?x=1&tld=com&tld=net');
  });

  it('encodes special characters', () => {
    expect(appendSearchParams('https://api.example.com/', { q: 'a b&c' })).toBe('https://api.example.com/?q=a+b%26c');
  });
});
