import { Response } from 'undici';
import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('defaults the message to the status code', () => {
    const err = new HTTPError(new Response(null, { status: 404 }));

    expect(err.message).toBe('HTTP Error: 404');
    expect(err.name).toBe('HTTPError');
    expect(err.status).toBe(404);
  });

  it('exposes the wrapped response', async () => {
    const response = new Response('slow down', { status: 429 });
    const err = new HTTPError(response, 'rate limited');

    expect(err.response).toBe(response);
    expect(await err.response.text()).toBe('slow down');
  });

  it('is found through nested causes', () => {
    const err = new HTTPError(new Response(null, { status: 503 }));
    const wrapped = new Error('outer', { cause: err });

    expect(isHttpError(wrapped)).toBe(true);
    expect(getHttpError(wrapped)?.status).toBe(503);
    expect(getHttpError(new Error('boom'))).toBeNull();
  });
});
