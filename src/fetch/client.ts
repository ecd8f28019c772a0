import { Agent, type Dispatcher, fetch, ProxyAgent, type Response } from 'undici';
import { HTTPError } from '../error/httpError.js';
import { type ProxyDecision, proxyFor } from '../proxy/resolveProxy.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { appendSearchParams } from '../utils/url.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { FetchClientOptions, FetchClientProviderDefinition, TransportRequest } from './types.js';
import { buildHeaders, encodeBody, toTransportError } from './utils.js';

/**
 * undici-backed transport that:
 * - owns one connection pool per proxy route for its whole lifetime,
 * - routes each request through the proxy its URL scheme maps to,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Per-request timeout in milliseconds. */
  #timeout: number | false;
  /** Proxy routing decided at construction. */
  #proxy: ProxyDecision;
  /** Pool for requests that bypass any proxy. */
  #direct: Agent;
  /** Pools keyed by proxy URL. */
  #proxies = new Map<string, ProxyAgent>();

  /** Creates the pools for every route the proxy decision can take. */
  constructor({ timeout, proxy, clientOptions = {} }: FetchClientOptions) {
    this.#timeout = timeout;
    this.#proxy = proxy;
    this.#direct = new Agent(clientOptions);

    const proxyUrls =
      proxy.kind === 'single' ? [proxy.url] : proxy.kind === 'split' ? Object.values(proxy.mounts) : [];
    for (const uri of proxyUrls) {
      if (uri && !this.#proxies.has(uri)) {
        this.#proxies.set(uri, new ProxyAgent({ ...clientOptions, uri }));
      }
    }
  }

  /**
   * Issues one HTTP call.
   *
   * Errors:
   * - Network / fetch errors are mapped to `TransportError` subclasses.
   * - Non-2xx responses are wrapped in `HTTPError`.
   */
  async request({ method, url, headers, params, body, auth }: TransportRequest): SafeWrapAsync<Error, Response> {
    const target = appendSearchParams(url, params);
    const timeout = createTimeoutSignal(this.#timeout);

    const [err, res] = await safeWrapAsync(() =>
      fetch(target, {
        method,
        headers: buildHeaders(headers, body, auth),
        body: encodeBody(body),
        dispatcher: this.#dispatcherFor(target),
        ...(timeout && { signal: timeout.signal }),
      }),
    );
    // The timeout covers the exchange up to the response headers; the body belongs to the caller.
    timeout?.clear();

    if (err) {
      return [toTransportError(err, `error ${method} ${target} in fetchClient`), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error HTTP ${res.status} in ${method} ${target}`), null];
    }

    return [null, res];
  }

  /**
   * Closes every pool, waiting for in-flight requests to finish.
   */
  async close(): Promise<void> {
    await Promise.all([this.#direct.close(), ...[...this.#proxies.values()].map((agent) => agent.close())]);
  }

  #dispatcherFor(url: string): Dispatcher {
    const proxyUrl = proxyFor(this.#proxy, url);
    return (proxyUrl && this.#proxies.get(proxyUrl)) || this.#direct;
  }
}
