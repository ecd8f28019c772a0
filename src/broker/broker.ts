import type { Response } from 'undici';
import type { EnvConfig } from '../config/env.js';
import { SyncFetchClient } from '../fetch/syncClient.js';
import type { HeaderMap, HttpMethod, RequestBody, SyncFetchClientProviderDefinition } from '../fetch/types.js';
import { type CallArguments, formatCall } from '../utils/formatCall.js';
import type { BrokerLogger } from '../utils/logger.js';
import { retrySync } from '../utils/retry.js';
import { resolveRetryPolicy } from '../utils/retryPolicy.js';
import type { QueryParams } from '../utils/url.js';
import { buildTransportRequest, resolveBrokerSettings, surfaceError } from './shared.js';
import type { CallOptions, PostOptions, RequestOptions, SyncBrokerOptions } from './types.js';

/**
 * Blocking twin of {@link AsyncBroker}: every call returns once the response is in.
 *
 * The default transport runs on a dedicated worker thread, so a broker must be
 * closed (or the process exit) to release it. Backoff waits block the thread too.
 * Instances belong to the thread that created them.
 *
 * @example
 * const broker = new Broker({ baseUrl: 'https://api.example.com' });
 * try {
 *   const res = broker.get('/v1/items');
 * } finally {
 *   broker.close();
 * }
 */
export class Broker {
  /** Default headers, sent whenever a call passes none of its own. */
  headers: HeaderMap;
  /** Settings loaded at construction (API keys, proxy variables). */
  protected readonly envConfig: EnvConfig;
  #baseUrl: string;
  #enableBackoff: boolean;
  #logger: BrokerLogger | null;
  #client: SyncFetchClientProviderDefinition;

  /** Creates the broker and its transport. */
  constructor({ fetchProvider = SyncFetchClient, ...options }: SyncBrokerOptions) {
    const settings = resolveBrokerSettings(new.target.name, options);
    this.headers = settings.headers;
    this.envConfig = settings.envConfig;
    this.#baseUrl = settings.baseUrl;
    this.#enableBackoff = settings.enableBackoff;
    this.#logger = settings.logger;
    this.#client = new fetchProvider({
      timeout: settings.timeout,
      proxy: settings.proxy,
      clientOptions: options.clientOptions,
    });
  }

  /** Sends a GET request. */
  get(endpoint: string, params?: QueryParams, opts: RequestOptions = {}): Response {
    return this.request('GET', endpoint, { ...opts, params });
  }

  /** Sends a POST request with an optional JSON or form body. */
  post(endpoint: string, body?: RequestBody, opts: PostOptions = {}): Response {
    return this.request('POST', endpoint, { ...opts, body });
  }

  /**
   * Releases the transport. Safe to call more than once.
   */
  close(): void {
    this.#client.close();
  }

  /**
   * Issues one call, retrying when backoff is enabled.
   *
   * @throws {HTTPError} for non-2xx responses.
   * @throws {TransportError} when no response arrived.
   */
  protected request(method: HttpMethod, endpoint: string, call: CallOptions): Response {
    const request = buildTransportRequest(this.#baseUrl, this.headers, method, endpoint, call);
    const attempt = () => this.#client.request(request);

    const [err, res] = this.#enableBackoff
      ? retrySync({ fn: attempt, policy: resolveRetryPolicy(call.retry) })
      : attempt();
    if (err) {
      throw surfaceError(err, (message) => this.log(message));
    }

    return res;
  }

  /** Logs a message when logging is enabled. */
  protected log(message: string): void {
    this.#logger?.info(message);
  }

  /** Logs the call of a connector method with a summary of its arguments. */
  protected logCall(caller: string, args?: CallArguments): void {
    if (this.#logger) {
      this.log(formatCall(caller, args));
    }
  }
}
