import type { Response } from 'undici';
import type { EnvConfig } from '../config/env.js';
import { ConfigurationError } from '../error/configurationError.js';
import { FetchClient } from '../fetch/client.js';
import type { FetchClientProviderDefinition, HeaderMap, HttpMethod, RequestBody } from '../fetch/types.js';
import { type CallArguments, formatCall } from '../utils/formatCall.js';
import type { BrokerLogger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { resolveRetryPolicy } from '../utils/retryPolicy.js';
import type { QueryParams } from '../utils/url.js';
import { buildTransportRequest, resolveBrokerSettings, surfaceError } from './shared.js';
import type { AsyncBrokerOptions, CallOptions, PostOptions, RequestOptions } from './types.js';

/**
 * Promise-based HTTP broker that:
 * - owns one transport (and its connection pools) for its whole lifetime,
 * - joins endpoints onto the base URL and applies default headers,
 * - treats non-2xx responses as failures,
 * - optionally retries transient failures with backoff.
 *
 * Responses are returned untouched; connectors decide how to read them.
 *
 * @example
 * const broker = new AsyncBroker({ baseUrl: 'https://api.example.com', enableBackoff: true });
 * const res = await broker.get('/v1/items', { limit: 10 });
 * await broker.close();
 */
export class AsyncBroker {
  /** Default headers, sent whenever a call passes none of its own. */
  headers: HeaderMap;
  /** Settings loaded at construction (API keys, proxy variables). */
  protected readonly envConfig: EnvConfig;
  #baseUrl: string;
  #enableBackoff: boolean;
  #logger: BrokerLogger | null;
  #client: FetchClientProviderDefinition;

  /**
   * Creates the broker and its transport.
   *
   * @throws {ConfigurationError} when `mounts` is given; use `proxy` instead.
   */
  constructor({ fetchProvider = FetchClient, ...options }: AsyncBrokerOptions) {
    if (options.mounts && Object.keys(options.mounts).length > 0) {
      throw new ConfigurationError(
        "error 'mounts' is not supported by AsyncBroker, use 'proxy' or HTTP_PROXY/HTTPS_PROXY in the environment",
      );
    }

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
  get(endpoint: string, params?: QueryParams, opts: RequestOptions = {}): Promise<Response> {
    return this.request('GET', endpoint, { ...opts, params });
  }

  /** Sends a POST request with an optional JSON or form body. */
  post(endpoint: string, body?: RequestBody, opts: PostOptions = {}): Promise<Response> {
    return this.request('POST', endpoint, { ...opts, body });
  }

  /**
   * Releases the transport's connections. The broker must not be used afterwards.
   */
  async close(): Promise<void> {
    await this.#client.close();
  }

  /**
   * Issues one call, retrying when backoff is enabled.
   *
   * @throws {HTTPError} for non-2xx responses.
   * @throws {TransportError} when no response arrived.
   */
  protected async request(method: HttpMethod, endpoint: string, call: CallOptions): Promise<Response> {
    const request = buildTransportRequest(this.#baseUrl, this.headers, method, endpoint, call);
    const attempt = () => this.#client.request(request);

    const [err, res] = this.#enableBackoff
      ? await retry({ fn: attempt, policy: resolveRetryPolicy(call.retry) })
      : await attempt();
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
