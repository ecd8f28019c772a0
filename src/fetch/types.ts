import type { Agent, Response } from 'undici';
import type { ProxyDecision } from '../proxy/resolveProxy.js';
import type { QueryParams, QueryValue } from '../utils/url.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** HTTP methods the brokers issue. */
export type HttpMethod = 'GET' | 'POST';

/** Plain header mapping; per-call headers replace the broker defaults wholesale. */
export type HeaderMap = Record<string, string>;

/** Fields of a URL-encoded form body. */
export type FormBody = Record<string, QueryValue | null | undefined>;

/** POST payload: JSON-encoded or URL-encoded form. */
export type RequestBody = { json: unknown } | { form: FormBody };

/** Credentials sent as an HTTP Basic `Authorization` header. */
export interface BasicAuth {
  username: string;
  password: string;
}

/** Passthrough options for the underlying undici agents (TLS, keep-alive, pool sizes…). */
export type ClientOptions = Agent.Options;

/** One fully-resolved HTTP call handed to a transport provider. */
export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL without the query string. */
  url: string;
  headers: HeaderMap;
  params?: QueryParams;
  body?: RequestBody;
  auth?: BasicAuth;
}

/** Options every transport provider is constructed with. */
export interface FetchClientOptions {
  /** Per-request timeout in milliseconds, `false` to disable. */
  timeout: number | false;
  /** Proxy routing decided by the broker. */
  proxy: ProxyDecision;
  clientOptions?: ClientOptions;
}

/** Contract for asynchronous transports used by the AsyncBroker. */
export interface FetchClientProviderDefinition {
  request: (request: TransportRequest) => SafeWrapAsync<Error, Response>;
  close: () => Promise<void>;
}

/** Factory signature for constructing asynchronous transports. */
export interface FetchClientProvider {
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}

/** Contract for blocking transports used by the synchronous Broker. */
export interface SyncFetchClientProviderDefinition {
  request: (request: TransportRequest) => SafeWrap<Error, Response>;
  close: () => void;
}

/** Factory signature for constructing blocking transports. */
export interface SyncFetchClientProvider {
  new (opts: FetchClientOptions): SyncFetchClientProviderDefinition;
}
