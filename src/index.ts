/**
 * Root entrypoint: re-exports the brokers, connectors, retry helpers and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Blocking and promise-based request executors shared by every connector.
 */
export { AsyncBroker, Broker, DEFAULT_TIMEOUT } from './broker/index.js';

/**
 * Constructor and per-call options of the brokers.
 */
export type {
  AsyncBrokerOptions,
  BrokerOptions,
  ConnectorOptions,
  PostOptions,
  RequestOptions,
  SyncBrokerOptions,
} from './broker/index.js';

/**
 * DomainTools and IPQualityScore clients.
 */
export {
  AsyncDomainToolsConnector,
  AsyncIPQSConnector,
  DomainToolsConnector,
  IPQSConnector,
  IRIS_INVESTIGATE_PARAMS,
  irisInvestigateParamsSchema,
} from './connectors/index.js';

/**
 * Settings file and proxy resolution, as used by the brokers at construction.
 */
export { type EnvConfig, type EnvConfigSource, resolveEnvConfig } from './config/env.js';
export {
  type ProxyDecision,
  type ProxyMounts,
  type ProxyScheme,
  resolveClientProxy,
  resolveProxy,
} from './proxy/resolveProxy.js';

/**
 * Transports, for callers plugging in their own `fetchProvider`.
 */
export { FetchClient, SyncFetchClient } from './fetch/index.js';
export type {
  BasicAuth,
  ClientOptions,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FormBody,
  HeaderMap,
  RequestBody,
  SyncFetchClientProvider,
  SyncFetchClientProviderDefinition,
  TransportRequest,
} from './fetch/index.js';

/**
 * Retry policy building blocks for per-call `retry` overrides.
 */
export {
  defaultRetryPolicy,
  isRetryableError,
  type RetryPolicy,
  type RetryState,
  retryIfException,
  stopAfterAttempt,
  type WaitExponentialOptions,
  waitExponential,
} from './utils/retryPolicy.js';

/**
 * Logging hook accepted by the brokers.
 */
export type { BrokerLogger } from './utils/logger.js';

/**
 * Query parameter shapes accepted by `get` and `post`.
 */
export type { QueryParams, QueryValue } from './utils/url.js';

/**
 * Error classes and helpers to identify them.
 */
export * from './error/index.js';
