import type { EnvConfig } from '../config/env.js';
import type {
  BasicAuth,
  ClientOptions,
  FetchClientProvider,
  HeaderMap,
  RequestBody,
  SyncFetchClientProvider,
} from '../fetch/types.js';
import type { ProxyMounts } from '../proxy/resolveProxy.js';
import type { BrokerLogger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retryPolicy.js';
import type { QueryParams } from '../utils/url.js';

/** Constructor options shared by {@link Broker} and {@link AsyncBroker}. */
export interface BrokerOptions {
  /** Base URL every endpoint is joined onto, e.g. `https://api.example.com`. */
  baseUrl: string;
  /** Default headers; replaced wholesale by per-call headers. */
  headers?: HeaderMap;
  /**
   * Per-request timeout in milliseconds, `false` to disable.
   * @default 10_000
   */
  timeout?: number | false;
  /**
   * Read proxy variables from the process environment when no settings were loaded.
   * @default true
   */
  trustEnv?: boolean;
  /** Proxy URL for all traffic; wins over anything found in the environment. */
  proxy?: string;
  /** Proxy URL per scheme; wins over `proxy`. Only the synchronous broker accepts it. */
  mounts?: ProxyMounts;
  /** Retry transient failures with exponential backoff. */
  enableBackoff?: boolean;
  /** Log one line per connector call and every surfaced error. */
  enableLogging?: boolean;
  /** Logger used when logging is enabled; defaults to a pino logger named after the class. */
  logger?: BrokerLogger;
  /** Merge the process environment with the settings file into {@link envConfig}. */
  loadEnvVars?: boolean;
  /**
   * dotenv-formatted settings file read when `loadEnvVars` is set.
   * @default '.env'
   */
  envFile?: string;
  /** Already resolved settings; takes precedence over `loadEnvVars`. */
  envConfig?: EnvConfig;
  /** Passthrough options for the undici agents. */
  clientOptions?: ClientOptions;
}

/** {@link BrokerOptions} for the {@link AsyncBroker}. */
export interface AsyncBrokerOptions extends BrokerOptions {
  /** Transport implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
}

/** {@link BrokerOptions} for the synchronous {@link Broker}. */
export interface SyncBrokerOptions extends BrokerOptions {
  /** Transport implementation. Defaults to {@link SyncFetchClient}. */
  fetchProvider?: SyncFetchClientProvider;
}

/** Connector options: everything but the base URL, plus the API key. */
export type ConnectorOptions<Options extends BrokerOptions> = Omit<Options, 'baseUrl'> & {
  /** API key; falls back to the connector's key name in the loaded settings. */
  apiKey?: string;
};

/** Per-call options of `get` and `post`. */
export interface RequestOptions {
  /** Replaces the broker's default headers for this call. */
  headers?: HeaderMap;
  auth?: BasicAuth;
  /** Overrides single fields of the retry policy; only used with backoff enabled. */
  retry?: Partial<RetryPolicy>;
}

/** Per-call options of `post`, which may also carry query params. */
export interface PostOptions extends RequestOptions {
  params?: QueryParams;
}

/** Everything the internal `request` needs besides method and endpoint. */
export interface CallOptions extends PostOptions {
  body?: RequestBody;
}
