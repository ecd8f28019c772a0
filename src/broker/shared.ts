import { type EnvConfig, resolveEnvConfig } from '../config/env.js';
import { HTTPError } from '../error/httpError.js';
import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import type { HeaderMap, HttpMethod, TransportRequest } from '../fetch/types.js';
import { type ProxyDecision, resolveClientProxy } from '../proxy/resolveProxy.js';
import { type BrokerLogger, createLogger } from '../utils/logger.js';
import { joinUrl } from '../utils/url.js';
import type { BrokerOptions, CallOptions } from './types.js';

/** Default per-request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 10_000;

/** Construction-time settings both brokers derive from {@link BrokerOptions}. */
export interface BrokerSettings {
  baseUrl: string;
  headers: HeaderMap;
  timeout: number | false;
  enableBackoff: boolean;
  envConfig: EnvConfig;
  proxy: ProxyDecision;
  logger: BrokerLogger | null;
}

/**
 * Resolves settings file, proxy and logger for a broker named `name`.
 */
export function resolveBrokerSettings(
  name: string,
  {
    baseUrl,
    headers = {},
    timeout = DEFAULT_TIMEOUT,
    trustEnv = true,
    proxy,
    mounts,
    enableBackoff = false,
    enableLogging = false,
    logger,
    loadEnvVars = false,
    envFile,
    envConfig,
  }: BrokerOptions,
): BrokerSettings {
  const resolvedEnv = envConfig ?? resolveEnvConfig(loadEnvVars, { path: envFile });

  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    headers: { ...headers },
    timeout,
    enableBackoff,
    envConfig: resolvedEnv,
    proxy: resolveClientProxy({ proxy, mounts, envConfig: resolvedEnv, trustEnv }),
    logger: enableLogging ? (logger ?? createLogger(name)) : null,
  };
}

/**
 * Builds the transport request for one call. Empty per-call headers fall back to the defaults.
 */
export function buildTransportRequest(
  baseUrl: string,
  defaultHeaders: HeaderMap,
  method: HttpMethod,
  endpoint: string,
  { params, body, headers, auth }: CallOptions,
): TransportRequest {
  const useDefaults = !headers || Object.keys(headers).length === 0;

  return {
    method,
    url: joinUrl(baseUrl, endpoint),
    headers: useDefaults ? { ...defaultHeaders } : { ...headers },
    params,
    body,
    auth,
  };
}

/**
 * Unwraps retry outcomes to the error of the final attempt and logs it.
 */
export function surfaceError(error: Error, log: (message: string) => void): Error {
  if (error instanceof RetryExhaustedError) {
    log(`Retry failed: ${error.lastError.message}`);
    return error.lastError;
  }

  const cause = error instanceof RetrySuppressedError ? error.lastError : error;
  log(cause instanceof HTTPError ? `HTTP error: ${cause.message}` : `Request failed: ${cause.message}`);

  return cause;
}
