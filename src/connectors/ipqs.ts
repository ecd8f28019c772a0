import type { Response } from 'undici';
import { AsyncBroker } from '../broker/asyncBroker.js';
import { Broker } from '../broker/broker.js';
import type { AsyncBrokerOptions, ConnectorOptions, SyncBrokerOptions } from '../broker/types.js';
import type { FormBody } from '../fetch/types.js';
import { resolveApiKey } from './apiKey.js';

/** IPQualityScore JSON API root. */
export const IPQS_BASE_URL = 'https://ipqualityscore.com/api/json';
/** Settings key the API key is read from. */
export const IPQS_API_KEY = 'IPQS_API_KEY';

const formHeaders = { 'Content-Type': 'application/x-www-form-urlencoded' };

/**
 * Blocking client for the IPQualityScore Malicious URL Scanner. The API key
 * travels in the form body.
 */
export class IPQSConnector extends Broker {
  readonly apiKey: string;

  /** @throws {ConfigurationError} when no API key is given or configured. */
  constructor({ apiKey, ...options }: ConnectorOptions<SyncBrokerOptions> = {}) {
    const resolved = resolveApiKey(apiKey, options, IPQS_API_KEY, 'API key is required for IPQSConnector');
    super({ ...options, envConfig: resolved.envConfig, baseUrl: IPQS_BASE_URL });

    this.apiKey = resolved.apiKey;
    Object.assign(this.headers, formHeaders);
  }

  /**
   * Scans a URL. Extra fields such as `strictness` or `fast` tune the scan.
   */
  maliciousUrl(query: string, params: FormBody = {}): Response {
    this.logCall('maliciousUrl', { query, params });
    return this.post('/url/', { form: { url: query, key: this.apiKey, ...params } });
  }
}

/**
 * Promise-based twin of {@link IPQSConnector}.
 */
export class AsyncIPQSConnector extends AsyncBroker {
  readonly apiKey: string;

  /** @throws {ConfigurationError} when no API key is given or configured. */
  constructor({ apiKey, ...options }: ConnectorOptions<AsyncBrokerOptions> = {}) {
    const resolved = resolveApiKey(apiKey, options, IPQS_API_KEY, 'API key is required for AsyncIPQSConnector');
    super({ ...options, envConfig: resolved.envConfig, baseUrl: IPQS_BASE_URL });

    this.apiKey = resolved.apiKey;
    Object.assign(this.headers, formHeaders);
  }

  /** @see {@link IPQSConnector.maliciousUrl} */
  maliciousUrl(query: string, params: FormBody = {}): Promise<Response> {
    this.logCall('maliciousUrl', { query, params });
    return this.post('/url/', { form: { url: query, key: this.apiKey, ...params } });
  }
}
