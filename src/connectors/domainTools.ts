import type { Response } from 'undici';
import { AsyncBroker } from '../broker/asyncBroker.js';
import { Broker } from '../broker/broker.js';
import type { AsyncBrokerOptions, ConnectorOptions, SyncBrokerOptions } from '../broker/types.js';
import type { QueryParams } from '../utils/url.js';
import { resolveApiKey } from './apiKey.js';
import { assertIrisInvestigateParams } from './irisInvestigate.js';

/** DomainTools API root. */
export const DOMAINTOOLS_BASE_URL = 'https://api.domaintools.com';
/** Settings key the API key is read from. */
export const DOMAINTOOLS_API_KEY = 'DOMAINTOOLS_API_KEY';

const missingKey = 'API key is required for DomainTools';

/**
 * Blocking client for the DomainTools API. The API key is sent as `X-API-KEY`.
 *
 * @example
 * const dt = new DomainToolsConnector({ loadEnvVars: true });
 * const whois = await dt.parsedWhois('example.com').json();
 * dt.close();
 */
export class DomainToolsConnector extends Broker {
  readonly apiKey: string;

  /** @throws {ConfigurationError} when no API key is given or configured. */
  constructor({ apiKey, ...options }: ConnectorOptions<SyncBrokerOptions> = {}) {
    const resolved = resolveApiKey(apiKey, options, DOMAINTOOLS_API_KEY, missingKey);
    super({ ...options, envConfig: resolved.envConfig, baseUrl: DOMAINTOOLS_BASE_URL });

    this.apiKey = resolved.apiKey;
    this.headers['X-API-KEY'] = resolved.apiKey;
  }

  /**
   * Searches domains by any combination of Iris Investigate fields (IP, SSL hash, email…).
   * See https://docs.domaintools.com/api/iris/investigate/search/.
   *
   * @throws {ValidationError} before any request when `params` is empty or has unknown names.
   */
  irisInvestigate(params: QueryParams): Response {
    this.logCall('irisInvestigate', { params });
    assertIrisInvestigateParams(params);
    return this.get('/v1/iris-investigate', params);
  }

  /** Parsed WHOIS record of a domain name or IP address. */
  parsedWhois(query: string, params?: QueryParams): Response {
    this.logCall('parsedWhois', { query, params });
    return this.get(`v1/${query}/whois/parsed`, params);
  }

  /** Domains hosted on the same IP as `query` (an IP or a domain name). */
  reverseIp(query: string, params?: QueryParams): Response {
    this.logCall('reverseIp', { query, params });
    return this.get(`v1/${query}/reverse-ip`, params);
  }

  /** Domains sharing the name server `query`. */
  reverseNameserver(query: string, params?: QueryParams): Response {
    this.logCall('reverseNameserver', { query, params });
    return this.get(`v1/${query}/name-server-domains`, params);
  }
}

/**
 * Promise-based twin of {@link DomainToolsConnector}.
 */
export class AsyncDomainToolsConnector extends AsyncBroker {
  readonly apiKey: string;

  /** @throws {ConfigurationError} when no API key is given or configured. */
  constructor({ apiKey, ...options }: ConnectorOptions<AsyncBrokerOptions> = {}) {
    const resolved = resolveApiKey(apiKey, options, DOMAINTOOLS_API_KEY, missingKey);
    super({ ...options, envConfig: resolved.envConfig, baseUrl: DOMAINTOOLS_BASE_URL });

    this.apiKey = resolved.apiKey;
    this.headers['X-API-KEY'] = resolved.apiKey;
  }

  /** @see {@link DomainToolsConnector.irisInvestigate} */
  async irisInvestigate(params: QueryParams): Promise<Response> {
    this.logCall('irisInvestigate', { params });
    assertIrisInvestigateParams(params);
    return this.get('/v1/iris-investigate', params);
  }

  /** Parsed WHOIS record of a domain name or IP address. */
  parsedWhois(query: string, params?: QueryParams): Promise<Response> {
    this.logCall('parsedWhois', { query, params });
    return this.get(`v1/${query}/whois/parsed`, params);
  }

  /** Domains hosted on the same IP as `query`. */
  reverseIp(query: string, params?: QueryParams): Promise<Response> {
    this.logCall('reverseIp', { query, params });
    return this.get(`v1/${query}/reverse-ip`, params);
  }

  /** Domains sharing the name server `query`. */
  reverseNameserver(query: string, params?: QueryParams): Promise<Response> {
    this.logCall('reverseNameserver', { query, params });
    return this.get(`v1/${query}/name-server-domains`, params);
  }
}
