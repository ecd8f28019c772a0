/**
 * Fetch entrypoint: exports the async and blocking transports and their contracts.
 * @module
 */
export { FetchClient } from './client.js';
export { SyncFetchClient } from './syncClient.js';
export type {
  BasicAuth,
  ClientOptions,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FormBody,
  HeaderMap,
  HttpMethod,
  RequestBody,
  SyncFetchClientProvider,
  SyncFetchClientProviderDefinition,
  TransportRequest,
} from './types.js';
