/**
 * Broker entrypoint: the blocking and promise-based request executors.
 * @module
 */
export { AsyncBroker } from './asyncBroker.js';
export { Broker } from './broker.js';
export { DEFAULT_TIMEOUT } from './shared.js';
export type {
  AsyncBrokerOptions,
  BrokerOptions,
  ConnectorOptions,
  PostOptions,
  RequestOptions,
  SyncBrokerOptions,
} from './types.js';
