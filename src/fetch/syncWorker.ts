import { MessagePort, workerData } from 'node:worker_threads';
import { toError } from '../utils/wrap.js';
import { FetchClient } from './client.js';
import {
  isWorkerMessage,
  serializeError,
  serializeResponse,
  WORKER_FAILURE_ID,
  type WorkerReply,
} from './serialize.js';
import type { FetchClientOptions } from './types.js';
import { toTransportError } from './utils.js';

/** Data the blocking client hands to its worker at spawn time. */
export interface SyncWorkerData {
  /** Port replies are posted on. */
  port: MessagePort;
  /** Flag flipped to `1` after each reply, waking the blocked caller. */
  signal: Int32Array;
  options: FetchClientOptions;
}

function isSyncWorkerData(value: unknown): value is SyncWorkerData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'port' in value &&
    value.port instanceof MessagePort &&
    'signal' in value &&
    value.signal instanceof Int32Array &&
    'options' in value &&
    typeof value.options === 'object' &&
    value.options !== null &&
    'timeout' in value.options &&
    'proxy' in value.options
  );
}

// A throw here rejects the loader's import, which reports it to the blocked caller.
const data: unknown = workerData;
if (!isSyncWorkerData(data)) {
  throw new TypeError('error syncWorker started without valid worker data');
}

const { port, signal, options } = data;
const client = new FetchClient(options);

function reply(message: WorkerReply): void {
  port.postMessage(message);
  Atomics.store(signal, 0, 1);
  Atomics.notify(signal, 0);
}

async function handle(message: unknown): Promise<void> {
  if (!isWorkerMessage(message)) {
    throw new TypeError('error unknown message in syncWorker');
  }

  if (message.type === 'close') {
    await client.close();
    reply({ type: 'closed', id: message.id });
    port.close();
    return;
  }

  const { id, request } = message;
  const [err, res] = await client.request(request);
  if (err) {
    reply({ type: 'error', id, error: await serializeError(err) });
    return;
  }

  try {
    reply({ type: 'response', id, response: await serializeResponse(res) });
  } catch (error) {
    const readErr = toTransportError(toError(error), `error reading response body of ${request.method} ${request.url}`);
    reply({ type: 'error', id, error: await serializeError(readErr) });
  }
}

port.on('message', (message: unknown) => {
  handle(message).catch((error: unknown) => {
    const err = toError(error);
    const id = isWorkerMessage(message) ? message.id : WORKER_FAILURE_ID;
    reply({ type: 'error', id, error: { kind: 'error', name: err.name, message: err.message } });
  });
});
