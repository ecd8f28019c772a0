import { MessageChannel, type MessagePort, receiveMessageOnPort, Worker } from 'node:worker_threads';
import type { Response } from 'undici';
import { ConfigurationError } from '../error/configurationError.js';
import { ReadTimeoutError, TransportError } from '../error/transportError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import {
  deserializeError,
  deserializeResponse,
  isWorkerReply,
  WORKER_FAILURE_ID,
  type WorkerMessage,
  type WorkerReply,
} from './serialize.js';
import type { SyncWorkerData } from './syncWorker.js';
import type { FetchClientOptions, SyncFetchClientProviderDefinition, TransportRequest } from './types.js';

/** Extra time granted to the worker on top of the request timeout before giving up on a reply. */
const replyGraceMs = 5_000;

// From TypeScript sources the worker is loaded through tsx.
const runsFromSource = import.meta.url.endsWith('.ts');
const workerUrl = new URL(runsFromSource ? './syncWorker.ts' : './syncWorker.js', import.meta.url);

/**
 * Evaluated as the worker's entrypoint. A worker that fails to load posts the
 * failure and wakes the caller instead of dying with an unhandled error.
 */
const loaderSource = `
const { workerData } = require('node:worker_threads');
const ready = ${runsFromSource} ? import('tsx/esm/api').then((api) => api.register()) : Promise.resolve();
ready
  .then(() => import(${JSON.stringify(workerUrl.href)}))
  .catch((error) => {
    const failure = error instanceof Error ? error : new Error(String(error));
    workerData.port.postMessage({
      type: 'error',
      id: ${WORKER_FAILURE_ID},
      error: { kind: 'error', name: failure.name, message: failure.message },
    });
    Atomics.store(workerData.signal, 0, 1);
    Atomics.notify(workerData.signal, 0);
  });
`;

/**
 * Blocking transport for the synchronous Broker.
 *
 * Requests run on a dedicated worker thread through a {@link FetchClient}; the
 * calling thread sleeps on a shared flag until the reply is posted back, so
 * `request` returns a plain tuple instead of a promise. Responses are fully
 * buffered in the worker before they cross the thread boundary.
 */
export class SyncFetchClient implements SyncFetchClientProviderDefinition {
  #timeout: number | false;
  #worker: Worker;
  #port: MessagePort;
  #signal = new Int32Array(new SharedArrayBuffer(4));
  #nextId = 0;
  #closed = false;
  /** Set once the worker failed to load, crashed or exited; every later call fails with it. */
  #failure: TransportError | null = null;

  /** Spawns the worker; it is unref'd and never keeps the process alive by itself. */
  constructor({ timeout, proxy, clientOptions }: FetchClientOptions) {
    this.#timeout = timeout;

    const { port1, port2 } = new MessageChannel();
    const data: SyncWorkerData = { port: port2, signal: this.#signal, options: { timeout, proxy, clientOptions } };
    const [err, worker] = safeWrap(
      () => new Worker(loaderSource, { eval: true, workerData: data, transferList: [port2] }),
    );
    if (err) {
      port1.close();
      throw new ConfigurationError('error starting sync worker, clientOptions must be structured-cloneable', {
        cause: err,
      });
    }

    worker.on('error', (error) => {
      this.#fail(new TransportError('error sync worker crashed', { cause: error }));
    });
    worker.on('exit', (code) => {
      if (!this.#closed) {
        this.#fail(new TransportError(`error sync worker exited with code ${code}`));
      }
    });
    worker.unref();
    port1.unref();
    this.#worker = worker;
    this.#port = port1;
  }

  /**
   * Issues one HTTP call and blocks until it completes.
   *
   * Errors match {@link FetchClient}, rebuilt on this side of the thread boundary.
   */
  request(request: TransportRequest): SafeWrap<Error, Response> {
    if (this.#closed) {
      return [new Error('error cannot send a request, the client has been closed'), null];
    }
    if (this.#failure) {
      return [this.#failure, null];
    }

    const waitMs = this.#timeout === false ? Number.POSITIVE_INFINITY : this.#timeout + replyGraceMs;
    const [err, reply] = this.#call({ type: 'request', id: this.#nextId++, request }, waitMs);
    if (err) {
      return [err, null];
    }

    switch (reply.type) {
      case 'response':
        return [null, deserializeResponse(reply.response)];
      case 'error':
        return [deserializeError(reply.error), null];
      default:
        return [new Error(`error unexpected ${reply.type} reply from sync worker`), null];
    }
  }

  /**
   * Closes the worker's connection pools and lets the worker exit. Safe to call twice.
   */
  close(): void {
    if (this.#closed) {
      return;
    }

    this.#closed = true;
    const err = this.#failure ?? this.#call({ type: 'close', id: this.#nextId++ }, replyGraceMs)[0];
    this.#port.close();
    if (err) {
      this.#worker.terminate().catch((error: unknown) => {
        process.emitWarning(`sync worker did not terminate cleanly: ${String(error)}`);
      });
    }
  }

  /** Keeps the first failure; later ones are its consequences. */
  #fail(error: TransportError): void {
    if (!this.#failure) {
      this.#failure = error;
    }
  }

  /** Posts one message and sleeps until the reply with the same id arrives. */
  #call(message: WorkerMessage, waitMs: number): SafeWrap<Error, WorkerReply> {
    const [postErr] = safeWrap(() => this.#port.postMessage(message));
    if (postErr) {
      return [new TypeError('error request could not be handed to the sync worker', { cause: postErr }), null];
    }

    const deadline = Date.now() + waitMs;
    for (;;) {
      const received = receiveMessageOnPort(this.#port);
      if (received) {
        const reply: unknown = received.message;
        if (isWorkerReply(reply) && reply.type === 'error' && reply.id === WORKER_FAILURE_ID) {
          const failure = new TransportError('error sync worker failed', { cause: deserializeError(reply.error) });
          this.#fail(failure);
          return [failure, null];
        }

        // Replies to calls that already timed out are dropped.
        if (isWorkerReply(reply) && reply.id === message.id) {
          return [null, reply];
        }

        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return [new ReadTimeoutError(`error no reply from sync worker after ${waitMs}ms`), null];
      }

      Atomics.wait(this.#signal, 0, 0, remaining);
      Atomics.store(this.#signal, 0, 0);
    }
  }
}
