import { Response } from 'undici';
import { HTTPError } from '../error/httpError.js';
import {
  ConnectError,
  PoolTimeoutError,
  ReadTimeoutError,
  RemoteProtocolError,
  TransportError,
  WriteError,
} from '../error/transportError.js';
import type { TransportRequest } from './types.js';

/** Response data that survives structured cloning into another thread. */
export interface SerializedResponse {
  status: number;
  statusText: string;
  headers: [string, string][];
  body: Uint8Array | null;
}

const transportErrors = {
  TransportError,
  ConnectError,
  ReadTimeoutError,
  WriteError,
  RemoteProtocolError,
  PoolTimeoutError,
} as const;

type TransportErrorName = keyof typeof transportErrors;

function isTransportErrorName(name: string): name is TransportErrorName {
  return Object.hasOwn(transportErrors, name);
}

/** Error data that survives structured cloning; rebuilt into the matching class on the other side. */
export type SerializedError =
  | { kind: 'http'; message: string; response: SerializedResponse }
  | { kind: 'transport'; name: TransportErrorName; message: string; code?: string }
  | { kind: 'error'; name: string; message: string };

/** Statuses whose responses must not carry a body. */
const nullBodyStatuses = new Set([101, 103, 204, 205, 304]);

/**
 * Buffers a response so it can be posted across threads.
 */
export async function serializeResponse(res: Response): Promise<SerializedResponse> {
  const body = nullBodyStatuses.has(res.status) ? null : new Uint8Array(await res.arrayBuffer());

  return {
    status: res.status,
    statusText: res.statusText,
    headers: [...res.headers],
    body,
  };
}

/**
 * Rebuilds a {@link Response} from its buffered form.
 */
export function deserializeResponse({ status, statusText, headers, body }: SerializedResponse): Response {
  return new Response(nullBodyStatuses.has(status) ? null : body, { status, statusText, headers });
}

/**
 * Flattens an error for posting across threads. HTTP errors carry their
 * buffered response, transport errors their class and code.
 */
export async function serializeError(error: Error): Promise<SerializedError> {
  if (error instanceof HTTPError) {
    return { kind: 'http', message: error.message, response: await serializeResponse(error.response) };
  }

  if (error instanceof TransportError) {
    return {
      kind: 'transport',
      name: isTransportErrorName(error.name) ? error.name : 'TransportError',
      message: error.message,
      code: error.code,
    };
  }

  return { kind: 'error', name: error.name, message: error.message };
}

/**
 * Rebuilds an error posted by {@link serializeError}.
 */
export function deserializeError(error: SerializedError): Error {
  switch (error.kind) {
    case 'http':
      return new HTTPError(deserializeResponse(error.response), error.message);
    case 'transport': {
      const ErrorClass = transportErrors[error.name];
      return new ErrorClass(error.message, { code: error.code });
    }
    case 'error': {
      const err = new Error(error.message);
      err.name = error.name;
      return err;
    }
  }
}

/** Reply id for failures that belong to no call, such as the worker failing to load. */
export const WORKER_FAILURE_ID = -1;

/** Messages the blocking client posts to its worker. */
export type WorkerMessage = { type: 'request'; id: number; request: TransportRequest } | { type: 'close'; id: number };

/** Replies the worker posts back, tagged with the id of the message they answer. */
export type WorkerReply =
  | { type: 'response'; id: number; response: SerializedResponse }
  | { type: 'error'; id: number; error: SerializedError }
  | { type: 'closed'; id: number };

function isTagged(value: unknown): value is { type: unknown; id: unknown } {
  return typeof value === 'object' && value !== null && 'type' in value && 'id' in value;
}

/** Type guard for {@link WorkerMessage}. */
export function isWorkerMessage(value: unknown): value is WorkerMessage {
  if (!isTagged(value) || typeof value.id !== 'number') {
    return false;
  }

  return value.type === 'close' || (value.type === 'request' && 'request' in value);
}

/** Type guard for {@link WorkerReply}. */
export function isWorkerReply(value: unknown): value is WorkerReply {
  if (!isTagged(value) || typeof value.id !== 'number') {
    return false;
  }

  switch (value.type) {
    case 'response':
      return 'response' in value;
    case 'error':
      return 'error' in value;
    case 'closed':
      return true;
    default:
      return false;
  }
}
