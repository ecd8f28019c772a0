import {
  ConnectError,
  ReadTimeoutError,
  RemoteProtocolError,
  TransportError,
  WriteError,
} from '../error/transportError.js';
import type { BasicAuth, HeaderMap, RequestBody } from './types.js';

function hasHeader(headers: HeaderMap, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

/**
 * Adds the headers implied by the body and auth: a `Content-Type` unless one is
 * already set, and a Basic `Authorization` header.
 */
export function buildHeaders(headers: HeaderMap, body?: RequestBody, auth?: BasicAuth): HeaderMap {
  const result = { ...headers };

  if (body && !hasHeader(result, 'content-type')) {
    result['Content-Type'] = 'json' in body ? 'application/json' : 'application/x-www-form-urlencoded';
  }

  if (auth) {
    result.Authorization = `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
  }

  return result;
}

/**
 * Serializes a request body; form fields set to `null`/`undefined` are left out.
 */
export function encodeBody(body?: RequestBody): string | undefined {
  if (!body) {
    return undefined;
  }

  if ('json' in body) {
    return JSON.stringify(body.json);
  }

  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(body.form)) {
    if (value !== undefined && value !== null) {
      form.append(key, String(value));
    }
  }

  return form.toString();
}

const connectCodes = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]);
const readTimeoutCodes = new Set(['ETIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);
const writeCodes = new Set(['EPIPE', 'UND_ERR_REQ_CONTENT_LENGTH_MISMATCH']);
const protocolCodes = new Set([
  'ECONNRESET',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'UND_ERR_RES_CONTENT_LENGTH_MISMATCH',
]);

/** First string `code` found along the cause chain. */
function findCode(error: unknown): string | undefined {
  let current = error;
  while (current instanceof Error) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }

    current = current.cause;
  }

  return undefined;
}

/**
 * Maps a failed `fetch` (undici reports `TypeError: fetch failed` with a coded
 * cause) onto the transport error classes the retry predicate understands.
 */
export function toTransportError(error: Error, message: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  const code = findCode(error);
  const opts = { cause: error, code };
  if (code === undefined) {
    return new TransportError(message, opts);
  }

  if (connectCodes.has(code)) {
    return new ConnectError(message, opts);
  }

  if (readTimeoutCodes.has(code)) {
    return new ReadTimeoutError(message, opts);
  }

  if (writeCodes.has(code)) {
    return new WriteError(message, opts);
  }

  if (protocolCodes.has(code) || code.startsWith('HPE_')) {
    return new RemoteProtocolError(message, opts);
  }

  return new TransportError(message, opts);
}
