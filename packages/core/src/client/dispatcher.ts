/**
 * Request dispatcher shared by every endpoint group.
 *
 * Builds the URL, attaches auth and tracing headers, sends through the
 * configured transport, and turns the result into a typed value or a
 * CloudAIError. Sending (and reading the body that belongs to it) is the only
 * await; everything else is synchronous. Nothing is retried.
 */

import { CloudAIError, classifyStatus } from '../errors.js';
import type { Decoder } from '../codec/decoders.js';
import { generateRequestId } from '../utils/ids.js';
import { CLIENT_SOURCE, CLIENT_SOURCE_HEADER, authHeader, type ClientConfig } from './config.js';
import { buildUrl } from './query-string.js';
import type { HttpMethod, TransportResponse } from './transport.js';

export interface DispatchRequest {
  method: HttpMethod;
  /** Path appended to the base URL, starting with `/` */
  path: string;
  /** Attach the bearer token */
  auth: boolean;
  /** JSON-encoded when present */
  body?: unknown;
  query?: object;
  /** Extra headers; cannot replace the auth or client headers */
  headers?: Record<string, string>;
}

interface RawResponse {
  status: number;
  response: TransportResponse;
  requestId: string;
  startedAt: number;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status <= 299;
}

function lowercaseKeys(headers: Record<string, string> = {}): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]));
}

function buildHeaders(config: ClientConfig, request: DispatchRequest, requestId: string): Record<string, string> {
  const headers: Record<string, string> = {
    accept: 'application/json',
    ...lowercaseKeys(request.headers),
    [CLIENT_SOURCE_HEADER]: CLIENT_SOURCE,
    'x-request-id': requestId,
  };
  if (request.body !== undefined) {
    headers['content-type'] = 'application/json';
  }
  if (request.auth) {
    headers.authorization = authHeader(config);
  }
  return headers;
}

function logDebug(config: ClientConfig, message: string): void {
  if (config.debug) {
    console.debug(`[cloud-ai] ${message}`);
  }
}

function logWarn(config: ClientConfig, message: string): void {
  if (config.debug) {
    console.warn(`[cloud-ai] ${message}`);
  }
}

async function send(config: ClientConfig, request: DispatchRequest): Promise<RawResponse> {
  const url = buildUrl(config.baseUrl, request.path, request.query);
  const requestId = generateRequestId('req');
  const headers = buildHeaders(config, request, requestId);
  const body = request.body === undefined ? undefined : JSON.stringify(request.body);
  const signal = AbortSignal.timeout(config.timeoutMs);
  const startedAt = Date.now();

  try {
    const response = await config.transport({ method: request.method, url, headers, body, signal });
    return { status: response.status, response, requestId, startedAt };
  } catch (err) {
    if (signal.aborted) {
      logWarn(config, `${request.method} ${request.path} timed out after ${config.timeoutMs}ms [${requestId}]`);
      throw new CloudAIError('transport_failure', `Request timed out after ${config.timeoutMs}ms`, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    logWarn(config, `${request.method} ${request.path} failed: ${reason} [${requestId}]`);
    throw new CloudAIError('transport_failure', `HTTP request failed: ${reason}`, { cause: err });
  }
}

/**
 * Read the body of a success response. A failure here happened while
 * receiving, so it is a transport failure rather than a decode failure.
 */
async function readSuccessBody(raw: RawResponse): Promise<string> {
  try {
    return await raw.response.text();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CloudAIError('transport_failure', `Failed to read response body: ${reason}`, { cause: err });
  }
}

/**
 * Best-effort read of an error body. A failed read means "no message".
 */
async function readErrorBody(raw: RawResponse): Promise<string | undefined> {
  try {
    return await raw.response.text();
  } catch {
    return undefined;
  }
}

async function failFromStatus(config: ClientConfig, request: DispatchRequest, raw: RawResponse): Promise<never> {
  const text = await readErrorBody(raw);
  logDebug(config, `${request.method} ${request.path} -> ${raw.status} (${Date.now() - raw.startedAt}ms) [${raw.requestId}]`);
  throw classifyStatus(raw.status, text);
}

/**
 * Send a request and decode the JSON success body.
 */
export async function dispatch<T>(config: ClientConfig, request: DispatchRequest, decode: Decoder<T>): Promise<T> {
  const raw = await send(config, request);
  if (!isSuccess(raw.status)) {
    return failFromStatus(config, request, raw);
  }

  const text = await readSuccessBody(raw);
  logDebug(config, `${request.method} ${request.path} -> ${raw.status} (${Date.now() - raw.startedAt}ms) [${raw.requestId}]`);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new CloudAIError('decode_failure', `Response body is not valid JSON (status ${raw.status})`, { cause: err, status: raw.status });
  }

  try {
    return decode(parsed);
  } catch (err) {
    if (err instanceof CloudAIError) {
      logWarn(config, `${request.method} ${request.path} decode failed: ${err.message} [${raw.requestId}]`);
      throw err;
    }
    throw new CloudAIError('decode_failure', err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/**
 * Send a request whose success body is plain text (embed code).
 */
export async function dispatchText(config: ClientConfig, request: DispatchRequest): Promise<string> {
  const raw = await send(config, request);
  if (!isSuccess(raw.status)) {
    return failFromStatus(config, request, raw);
  }
  const text = await readSuccessBody(raw);
  logDebug(config, `${request.method} ${request.path} -> ${raw.status} (${Date.now() - raw.startedAt}ms) [${raw.requestId}]`);
  return text;
}

/**
 * Send a request whose success carries no body (e.g. 204). Any 2xx body is
 * ignored.
 */
export async function dispatchEmpty(config: ClientConfig, request: DispatchRequest): Promise<void> {
  const raw = await send(config, request);
  if (!isSuccess(raw.status)) {
    return failFromStatus(config, request, raw);
  }
  logDebug(config, `${request.method} ${request.path} -> ${raw.status} (${Date.now() - raw.startedAt}ms) [${raw.requestId}]`);
}
