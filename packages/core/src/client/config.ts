/**
 * Client configuration: base URL, bearer token, timeout and transport.
 *
 * A ClientConfig is validated and frozen when built, then shared read-only by
 * every endpoint call. Shape errors are raised here, before any request.
 */

import { CloudAIError } from '../errors.js';
import { createFetchTransport, type Transport } from './transport.js';

export const DEFAULT_BASE_URL = 'https://agent.timeweb.cloud';
export const DEFAULT_TIMEOUT_MS = 120_000;

/** Sent on every request so the service can identify this client */
export const CLIENT_SOURCE_HEADER = 'x-proxy-source';
export const CLIENT_SOURCE = 'cloud-agents-ts';

export interface ClientOptions {
  /** Bearer token. Required. */
  token?: string;
  /** Default: https://agent.timeweb.cloud */
  baseUrl?: string;
  /** Total duration allowed per call. Default: 120000 */
  timeoutMs?: number;
  /** Default: global fetch */
  transport?: Transport;
  /** Log each request through console.debug */
  debug?: boolean;
}

export interface ClientConfig {
  readonly baseUrl: string;
  readonly token: string;
  readonly timeoutMs: number;
  readonly transport: Transport;
  readonly debug: boolean;
}

function normalizeBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim().replace(/\/+$/, '');
  if (trimmed.length === 0) {
    throw new CloudAIError('configuration_error', 'Base URL is required');
  }
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch (err) {
    throw new CloudAIError('configuration_error', `Base URL is not a valid URL: ${baseUrl}`, { cause: err });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new CloudAIError('configuration_error', `Base URL must use http or https: ${baseUrl}`);
  }
  return trimmed;
}

export function createClientConfig(options: ClientOptions): ClientConfig {
  const token = options.token?.trim();
  if (!token) {
    throw new CloudAIError('configuration_error', 'Token is required');
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new CloudAIError('configuration_error', `Timeout must be a positive number of milliseconds, got ${timeoutMs}`);
  }

  return Object.freeze({
    baseUrl: normalizeBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL),
    token,
    timeoutMs,
    transport: options.transport ?? createFetchTransport(),
    debug: options.debug ?? false,
  });
}

export function authHeader(config: ClientConfig): string {
  return `Bearer ${config.token}`;
}

/**
 * Read client options from the environment:
 * CLOUD_AI_API_TOKEN (required), CLOUD_AI_BASE_URL, CLOUD_AI_TIMEOUT_MS.
 */
export function clientOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  const token = env.CLOUD_AI_API_TOKEN;
  if (!token) {
    throw new CloudAIError('configuration_error', 'CLOUD_AI_API_TOKEN environment variable not set');
  }

  const options: ClientOptions = { token };
  if (env.CLOUD_AI_BASE_URL) {
    options.baseUrl = env.CLOUD_AI_BASE_URL;
  }
  if (env.CLOUD_AI_TIMEOUT_MS) {
    const timeoutMs = Number(env.CLOUD_AI_TIMEOUT_MS);
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new CloudAIError('configuration_error', `CLOUD_AI_TIMEOUT_MS must be a positive number, got '${env.CLOUD_AI_TIMEOUT_MS}'`);
    }
    options.timeoutMs = timeoutMs;
  }
  return options;
}
