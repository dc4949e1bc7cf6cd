/**
 * Error taxonomy for the Cloud AI client.
 *
 * Every failure surfaced by the client is a CloudAIError carrying one of a
 * closed set of kinds. Callers branch on `kind`; `message` is informational.
 */

export type CloudAIErrorKind =
  | 'transport_failure'
  | 'decode_failure'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'invalid_request'
  | 'server_error'
  | 'configuration_error'
  | 'cancelled';

export const DEFAULT_ERROR_MESSAGES: Readonly<Record<CloudAIErrorKind, string>> = {
  transport_failure: 'HTTP request failed',
  decode_failure: 'Response body could not be decoded',
  unauthorized: 'Authentication failed - invalid or expired token',
  forbidden: 'Access forbidden - domain not whitelisted or agent suspended',
  not_found: 'Resource not found',
  invalid_request: 'Bad request',
  server_error: 'Internal server error',
  configuration_error: 'Client configuration error',
  cancelled: 'Response was cancelled',
};

export interface CloudAIErrorOptions {
  /** HTTP status, when the error came from a response */
  status?: number;
  cause?: unknown;
}

export class CloudAIError extends Error {
  readonly kind: CloudAIErrorKind;
  readonly status?: number;

  constructor(kind: CloudAIErrorKind, message?: string, options: CloudAIErrorOptions = {}) {
    super(message ?? DEFAULT_ERROR_MESSAGES[kind], { cause: options.cause });
    this.name = 'CloudAIError';
    this.kind = kind;
    this.status = options.status;
  }
}

export function isCloudAIError(value: unknown, kind?: CloudAIErrorKind): value is CloudAIError {
  if (!(value instanceof CloudAIError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}

/**
 * Map a non-success HTTP status and optional body text to an error.
 *
 * Precedence: 401, 403, 404, 5xx, then everything else is an invalid request.
 * Blank body text counts as absent and yields the kind's default message.
 */
export function classifyStatus(status: number, message?: string | null): CloudAIError {
  const text = message !== undefined && message !== null && message.trim().length > 0
    ? message
    : undefined;

  if (status === 401) {
    return new CloudAIError('unauthorized', text, { status });
  }
  if (status === 403) {
    return new CloudAIError('forbidden', text, { status });
  }
  if (status === 404) {
    return new CloudAIError('not_found', text, { status });
  }
  if (status >= 500 && status <= 599) {
    return new CloudAIError('server_error', text, { status });
  }
  return new CloudAIError('invalid_request', text, { status });
}
