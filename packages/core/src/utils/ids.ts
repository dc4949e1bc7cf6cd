/**
 * Generate a request ID for the `x-request-id` tracing header.
 *
 * Format: `${prefix}-${Date.now()}-${random}`, so IDs sort roughly by time
 * and can be matched against server logs.
 *
 * @param prefix - Short tag for the caller, e.g. "req"
 */
export function generateRequestId(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`;
}
