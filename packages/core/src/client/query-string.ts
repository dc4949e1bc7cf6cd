import { CloudAIError } from '../errors.js';

type Scalar = string | number | boolean;

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function encodePair(key: string, value: Scalar): string {
  return `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`;
}

/**
 * Encode a query object as `a=1&b=2`, keys sorted for a stable result.
 *
 * Undefined and null entries are skipped. Arrays repeat the key once per value
 * (`include=a&include=b`). Nested objects cannot be expressed and are rejected.
 */
export function encodeQuery(query: object): string {
  const pairs: string[] = [];
  const entries: Array<[string, unknown]> = Object.entries(query);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  for (const [key, value] of entries) {
    if (value === undefined || value === null) {
      continue;
    }
    if (isScalar(value)) {
      pairs.push(encodePair(key, value));
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        if (!isScalar(item)) {
          throw new CloudAIError('invalid_request', `Query parameter '${key}' must contain only scalar values`);
        }
        pairs.push(encodePair(key, item));
      }
      continue;
    }
    throw new CloudAIError('invalid_request', `Query parameter '${key}' cannot be encoded`);
  }

  return pairs.join('&');
}

/**
 * Join base URL, path and an optional query. An empty query adds no `?`.
 */
export function buildUrl(baseUrl: string, path: string, query?: object): string {
  const url = `${baseUrl}${path}`;
  if (!query) {
    return url;
  }
  const qs = encodeQuery(query);
  return qs ? `${url}?${qs}` : url;
}
