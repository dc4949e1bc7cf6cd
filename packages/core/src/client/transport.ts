/**
 * Transport capability consumed by the dispatcher: send one request, get a
 * status and a body. Connection pooling and TLS belong to the implementation.
 */

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Aborts when the per-call timeout elapses */
  signal: AbortSignal;
}

export interface TransportResponse {
  status: number;
  text(): Promise<string>;
}

export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

/**
 * Transport backed by the global fetch (undici on Node.js). Safe to share
 * across concurrent calls.
 */
export function createFetchTransport(fetchImpl: typeof fetch = fetch): Transport {
  return async (request: TransportRequest): Promise<TransportResponse> => {
    const res = await fetchImpl(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.signal,
    });
    return {
      status: res.status,
      text: () => res.text(),
    };
  };
}
