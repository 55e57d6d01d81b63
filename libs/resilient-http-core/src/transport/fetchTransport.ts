import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchTransportOptions {
  /** Defaults to the global `fetch`, looked up on every call. */
  fetchImpl?: FetchLike;
}

function headersToRecord(headers: Headers): HttpHeaders {
  const record: HttpHeaders = {};
  // fetch lower-cases header names
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/**
 * Transport over a fetch implementation. Pass `fetchImpl` to route requests
 * through a proxy-aware or instrumented fetch.
 */
export function createFetchTransport(opts: FetchTransportOptions = {}): HttpTransport {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const fetchImpl: FetchLike = opts.fetchImpl ?? fetch;
    const response = await fetchImpl(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
    });

    return {
      status: response.status,
      headers: headersToRecord(response.headers),
      body: await response.arrayBuffer(),
    };
  };
}

export const fetchTransport: HttpTransport = createFetchTransport();
