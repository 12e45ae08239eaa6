import type { HttpTransport } from '../types';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Adapts a fetch implementation to the HttpTransport seam.
 *
 * Every status resolves; only network failures and aborts reject. Response
 * header names come back lower-cased, as `Headers` iterates them.
 */
export function createFetchTransport(fetchFn: FetchFn = (url, init) => fetch(url, init)): HttpTransport {
  return async ({ method, url, headers, body }, signal) => {
    const response = await fetchFn(url, { method, headers: { ...headers }, body, signal });
    return {
      status: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      body: await response.arrayBuffer(),
    };
  };
}

/** Transport over the global fetch. */
export const fetchTransport: HttpTransport = createFetchTransport();
