/**
 * Fetch stand-ins for tests. Nothing here touches the network.
 */
import type { FetchFn } from '../core/transport.js';

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

export type RouteHandler = (url: URL) => unknown;

/**
 * A fetch that answers every request from `handler`. A returned Response is
 * passed through; anything else is sent as JSON.
 */
export function routedFetch(handler: RouteHandler): FetchFn {
  return (input) => {
    const result = handler(new URL(input));
    return Promise.resolve(result instanceof Response ? result : jsonResponse(result));
  };
}

export function isQuery(url: URL, flag: 'returnCountOnly' | 'returnIdsOnly'): boolean {
  return url.pathname.endsWith('/query') && url.searchParams.get(flag) === 'true';
}
