import { vi } from 'vitest';

/**
 * A fetch stand-in that routes by URL to canned handlers.
 * Handlers return a Response, throw to simulate a transport failure,
 * or never settle (see `hangingResponse`).
 */
export type RouteHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain' } });
}

export function connectionRefused(): never {
  throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:8081') });
}

/**
 * Never resolves unless the request is aborted, like a host that
 * accepted the connection and then stopped answering
 */
export function hangingResponse(_url: string, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
    });
  });
}

export function createMockFetch(routes: Record<string, RouteHandler>) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const handler = routes[url];
    if (!handler) {
      connectionRefused();
    }
    return handler(url, init);
  });
}
