import { vi } from 'vitest';

export type FetchHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

/** Replace global fetch with a vi.fn routed through `handler` */
export function stubFetch(handler: FetchHandler) {
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    handler(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url, init)
  );
  vi.stubGlobal('fetch', mock);
  return mock;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** The URL of the nth fetch call */
export function calledUrl(mock: ReturnType<typeof stubFetch>, index = 0): URL {
  const call = mock.mock.calls[index];
  if (!call) throw new Error(`fetch was not called ${index + 1} time(s)`);
  const input = call[0];
  return new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
}
