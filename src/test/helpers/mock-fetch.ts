import { vi, type Mock } from 'vitest';
import type { FetchLike } from '../../types/config.js';

/**
 * A fetch spy with access to the recorded calls.
 */
export type MockFetch = Mock<FetchLike>;

/**
 * Creates a Response with a JSON body.
 */
export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Creates a fetch stand-in that answers each URL with the given handler.
 * Unknown URLs reject like an unreachable host.
 */
export function createMockFetch(
  routes: Record<string, (init?: RequestInit) => Response | Promise<Response>>
): MockFetch {
  return vi.fn<FetchLike>(async (input, init) => {
    const handler = routes[String(input)];
    if (!handler) {
      throw new TypeError('fetch failed');
    }
    return handler(init);
  });
}

/**
 * Returns the init of the nth recorded call.
 */
export function requestInit(fetchMock: MockFetch, index = 0): RequestInit {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  return call[1] ?? {};
}
