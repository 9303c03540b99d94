import type { FetchLike } from '../types/config.js';

/**
 * Error raised when a deadline passes. Named like the one `AbortSignal.timeout` raises.
 */
function createTimeoutError(phase: 'response' | 'body', timeoutMs: number): Error {
  const error = new Error(`No ${phase} received within ${timeoutMs}ms`);
  error.name = 'TimeoutError';
  return error;
}

/**
 * Wrap a response so that reading its body fails once `timeoutMs` passes.
 * The deadline starts when the response headers arrive.
 */
function limitBodyRead(
  response: Response,
  timeoutMs: number,
  abort: (reason: Error) => void
): Response {
  const source = response.body;
  if (!source) {
    return response;
  }

  const reader = source.getReader();
  let timer: NodeJS.Timeout | undefined;
  let expired = false;

  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      timer = setTimeout(() => {
        expired = true;
        const error = createTimeoutError('body', timeoutMs);
        controller.error(error);
        abort(error);
      }, timeoutMs);
    },
    async pull(controller) {
      const chunk = await reader.read();
      if (expired) {
        return;
      }
      if (chunk.done) {
        clearTimeout(timer);
        controller.close();
        return;
      }
      controller.enqueue(chunk.value);
    },
    cancel(reason) {
      clearTimeout(timer);
      return reader.cancel(reason);
    },
  });

  return new Response(body, {
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
  });
}

/**
 * Wrap a fetch function with two deadlines of `timeoutMs` each: one for the
 * response headers, then a fresh one for reading the body.
 *
 * An abort of the caller's own signal still cancels the request.
 *
 * @example
 * ```typescript
 * configuration[client.customFetch] = withDeadlines(fetch, 10_000);
 * ```
 */
export function withDeadlines(fetchFn: FetchLike, timeoutMs: number): FetchLike {
  return async (input, init) => {
    const controller = new AbortController();
    const upstream = init?.signal;
    if (upstream) {
      upstream.addEventListener('abort', () => controller.abort(upstream.reason), { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const headersDeadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = createTimeoutError('response', timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      const response = await Promise.race([
        fetchFn(input, { ...init, signal: controller.signal }),
        headersDeadline,
      ]);
      return limitBodyRead(response, timeoutMs, (reason) => controller.abort(reason));
    } finally {
      clearTimeout(timer);
    }
  };
}
