import { CancelledError, TimeoutError } from './errors.js';

export { TimeoutError };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when the outer signal aborts.
 * Rejects with TimeoutError or CancelledError instead of a bare AbortError.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  signal: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  if (signal?.aborted) throw new CancelledError();

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fn(controller.signal);
  } catch (err) {
    if (timedOut) throw new TimeoutError(timeoutMs);
    if (signal?.aborted) throw new CancelledError();
    throw err;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

export function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
  fetchImpl: FetchLike = fetch,
): Promise<Response> {
  return withTimeout(timeoutMs, signal, (s) => fetchImpl(url, { ...init, signal: s }));
}
