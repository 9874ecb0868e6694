/**
 * Remote fetch timeout
 */

import { RemoteFetchTimeoutError } from '../errors';

/**
 * Run a remote call with an abort signal and a time budget.
 * The signal is aborted and a RemoteFetchTimeoutError raised when the
 * budget runs out; the timer is cleared on settle to prevent leaks.
 */
export async function withFetchTimeout<T>(
  uri: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new RemoteFetchTimeoutError(uri, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
