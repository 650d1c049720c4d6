/**
 * Async helpers shared by the pipeline stages.
 */

import { PipelineCancelledError, TimeoutError } from './errors';

/**
 * Wrap a promise with a timeout.
 *
 * A non-positive or missing timeout returns the promise as-is.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs?: number, context?: string): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Settle with the promise, or reject with `PipelineCancelledError` as soon
 * as the signal aborts. The underlying work is abandoned, not awaited.
 */
export async function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // The abandoned promise may still reject later
    promise.catch(() => undefined);
    throw new PipelineCancelledError();
  }

  let onAbort: (() => void) | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        onAbort = () => reject(new PipelineCancelledError());
        signal.addEventListener('abort', onAbort, { once: true });
      }),
    ]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Run an adapter call under a caller signal and a per-call timeout.
 *
 * The call receives a signal that aborts on either, so adapters that honour
 * it can stop their own I/O. The caller never waits past either limit.
 */
export async function callWithDeadline<T>(
  call: (signal: AbortSignal) => Promise<T>,
  options: { timeoutMs?: number; signal?: AbortSignal; context?: string }
): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;
  const forward = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    throw new PipelineCancelledError();
  }
  parent?.addEventListener('abort', forward, { once: true });

  try {
    const pending = call(controller.signal);
    return await raceAbort(withTimeout(pending, options.timeoutMs, options.context), parent);
  } catch (error) {
    controller.abort(error);
    throw error;
  } finally {
    parent?.removeEventListener('abort', forward);
  }
}

/**
 * Map items with at most `limit` mappers in flight. Results keep input order.
 */
export async function runWithConcurrency<T, U>(
  items: T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<U>
): Promise<U[]> {
  if (limit <= 1) {
    const results: U[] = [];
    for (let i = 0; i < items.length; i++) {
      results.push(await mapper(items[i], i));
    }
    return results;
  }

  const results = new Array<U>(items.length);
  let nextIndex = 0;

  const workers = new Array(Math.min(limit, items.length)).fill(0).map(async () => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await mapper(items[index], index);
    }
  });

  await Promise.all(workers);
  return results;
}
