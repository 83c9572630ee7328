/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Timeout, backoff and cancellation helpers.
 */

const JITTER_RATIO = 0.25;

/**
 * A single physical call exceeded its time budget.
 */
export class StoreTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Store call timed out after ${timeoutMs}ms`);
    this.name = 'StoreTimeoutError';
  }
}

/**
 * The caller aborted while a call or a backoff sleep was pending.
 */
export class RetrievalCancelledError extends Error {
  constructor() {
    super('Retrieval cancelled');
    this.name = 'RetrievalCancelledError';
  }
}

/**
 * Delay before retry number `retry` (1-based):
 * `base * 2^(retry-1)` plus up to 25% jitter.
 */
export function computeBackoffMs(
  retry: number,
  baseMs: number,
  random: () => number = Math.random,
): number {
  const delay = baseMs * 2 ** Math.max(0, retry - 1);
  return delay + delay * JITTER_RATIO * random();
}

/**
 * Sleep that rejects with RetrievalCancelledError as soon as `signal`
 * aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetrievalCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RetrievalCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Combine multiple abort signals into one.
 */
export function combineSignals(
  ...signals: Array<AbortSignal | undefined>
): AbortSignal {
  const controller = new AbortController();

  for (const signal of signals) {
    if (!signal) {
      continue;
    }
    if (signal.aborted) {
      controller.abort();
      return controller.signal;
    }
    signal.addEventListener('abort', () => controller.abort(), {
      once: true,
    });
  }

  return controller.signal;
}

/**
 * Run `operation` with a per-call timeout.
 *
 * The operation receives a signal that aborts on timeout or when the
 * caller aborts. The returned promise settles at that point even if the
 * operation ignores its signal.
 *
 * @throws StoreTimeoutError on timeout
 * @throws RetrievalCancelledError if `signal` aborts first
 */
export async function callWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    throw new RetrievalCancelledError();
  }

  const timeoutController = new AbortController();
  const timeoutId = setTimeout(() => timeoutController.abort(), timeoutMs);
  const combinedSignal = combineSignals(timeoutController.signal, signal);

  const aborted = new Promise<never>((_, reject) => {
    combinedSignal.addEventListener(
      'abort',
      () =>
        reject(
          signal?.aborted
            ? new RetrievalCancelledError()
            : new StoreTimeoutError(timeoutMs),
        ),
      { once: true },
    );
  });

  try {
    return await Promise.race([operation(combinedSignal), aborted]);
  } catch (error) {
    if (signal?.aborted) {
      throw new RetrievalCancelledError();
    }
    if (timeoutController.signal.aborted) {
      throw new StoreTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
