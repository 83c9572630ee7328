/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Retry + timeout + circuit breaker around one external call.
 *
 * A logical call makes up to `maxRetries + 1` sequential attempts, each
 * bounded by `timeoutMs`, with exponential backoff between them. The
 * breaker sees one outcome per logical call. Nothing here throws: the
 * outcome says what happened.
 */

import { debugLogger } from '../../utils/debugLogger.js';
import type { CircuitBreaker } from './circuitBreaker.js';
import {
  RetrievalCancelledError,
  callWithTimeout,
  computeBackoffMs,
  sleep as defaultSleep,
} from './retry.js';

export interface RetryPolicy {
  maxRetries: number;
  timeoutMs: number;
  backoffBaseMs: number;
}

export type ResilientCallOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | {
      ok: false;
      reason: 'circuit_open' | 'failed' | 'cancelled';
      attempts: number;
      error?: unknown;
    };

export interface ResilientCallerDeps {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  /** Name used in log lines */
  name?: string;
}

export class ResilientCaller {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly name: string;

  constructor(
    private readonly breaker: CircuitBreaker,
    private readonly policy: RetryPolicy,
    deps: ResilientCallerDeps = {},
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.name = deps.name ?? 'ResilientCaller';
  }

  async call<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<ResilientCallOutcome<T>> {
    if (signal?.aborted) {
      return { ok: false, reason: 'cancelled', attempts: 0 };
    }

    const permit = this.breaker.tryAcquire();
    if (permit === 'rejected') {
      debugLogger.warn(`${this.name}: Circuit open, skipping call`);
      return { ok: false, reason: 'circuit_open', attempts: 0 };
    }

    const maxAttempts = Math.max(0, Math.floor(this.policy.maxRetries)) + 1;
    let attempts = 0;
    let failedAttempt = false;
    let lastError: unknown;

    const cancelled = (): ResilientCallOutcome<T> => {
      // Only a definitive attempt outcome counts toward the breaker.
      if (failedAttempt) {
        this.breaker.recordFailure(permit);
      } else if (permit === 'probe') {
        this.breaker.releaseProbe();
      }
      debugLogger.log(`${this.name}: Cancelled after ${attempts} attempt(s)`);
      return { ok: false, reason: 'cancelled', attempts, error: lastError };
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = computeBackoffMs(
          attempt - 1,
          this.policy.backoffBaseMs,
          this.random,
        );
        try {
          await this.sleep(delay, signal);
        } catch (error) {
          if (error instanceof RetrievalCancelledError || signal?.aborted) {
            return cancelled();
          }
          lastError = error;
          break;
        }
      }
      if (signal?.aborted) {
        return cancelled();
      }

      attempts++;
      try {
        const value = await callWithTimeout(
          operation,
          this.policy.timeoutMs,
          signal,
        );
        this.breaker.recordSuccess(permit);
        return { ok: true, value, attempts };
      } catch (error) {
        if (error instanceof RetrievalCancelledError) {
          return cancelled();
        }
        failedAttempt = true;
        lastError = error;
        debugLogger.warn(
          `${this.name}: Attempt ${attempt}/${maxAttempts} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }

    this.breaker.recordFailure(permit);
    return { ok: false, reason: 'failed', attempts, error: lastError };
  }
}
