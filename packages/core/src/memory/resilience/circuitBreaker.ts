/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Circuit breaker for the vector store.
 *
 * ```
 * closed ──(failureLimit consecutive failures)──▶ open
 * open ──(openDurationSec elapsed)──▶ half-open
 * half-open ──(probe succeeds)──▶ closed
 * half-open ──(probe fails)──▶ open (timer restarts)
 * ```
 *
 * Failures are counted per logical call, not per attempt. In half-open
 * exactly one probe is admitted; everyone else is rejected as if the
 * circuit were still open. All transitions happen synchronously, so no two
 * callers can observe a half-finished state change.
 */

import { debugLogger } from '../../utils/debugLogger.js';
import type { CircuitState } from '../types.js';

export interface CircuitBreakerOptions {
  failureLimit: number;
  openDurationSec: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
  /** Name used in log lines */
  name?: string;
}

/**
 * Outcome of asking the breaker for permission to call.
 * - 'allowed': closed, call normally
 * - 'probe': half-open, this caller holds the single probe slot
 * - 'rejected': open, or half-open with a probe already in flight
 */
export type BreakerPermit = 'allowed' | 'probe' | 'rejected';

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  failureLimit: number;
  openDurationSec: number;
}

export class CircuitBreaker {
  private readonly failureLimit: number;
  private readonly openDurationMs: number;
  private readonly now: () => number;
  private readonly name: string;
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private openedAt: number | undefined;
  private probeInFlight = false;

  constructor(options: CircuitBreakerOptions) {
    this.failureLimit = Math.max(1, options.failureLimit);
    this.openDurationMs = Math.max(0, options.openDurationSec) * 1000;
    this.now = options.now ?? Date.now;
    this.name = options.name ?? 'CircuitBreaker';
  }

  /**
   * Ask to make a call. A caller granted 'probe' must finish with
   * recordSuccess(), recordFailure() or releaseProbe().
   */
  tryAcquire(): BreakerPermit {
    if (this.state === 'open') {
      if (!this.openWindowElapsed()) {
        return 'rejected';
      }
      this.state = 'half-open';
      this.probeInFlight = false;
      debugLogger.log(`${this.name}: Open window elapsed, half-open`);
    }

    if (this.state === 'half-open') {
      if (this.probeInFlight) {
        return 'rejected';
      }
      this.probeInFlight = true;
      return 'probe';
    }

    return 'allowed';
  }

  /**
   * Record a completed call. While the breaker is open or half-open only
   * the probe's outcome counts; calls admitted earlier are ignored.
   */
  recordSuccess(permit: Exclude<BreakerPermit, 'rejected'> = 'allowed'): void {
    if (this.isStale(permit)) {
      return;
    }
    if (this.state !== 'closed') {
      debugLogger.log(`${this.name}: Closed after successful probe`);
    }
    this.state = 'closed';
    this.consecutiveFailures = 0;
    this.openedAt = undefined;
    this.probeInFlight = false;
  }

  recordFailure(permit: Exclude<BreakerPermit, 'rejected'> = 'allowed'): void {
    if (this.isStale(permit)) {
      return;
    }
    this.consecutiveFailures++;

    if (this.state === 'half-open') {
      this.trip('probe failed');
      return;
    }
    if (this.state === 'closed' && this.consecutiveFailures >= this.failureLimit) {
      this.trip(`${this.consecutiveFailures} consecutive failures`);
    }
  }

  /**
   * Give back a probe slot without recording an outcome (the probe was
   * cancelled before it completed).
   */
  releaseProbe(): void {
    if (this.state === 'half-open') {
      this.probeInFlight = false;
    }
  }

  /**
   * Effective state: an open breaker whose window has elapsed reports
   * half-open even before the next caller moves it there.
   */
  getState(): CircuitState {
    if (this.state === 'open' && this.openWindowElapsed()) {
      return 'half-open';
    }
    return this.state;
  }

  isOpen(): boolean {
    return this.getState() === 'open';
  }

  getSnapshot(): CircuitBreakerSnapshot {
    return {
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      failureLimit: this.failureLimit,
      openDurationSec: this.openDurationMs / 1000,
    };
  }

  private trip(why: string): void {
    this.state = 'open';
    this.openedAt = this.now();
    this.probeInFlight = false;
    debugLogger.warn(
      `${this.name}: Opened (${why}), failing fast for ${this.openDurationMs / 1000}s`,
    );
  }

  private isStale(permit: BreakerPermit): boolean {
    if (this.state === 'closed') {
      return false;
    }
    return !(this.state === 'half-open' && permit === 'probe' && this.probeInFlight);
  }

  private openWindowElapsed(): boolean {
    return (
      this.openedAt === undefined ||
      this.now() - this.openedAt >= this.openDurationMs
    );
  }
}
