/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Resilient access to the vector store.
 *
 * `fetch()` never throws. Timeouts, connection errors, malformed responses
 * and an open circuit all come back as an empty candidate list with a
 * reason, so callers treat "no candidates" as a valid, low-confidence
 * outcome.
 */

import { debugLogger } from '../../utils/debugLogger.js';
import type { ResilienceConfig } from '../config.js';
import { normalizeCandidates } from '../normalize.js';
import type { StoreClient } from '../store/store.js';
import type { Candidate, CircuitState } from '../types.js';
import { CircuitBreaker } from './circuitBreaker.js';
import { ResilientCaller, type ResilientCallerDeps } from './resilientCall.js';

/**
 * The store answered with something other than a list of hits.
 */
export class MalformedStoreResponseError extends Error {
  constructor(received: string) {
    super(`Malformed store response: expected an array, got ${received}`);
    this.name = 'MalformedStoreResponseError';
  }
}

export type FetchReason = 'ok' | 'circuit_open' | 'store_unavailable' | 'cancelled';

export interface FetchOutcome {
  candidates: Candidate[];
  reason: FetchReason;
  /** Physical store calls made */
  attempts: number;
  /** Hits dropped during normalization */
  dropped: number;
  breakerState: CircuitState;
}

export interface ResilientStoreDeps extends ResilientCallerDeps {
  /** Clock for the circuit breaker, in milliseconds */
  now?: () => number;
}

export class ResilientStore {
  private readonly breaker: CircuitBreaker;
  private readonly caller: ResilientCaller;

  constructor(
    private readonly client: StoreClient,
    config: ResilienceConfig,
    deps: ResilientStoreDeps = {},
  ) {
    this.breaker = new CircuitBreaker({
      failureLimit: config.failureLimit,
      openDurationSec: config.openDurationSec,
      now: deps.now,
      name: 'ResilientStore breaker',
    });
    this.caller = new ResilientCaller(this.breaker, config, {
      sleep: deps.sleep,
      random: deps.random,
      name: 'ResilientStore',
    });
  }

  getBreaker(): CircuitBreaker {
    return this.breaker;
  }

  /**
   * Fetch up to `topK` candidates for a query vector.
   */
  async fetch(
    queryVector: number[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<FetchOutcome> {
    const outcome = await this.caller.call(async (attemptSignal) => {
      const response: unknown = await this.client.search(queryVector, {
        topK,
        signal: attemptSignal,
      });
      if (!Array.isArray(response)) {
        throw new MalformedStoreResponseError(
          response === null ? 'null' : typeof response,
        );
      }
      const hits: unknown[] = response;
      return hits;
    }, signal);

    const breakerState = this.breaker.getState();

    if (!outcome.ok) {
      return {
        candidates: [],
        reason:
          outcome.reason === 'failed' ? 'store_unavailable' : outcome.reason,
        attempts: outcome.attempts,
        dropped: 0,
        breakerState,
      };
    }

    const { candidates, dropped } = normalizeCandidates(outcome.value);
    if (dropped > 0) {
      debugLogger.warn(
        `ResilientStore: Dropped ${dropped} malformed hit(s) without an id`,
      );
    }
    debugLogger.log(
      `ResilientStore: Fetched ${candidates.length} candidates in ${outcome.attempts} attempt(s)`,
    );

    return {
      candidates,
      reason: 'ok',
      attempts: outcome.attempts,
      dropped,
      breakerState,
    };
  }
}
