/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Slow learning step over the arbitration profile.
 *
 * Runs separately from retrieval, at most once per `minIntervalSec`:
 *
 * 1. Aggregate the trailing window of outcomes (`ArbitrationSignalLog`)
 * 2. `proposeDelta`: a zero-sum nudge towards classes that were kept,
 *    useful and reinforced, and away from uncertain or contradicted ones
 * 3. `applyDelta`: clamp, damp, floor, renormalize, then shrink the step
 *    so no class moves by more than `maxShift`
 * 4. Install the result in the `ArbitrationProfileStore` (unless
 *    `observeOnly`)
 */

import { debugLogger } from '../../utils/debugLogger.js';
import type { LearningConfig } from '../config.js';
import { clamp } from '../vectors.js';
import { PROVENANCE_CLASSES, type ArbitrationProfile } from '../types.js';
import type { ArbitrationProfileStore } from './profileStore.js';
import {
  mapClasses,
  projectAboveFloor,
  type ClassWeights,
} from './provenance.js';
import type {
  ArbitrationSignalLog,
  ArbitrationSignals,
  ClassSignals,
} from './signals.js';

/** Scale from signal score differences to a proposed delta */
export const PROPOSAL_GAIN = 0.1;

/**
 * Net quality of a class over the window.
 */
export function classSignalScore(signals: ClassSignals): number {
  return (
    signals.keptRate +
    signals.usefulRate +
    signals.reinforcement -
    signals.uncertainRate -
    signals.contradictionSeverity
  );
}

/**
 * Zero-sum delta over the classes observed in the window. Unobserved
 * classes get 0; with fewer than two observed classes there is nothing to
 * compare and the delta is all zeros.
 */
export function proposeDelta(signals: ArbitrationSignals): ClassWeights {
  const observed = PROVENANCE_CLASSES.filter((cls) => signals[cls].count > 0);
  if (observed.length < 2) {
    return mapClasses(() => 0);
  }
  const scores = mapClasses((cls) => classSignalScore(signals[cls]));
  const mean =
    observed.reduce((sum, cls) => sum + scores[cls], 0) / observed.length;
  return mapClasses((cls) =>
    signals[cls].count > 0 ? PROPOSAL_GAIN * (scores[cls] - mean) : 0,
  );
}

export type ApplyDeltaOptions = Pick<
  LearningConfig,
  'maxShift' | 'damping' | 'floor'
>;

/**
 * Apply a proposed delta to a normalized profile.
 *
 * The result sums to 1, every entry is at least `floor`, and no entry
 * differs from the starting point by more than `maxShift`. A profile
 * below the floor is projected onto it first, and that projection is the
 * starting point.
 */
export function applyDelta(
  profile: ArbitrationProfile,
  delta: Readonly<ClassWeights>,
  options: ApplyDeltaOptions,
): ClassWeights {
  const { maxShift, damping, floor } = options;
  const start = projectAboveFloor(profile, floor);
  const stepped = mapClasses(
    (cls) => start[cls] + clamp(delta[cls], -maxShift, maxShift) * damping,
  );
  const target = projectAboveFloor(stepped, floor);

  // Both ends are above the floor, so every point between them is too
  let largest = 0;
  for (const cls of PROVENANCE_CLASSES) {
    largest = Math.max(largest, Math.abs(target[cls] - start[cls]));
  }
  const scale = largest > maxShift ? maxShift / largest : 1;
  return mapClasses(
    (cls) => start[cls] + scale * (target[cls] - start[cls]),
  );
}

export type MetaArbitrationStatus =
  | 'disabled'
  | 'rate_limited'
  | 'no_signals'
  | 'observed'
  | 'applied';

export interface MetaArbitrationRun {
  status: MetaArbitrationStatus;
  /** Profile in effect after the run */
  profile: ArbitrationProfile;
  delta?: ClassWeights;
  /** Profile the run computed; equals `profile` unless observe-only */
  proposed?: ClassWeights;
}

export interface MetaArbitratorDeps {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

export class MetaArbitrator {
  private readonly now: () => number;
  private lastRunAt: number | undefined;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly config: LearningConfig,
    private readonly signals: ArbitrationSignalLog,
    private readonly profiles: ArbitrationProfileStore,
    deps: MetaArbitratorDeps = {},
  ) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run one learning step. Concurrent calls queue behind each other.
   */
  run(): Promise<MetaArbitrationRun> {
    const run = this.pending.then(() => this.runOnce());
    this.pending = run.catch(() => undefined);
    return run;
  }

  private async runOnce(): Promise<MetaArbitrationRun> {
    const current = this.profiles.get();
    if (!this.config.enabled) {
      return { status: 'disabled', profile: current };
    }

    const now = this.now();
    if (
      this.lastRunAt !== undefined &&
      now - this.lastRunAt < this.config.minIntervalSec * 1000
    ) {
      return { status: 'rate_limited', profile: current };
    }

    if (this.signals.size() === 0) {
      return { status: 'no_signals', profile: current };
    }
    this.lastRunAt = now;

    const delta = proposeDelta(this.signals.aggregate());
    const proposed = applyDelta(current, delta, this.config);

    if (this.config.observeOnly) {
      debugLogger.log(
        `MetaArbitrator: Observe-only, proposed ${JSON.stringify(proposed)} (delta ${JSON.stringify(delta)})`,
      );
      return { status: 'observed', profile: current, delta, proposed };
    }

    const profile = await this.profiles.update((latest) =>
      applyDelta(latest, delta, this.config),
    );
    debugLogger.log(
      `MetaArbitrator: Applied profile ${JSON.stringify(profile)}`,
    );
    return { status: 'applied', profile, delta, proposed };
  }
}
