/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Trailing window of per-provenance retrieval outcomes.
 *
 * Downstream consumers (an answer judge, user feedback, consolidation)
 * report what happened to a retrieved memory. The learning step reads the
 * aggregate of the last `windowSize` outcomes.
 */

import { clamp, clamp01 } from '../vectors.js';
import type { ProvenanceClass } from '../types.js';

/**
 * What happened to one retrieved memory.
 */
export interface ArbitrationOutcome {
  provenanceClass: ProvenanceClass;
  /** Kept by the downstream judge */
  kept: boolean;
  /** Reported useful; defaults to `kept` */
  useful?: boolean;
  /** Marked uncertain by conflict arbitration */
  uncertain?: boolean;
  /** Severity of a detected contradiction, [0, 1] */
  contradictionSeverity?: number;
  /** Reinforcement (positive) vs decay (negative), [-1, 1] */
  reinforcement?: number;
}

/**
 * Window averages for one provenance class. All rates are 0 when
 * `count` is 0.
 */
export interface ClassSignals {
  count: number;
  keptRate: number;
  usefulRate: number;
  uncertainRate: number;
  contradictionSeverity: number;
  reinforcement: number;
}

export type ArbitrationSignals = Record<ProvenanceClass, ClassSignals>;

interface NormalizedOutcome {
  provenanceClass: ProvenanceClass;
  kept: number;
  useful: number;
  uncertain: number;
  contradictionSeverity: number;
  reinforcement: number;
}

export class ArbitrationSignalLog {
  private readonly outcomes: NormalizedOutcome[] = [];

  constructor(private readonly windowSize: number) {}

  record(outcome: ArbitrationOutcome): void {
    this.outcomes.push({
      provenanceClass: outcome.provenanceClass,
      kept: outcome.kept ? 1 : 0,
      useful: (outcome.useful ?? outcome.kept) ? 1 : 0,
      uncertain: outcome.uncertain ? 1 : 0,
      contradictionSeverity: clamp01(outcome.contradictionSeverity ?? 0),
      reinforcement: clamp(outcome.reinforcement ?? 0, -1, 1),
    });
    const overflow = this.outcomes.length - Math.max(1, this.windowSize);
    if (overflow > 0) {
      this.outcomes.splice(0, overflow);
    }
  }

  size(): number {
    return this.outcomes.length;
  }

  clear(): void {
    this.outcomes.length = 0;
  }

  aggregate(): ArbitrationSignals {
    const totals = mapClassTotals();
    for (const outcome of this.outcomes) {
      const t = totals[outcome.provenanceClass];
      t.count++;
      t.keptRate += outcome.kept;
      t.usefulRate += outcome.useful;
      t.uncertainRate += outcome.uncertain;
      t.contradictionSeverity += outcome.contradictionSeverity;
      t.reinforcement += outcome.reinforcement;
    }
    for (const t of Object.values(totals)) {
      if (t.count > 0) {
        t.keptRate /= t.count;
        t.usefulRate /= t.count;
        t.uncertainRate /= t.count;
        t.contradictionSeverity /= t.count;
        t.reinforcement /= t.count;
      }
    }
    return totals;
  }
}

function emptySignals(): ClassSignals {
  return {
    count: 0,
    keptRate: 0,
    usefulRate: 0,
    uncertainRate: 0,
    contradictionSeverity: 0,
    reinforcement: 0,
  };
}

function mapClassTotals(): ArbitrationSignals {
  return {
    base: emptySignals(),
    episodic: emptySignals(),
    procedural: emptySignals(),
    abstraction: emptySignals(),
  };
}
