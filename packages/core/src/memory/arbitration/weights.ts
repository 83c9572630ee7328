/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Provenance-aware reweighting of composite scores.
 *
 * The effective weight of a provenance class is
 * `normalize(baseWeight × intentMultiplier × learnedProfile)`. A candidate's
 * composite score is then scaled by `1 - strength + strength × weight × 4`,
 * so with uniform weights (0.25 each) arbitration is a no-op and a class
 * with double the uniform weight gains `strength` on top of its score.
 */

import type { ArbitrationConfig } from '../config.js';
import {
  PROVENANCE_CLASSES,
  type ArbitrationProfile,
  type ArbitrationTag,
  type QueryIntent,
  type ScoredCandidate,
} from '../types.js';
import {
  mapClasses,
  normalizeClassWeights,
  type ClassWeights,
} from './provenance.js';

/**
 * A scored candidate after arbitration.
 */
export interface ArbitratedCandidate {
  scored: ScoredCandidate;
  /** Effective weight of the candidate's provenance class */
  weight: number;
  adjustedScore: number;
  tags: ArbitrationTag[];
}

export function computeArbitrationWeights(
  intent: QueryIntent,
  config: Pick<ArbitrationConfig, 'mode' | 'baseWeights' | 'intentMultipliers'>,
  profile?: ArbitrationProfile,
): ClassWeights {
  const multipliers =
    config.mode === 'context' ? config.intentMultipliers[intent] : undefined;
  return normalizeClassWeights(
    mapClasses(
      (cls) =>
        config.baseWeights[cls] *
        (multipliers ? multipliers[cls] : 1) *
        (profile ? profile[cls] : 1),
    ),
  );
}

export function arbitrationFactor(weight: number, strength: number): number {
  return 1 - strength + strength * weight * PROVENANCE_CLASSES.length;
}

/**
 * Adjusted score descending, then id ascending.
 */
export function compareArbitrated(
  a: ArbitratedCandidate,
  b: ArbitratedCandidate,
): number {
  if (b.adjustedScore !== a.adjustedScore) {
    return b.adjustedScore - a.adjustedScore;
  }
  const idA = a.scored.candidate.id;
  const idB = b.scored.candidate.id;
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

/**
 * Reweight and re-sort scored candidates for a query intent.
 */
export function arbitrate(
  scored: readonly ScoredCandidate[],
  intent: QueryIntent,
  config: ArbitrationConfig,
  profile?: ArbitrationProfile,
): { ranked: ArbitratedCandidate[]; weights: ClassWeights } {
  const weights = computeArbitrationWeights(intent, config, profile);
  const ranked = scored.map((entry): ArbitratedCandidate => {
    const weight = weights[entry.candidate.provenanceClass];
    return {
      scored: entry,
      weight,
      adjustedScore:
        entry.finalScore * arbitrationFactor(weight, config.strength),
      tags: [],
    };
  });
  ranked.sort(compareArbitrated);
  return { ranked, weights };
}
