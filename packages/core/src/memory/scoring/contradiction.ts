/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Contradiction detection for the composite score penalty.
 *
 * A detector decides whether a candidate is contradicted by one of the
 * candidates currently ranked above it. The scoring engine applies the
 * configured penalty to flagged candidates only when contradictions are
 * enabled.
 */

import type { Candidate, ScoredCandidate } from '../types.js';

export interface ContradictionDetector {
  /**
   * @param candidate - Candidate being scored
   * @param favored - Candidates ranked above it on the unpenalized score
   */
  isContradicted(
    candidate: Candidate,
    favored: readonly ScoredCandidate[],
  ): boolean;
}

/**
 * Trusts the flags written by an upstream contradiction reconciler.
 */
export const flagContradictionDetector: ContradictionDetector = {
  isContradicted(candidate) {
    return candidate.contradictionFlag || candidate.conflictScore > 0;
  },
};

/**
 * A favored candidate asserts a different value for the same key.
 */
export const assertionContradictionDetector: ContradictionDetector = {
  isContradicted(candidate, favored) {
    const key = candidate.assertionKey;
    if (key === undefined) {
      return false;
    }
    return favored.some(
      ({ candidate: other }) =>
        other.id !== candidate.id &&
        other.assertionKey === key &&
        other.assertionValue !== candidate.assertionValue,
    );
  },
};

export function combineDetectors(
  ...detectors: ContradictionDetector[]
): ContradictionDetector {
  return {
    isContradicted(candidate, favored) {
      return detectors.some((d) => d.isContradicted(candidate, favored));
    },
  };
}

export const defaultContradictionDetector = combineDetectors(
  flagContradictionDetector,
  assertionContradictionDetector,
);
