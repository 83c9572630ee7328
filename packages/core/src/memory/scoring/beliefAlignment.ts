/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { clamp01 } from '../vectors.js';
import type { ActiveBeliefSet } from '../types.js';

export interface BeliefAlignmentOptions {
  /** Smoothing constant added to both sides of the ratio */
  alpha: number;
  /** Added when an overlapping tag sits under an important prefix */
  importanceBoost: number;
  importantPrefixes: readonly string[];
}

/**
 * Smoothed Jaccard overlap between a candidate's belief tags and the
 * active set: `(|A ∩ B| + α) / (|A ∪ B| + α)`.
 *
 * When either side is empty the overlap is `α / (|A ∪ B| + α)`, and `α`
 * itself when both are, so an untagged memory gets a small positive value
 * rather than zero or a free full match.
 */
export function beliefAlignment(
  candidateTags: readonly string[],
  active: ActiveBeliefSet,
  options: BeliefAlignmentOptions,
): number {
  const { alpha } = options;
  const mine = new Set(candidateTags);
  const theirs = active.tags;

  if (mine.size === 0 || theirs.size === 0) {
    const union = new Set([...mine, ...theirs]).size;
    return clamp01(alpha / (union > 0 ? union + alpha : 1));
  }

  const overlap: string[] = [];
  for (const tag of mine) {
    if (theirs.has(tag)) {
      overlap.push(tag);
    }
  }
  const union = mine.size + theirs.size - overlap.length;
  let alignment = (overlap.length + alpha) / (union + alpha);

  if (
    options.importanceBoost > 0 &&
    overlap.some((tag) =>
      options.importantPrefixes.some((prefix) => tag.startsWith(prefix)),
    )
  ) {
    alignment = Math.min(1, alignment + options.importanceBoost);
  }
  return clamp01(alignment);
}
