/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Helpers for per-provenance-class weight tables.
 */

import { PROVENANCE_CLASSES, type ProvenanceClass } from '../types.js';
import { clamp } from '../vectors.js';

export type ClassWeights = Record<ProvenanceClass, number>;

export function mapClasses(
  fn: (cls: ProvenanceClass) => number,
): ClassWeights {
  return {
    base: fn('base'),
    episodic: fn('episodic'),
    procedural: fn('procedural'),
    abstraction: fn('abstraction'),
  };
}

export function uniformClassWeights(): ClassWeights {
  return mapClasses(() => 1 / PROVENANCE_CLASSES.length);
}

export function sumClassWeights(weights: Readonly<ClassWeights>): number {
  let total = 0;
  for (const cls of PROVENANCE_CLASSES) {
    total += weights[cls];
  }
  return total;
}

/**
 * Scale to sum 1. Negative or non-finite entries count as 0; if nothing
 * positive is left the result is uniform.
 */
export function normalizeClassWeights(
  weights: Readonly<ClassWeights>,
): ClassWeights {
  const cleaned = mapClasses((cls) => {
    const value = weights[cls];
    return Number.isFinite(value) && value > 0 ? value : 0;
  });
  const total = sumClassWeights(cleaned);
  if (total <= 0) {
    return uniformClassWeights();
  }
  return mapClasses((cls) => cleaned[cls] / total);
}

/** Smallest share any class keeps in a learned profile */
export const DEFAULT_CLASS_FLOOR = 0.05;

/**
 * Map onto `{w : Σw = 1, w ≥ floor}` by distributing the mass above the
 * floor proportionally. A floor above `1 / classes` is capped there.
 */
export function projectAboveFloor(
  weights: Readonly<ClassWeights>,
  floor: number,
): ClassWeights {
  const f = clamp(floor, 0, 1 / PROVENANCE_CLASSES.length);
  const excess = mapClasses((cls) => Math.max(0, weights[cls] - f));
  const total = sumClassWeights(excess);
  if (!(total > 0)) {
    return uniformClassWeights();
  }
  const free = 1 - f * PROVENANCE_CLASSES.length;
  return mapClasses((cls) => f + (free * excess[cls]) / total);
}
