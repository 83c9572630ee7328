/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Vector helpers shared by scoring and MMR.
 */

/**
 * Thrown when two vectors from different embedding spaces are compared.
 */
export class DimensionMismatchError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Vector dimension mismatch: ${expected} vs ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.min(Math.max(value, lo), hi);
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Cosine similarity. Returns 0 when either vector is absent or has zero
 * norm.
 *
 * @throws DimensionMismatchError if the vectors differ in length
 */
export function cosine(
  a: readonly number[] | undefined,
  b: readonly number[] | undefined,
): number {
  if (!a || !b) {
    return 0;
  }
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA <= 0 || normB <= 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Mean cosine similarity of `vec` against each of `others`; 0 if empty.
 */
export function meanCosine(
  vec: readonly number[],
  others: ReadonlyArray<readonly number[]>,
): number {
  if (others.length === 0) {
    return 0;
  }
  let total = 0;
  for (const other of others) {
    total += cosine(vec, other);
  }
  return total / others.length;
}
