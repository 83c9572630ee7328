/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Maximal Marginal Relevance reranking.
 *
 * Greedy: the most relevant item is taken first, then each step takes the
 * item maximizing
 *
 * ```
 * lambda * relevance(i) - (1 - lambda) * max(cosine(i, j) for j in selected)
 * ```
 *
 * `lambda` near 1 favours relevance, near 0 favours diversity. Ties go to
 * the earlier item.
 */

import { clamp01, cosine } from '../vectors.js';

export interface MmrItem {
  embedding?: readonly number[];
}

/**
 * Reorder `items` and keep at most `k` of them.
 *
 * Items without an embedding cannot take part in the diversity term; they
 * follow the MMR-selected items in input order. If no item has an
 * embedding this is the input order truncated to `k`.
 *
 * @param relevanceOf - Relevance of an item (its similarity or score)
 */
export function mmr<T extends MmrItem>(
  items: readonly T[],
  k: number,
  lambda: number,
  relevanceOf: (item: T) => number,
): T[] {
  const limit = Math.min(Math.max(0, Math.floor(k)), items.length);
  if (limit === 0) {
    return [];
  }

  const withEmbedding: Array<{ item: T; embedding: readonly number[] }> = [];
  const withoutEmbedding: T[] = [];
  for (const item of items) {
    if (item.embedding && item.embedding.length > 0) {
      withEmbedding.push({ item, embedding: item.embedding });
    } else {
      withoutEmbedding.push(item);
    }
  }
  if (withEmbedding.length === 0) {
    return items.slice(0, limit);
  }

  const lam = clamp01(lambda);
  const relevance = withEmbedding.map(({ item }) => relevanceOf(item));
  const remaining = withEmbedding.map((_, index) => index);
  const selected: number[] = [];
  // Running max similarity of each item to the selected set.
  const maxSim = new Array<number>(withEmbedding.length).fill(0);

  while (selected.length < limit && remaining.length > 0) {
    let bestPos = 0;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (let pos = 0; pos < remaining.length; pos++) {
      const i = remaining[pos];
      const score =
        selected.length === 0
          ? relevance[i]
          : lam * relevance[i] - (1 - lam) * maxSim[i];
      if (score > bestScore) {
        bestScore = score;
        bestPos = pos;
      }
    }
    const [chosen] = remaining.splice(bestPos, 1);
    selected.push(chosen);
    for (const i of remaining) {
      const sim = cosine(withEmbedding[i].embedding, withEmbedding[chosen].embedding);
      if (sim > maxSim[i]) {
        maxSim[i] = sim;
      }
    }
  }

  const ordered = selected.map((i) => withEmbedding[i].item);
  for (const item of withoutEmbedding) {
    if (ordered.length >= limit) {
      break;
    }
    ordered.push(item);
  }
  return ordered;
}
