/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Tests for MMR reranking
 */

import { describe, it, expect } from 'vitest';
import { mmr } from './mmr.js';

interface Item {
  id: string;
  rel: number;
  embedding?: number[];
}

const rel = (item: Item) => item.rel;
const ids = (items: Item[]) => items.map((i) => i.id);

describe('mmr', () => {
  const items: Item[] = [
    { id: 'a', rel: 0.2, embedding: [1, 0] },
    { id: 'b', rel: 0.9, embedding: [0.9, 0.1] },
    { id: 'c', rel: 0.5, embedding: [0, 1] },
    { id: 'd', rel: 0.7, embedding: [0.5, 0.5] },
  ];

  it('should never return more than min(k, n) items', () => {
    expect(mmr(items, 10, 0.5, rel)).toHaveLength(4);
    expect(mmr(items, 2, 0.5, rel)).toHaveLength(2);
    expect(mmr(items, 0, 0.5, rel)).toEqual([]);
    expect(mmr([], 3, 0.5, rel)).toEqual([]);
  });

  it('should match pure relevance order when lambda is 1', () => {
    expect(ids(mmr(items, 3, 1, rel))).toEqual(['b', 'd', 'c']);
  });

  it('should prefer a diverse item over a near-duplicate', () => {
    const pool: Item[] = [
      { id: 'a', rel: 0.9, embedding: [1, 0] },
      { id: 'dup', rel: 0.89, embedding: [0.99, 0.14] },
      { id: 'far', rel: 0.1, embedding: [0, 1] },
    ];
    expect(ids(mmr(pool, 2, 0.3, rel))).toEqual(['a', 'far']);
  });

  it('should keep the earlier item on ties', () => {
    const pool: Item[] = [
      { id: 'first', rel: 0.5, embedding: [1, 0] },
      { id: 'second', rel: 0.5, embedding: [1, 0] },
    ];
    expect(ids(mmr(pool, 1, 0.7, rel))).toEqual(['first']);
  });

  it('should return input order truncated when no item has an embedding', () => {
    const pool: Item[] = [
      { id: 'x', rel: 0.1 },
      { id: 'y', rel: 0.9 },
      { id: 'z', rel: 0.5 },
    ];
    expect(ids(mmr(pool, 2, 0.7, rel))).toEqual(['x', 'y']);
  });

  it('should place items without embeddings after the reranked ones', () => {
    const pool: Item[] = [
      { id: 'bare', rel: 0.99 },
      { id: 'low', rel: 0.2, embedding: [0, 1] },
      { id: 'high', rel: 0.8, embedding: [1, 0] },
    ];
    expect(ids(mmr(pool, 3, 1, rel))).toEqual(['high', 'low', 'bare']);
  });
});
