/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview In-process MemoryStore using exact cosine search.
 *
 * Useful for tests and small corpora; everything lives in a Map.
 */

import { DimensionMismatchError, cosine } from '../vectors.js';
import type {
  MemoryStore,
  StoreHit,
  StoreSearchOptions,
  StoredMemoryEntry,
} from './store.js';

export class InMemoryStore implements MemoryStore {
  private readonly entries = new Map<string, StoredMemoryEntry>();

  /**
   * @param dimension - If set, entries and queries of any other length
   *   are rejected
   */
  constructor(private readonly dimension?: number) {}

  async init(): Promise<void> {}

  async upsert(entries: StoredMemoryEntry[]): Promise<void> {
    for (const entry of entries) {
      this.checkDimension(entry.embedding);
    }
    for (const entry of entries) {
      this.entries.set(entry.id, copyEntry(entry));
    }
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id);
  }

  async getById(id: string): Promise<StoredMemoryEntry | undefined> {
    const entry = this.entries.get(id);
    return entry && copyEntry(entry);
  }

  async search(
    queryVector: number[],
    options: StoreSearchOptions,
  ): Promise<StoreHit[]> {
    options.signal?.throwIfAborted();
    this.checkDimension(queryVector);

    const hits: StoreHit[] = [];
    for (const entry of this.entries.values()) {
      hits.push({
        id: entry.id,
        similarity: cosine(entry.embedding, queryVector),
        payload: { ...entry.payload, text: entry.text, embedding: entry.embedding },
      });
    }
    hits.sort((a, b) => b.similarity - a.similarity);
    return hits.slice(0, Math.max(0, options.topK));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  private checkDimension(vector: readonly number[]): void {
    if (this.dimension !== undefined && vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
  }
}

function copyEntry(entry: StoredMemoryEntry): StoredMemoryEntry {
  return {
    ...entry,
    embedding: [...entry.embedding],
    payload: { ...entry.payload },
  };
}
