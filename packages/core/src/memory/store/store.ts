/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Vector store contracts.
 *
 * Retrieval only needs `StoreClient.search()`. `MemoryStore` adds the
 * write and lifecycle operations a concrete backend (LanceDB, in-memory)
 * provides.
 *
 * @see ./lancedbStore.ts for the LanceDB implementation
 * @see ./inMemoryStore.ts for the in-process implementation
 */

/**
 * A raw hit from the store.
 *
 * `payload` is loosely typed on purpose: it is whatever metadata was
 * stored with the vector. It is normalized into a `Candidate` once, at
 * the boundary.
 */
export interface StoreHit {
  id: string;
  /** Similarity to the query, higher is closer (usually cosine, 0-1) */
  similarity: number;
  payload: Record<string, unknown>;
}

export interface StoreSearchOptions {
  /** Maximum number of hits to return */
  topK: number;
  /** Aborted on timeout or caller cancellation */
  signal?: AbortSignal;
}

/**
 * The one operation retrieval consumes.
 *
 * Implementations should reject on failure rather than returning an empty
 * list, so that the resilient layer can retry and count the failure.
 */
export interface StoreClient {
  search(
    queryVector: number[],
    options: StoreSearchOptions,
  ): Promise<StoreHit[]>;
}

/**
 * A memory entry as written to a store.
 */
export interface StoredMemoryEntry {
  /** Unique identifier */
  id: string;

  /** The memory content text */
  text: string;

  /** Vector embedding for similarity search */
  embedding: number[];

  /**
   * Scoring metadata: timestamp, sourceTrust, confidence, importance,
   * beliefTags, timesUsed, provenance, assertion key/value, ...
   */
  payload?: Record<string, unknown>;
}

/**
 * Interface for memory storage backends.
 *
 * @example
 * ```typescript
 * const store = new LanceDBStore('/path/to/db', { model: 'my-model', dimension: 384 });
 * await store.init();
 *
 * await store.upsert([{ id: '1', text: 'Deploys run on Fridays', embedding, payload: { confidence: 0.8 } }]);
 * const hits = await store.search(queryVector, { topK: 50 });
 *
 * await store.close();
 * ```
 */
export interface MemoryStore extends StoreClient {
  /**
   * Initialize the store connection.
   * Creates tables/indexes if they don't exist.
   *
   * @throws If connection fails
   */
  init(): Promise<void>;

  /**
   * Add or update entries. An entry with an existing id is replaced.
   */
  upsert(entries: StoredMemoryEntry[]): Promise<void>;

  delete(id: string): Promise<void>;

  getById(id: string): Promise<StoredMemoryEntry | undefined>;

  close(): Promise<void>;
}
