/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Contract for the query embedding function.
 *
 * Retrieval does not own an embedding model. The host supplies any client
 * that turns text into vectors from the same space the store was built
 * with; the retriever only ever calls `embedOne()` on the query.
 */

/**
 * Interface for embedding generation clients.
 *
 * @example
 * ```typescript
 * const embeddings: EmbeddingClient = {
 *   embed: async (texts) => Promise.all(texts.map((t) => model.encode(t))),
 *   embedOne: async (text) => model.encode(text),
 *   getDimension: () => 384,
 *   getModel: () => 'my-encoder',
 * };
 * ```
 */
export interface EmbeddingClient {
  /**
   * Embed several texts; output order matches input order.
   */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  /**
   * Embed a single query.
   *
   * Should reject (not return an empty vector) when the model fails, so
   * the retriever can report `embedding_failed`.
   */
  embedOne(text: string, signal?: AbortSignal): Promise<number[]>;

  /** Dimension of the vectors this client produces */
  getDimension(): number;

  getModel(): string;
}
