/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Store layer exports for memory system.
 */

export type {
  MemoryStore,
  StoreClient,
  StoreHit,
  StoreSearchOptions,
  StoredMemoryEntry,
} from './store.js';

export {
  LanceDBStore,
  computeEmbeddingSpaceId,
  type EmbeddingSpaceConfig,
} from './lancedbStore.js';

export { InMemoryStore } from './inMemoryStore.js';
