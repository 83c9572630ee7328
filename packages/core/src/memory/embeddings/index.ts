/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Embeddings layer exports for memory system.
 */

export type { EmbeddingClient } from './embeddings.js';
