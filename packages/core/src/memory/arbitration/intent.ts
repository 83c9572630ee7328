/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Heuristic query intent detection.
 */

import type { QueryIntent } from '../types.js';

const INTENT_WORD = /\b(how|why)\b/i;

/**
 * Classify a query as `how`, `why` or `fact`.
 *
 * The first occurrence of the word "how" or "why" decides; anything else,
 * including an empty query, is a `fact` query.
 */
export function detectQueryIntent(query: string): QueryIntent {
  const match = INTENT_WORD.exec(query);
  if (!match) {
    return 'fact';
  }
  return match[1].toLowerCase() === 'how' ? 'how' : 'why';
}
