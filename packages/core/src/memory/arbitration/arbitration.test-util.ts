/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Builders for arbitration tests.
 */

import { makeCandidate } from '../candidates.test-util.js';
import type { Candidate, ScoredCandidate } from '../types.js';
import type { ArbitratedCandidate } from './weights.js';

export function makeScored(
  id: string,
  finalScore: number,
  fields: Partial<Candidate> = {},
): ScoredCandidate {
  return {
    candidate: makeCandidate({ ...fields, id }),
    finalScore,
    breakdown: {
      similarity: 0,
      recency: 1,
      credibility: 0.6,
      confidence: 0.5,
      beliefAlignment: 0.5,
      usage: 0,
      novelty: 0,
      conflictPenalty: 0,
      final: finalScore,
    },
  };
}

export function makeArbitrated(
  id: string,
  adjustedScore: number,
  fields: Partial<Candidate> = {},
): ArbitratedCandidate {
  return {
    scored: makeScored(id, adjustedScore, fields),
    weight: 0.25,
    adjustedScore,
    tags: [],
  };
}
