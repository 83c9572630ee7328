/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Candidate builder shared by the memory tests.
 */

import type { Candidate } from './types.js';

export function makeCandidate(
  fields: Partial<Candidate> & { id: string },
): Candidate {
  return {
    rawSimilarity: 0,
    text: `memory ${fields.id}`,
    tags: [],
    sourceTrust: 0.6,
    confidence: 0.5,
    importance: 0.5,
    beliefTags: [],
    timesUsed: 0,
    contradictionFlag: false,
    conflictScore: 0,
    provenanceClass: 'base',
    payload: {},
    ...fields,
  };
}
