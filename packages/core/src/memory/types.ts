/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Type definitions for ranked memory retrieval.
 *
 * Retrieval runs in stages over one query's candidate set:
 * - Resilient fetch of raw hits from the vector store
 * - Composite scoring (similarity, recency, trust, beliefs, usage, novelty)
 * - Candidate selection (threshold, fallbacks, keyword boost)
 * - Provenance arbitration and conflict policy
 * - MMR diversity ordering
 */

import type { Part } from '@google/genai';

/**
 * Provenance of a memory, used by arbitration.
 * - 'base': plain stored facts
 * - 'episodic': recollections of specific events
 * - 'procedural': how-to knowledge
 * - 'abstraction': generalizations distilled from other memories
 */
export type ProvenanceClass = 'base' | 'episodic' | 'procedural' | 'abstraction';

export const PROVENANCE_CLASSES: readonly ProvenanceClass[] = [
  'base',
  'episodic',
  'procedural',
  'abstraction',
];

/**
 * Coarse intent of a query, used to pick arbitration multipliers.
 */
export type QueryIntent = 'fact' | 'how' | 'why';

/**
 * A memory candidate after boundary normalization.
 *
 * Every field has a concrete value (or is explicitly optional) so that
 * scoring never has to deal with loosely typed payloads.
 */
export interface Candidate {
  /** Stable identifier from the store */
  id: string;
  /** Vector embedding, absent when the store did not return one */
  embedding?: number[];
  /** Similarity reported by the store, clamped to [0, 1] */
  rawSimilarity: number;
  /** The memory content text */
  text: string;
  /** Provenance information (file path, conversation, etc.) */
  source?: string;
  tags: string[];
  /** Creation time; absent means "now" for recency purposes */
  timestamp?: Date;
  /** Trust in the source, [0, 1], default 0.6 */
  sourceTrust: number;
  /** Stated confidence, [0, 1], default 0.5 */
  confidence: number;
  /** Importance, [0, 1], default 0.5 */
  importance: number;
  /** Normalized belief tags */
  beliefTags: string[];
  timesUsed: number;
  contradictionFlag: boolean;
  conflictScore: number;
  provenanceClass: ProvenanceClass;
  /** Key of the assertion this memory makes, if any */
  assertionKey?: string;
  assertionValue?: string;
  /** Original store payload, kept for callers that need extra fields */
  payload: Readonly<Record<string, unknown>>;
}

/**
 * Per-factor values behind a composite score.
 */
export interface ScoreBreakdown {
  similarity: number;
  recency: number;
  credibility: number;
  confidence: number;
  beliefAlignment: number;
  usage: number;
  novelty: number;
  /** Penalty applied to the multiplier; 0 when no conflict applied */
  conflictPenalty: number;
  final: number;
}

/**
 * A candidate together with its composite score.
 */
export interface ScoredCandidate {
  candidate: Candidate;
  finalScore: number;
  breakdown: ScoreBreakdown;
}

/**
 * Immutable snapshot of the currently emphasized belief tags.
 */
export interface ActiveBeliefSet {
  readonly version: number;
  readonly tags: ReadonlySet<string>;
}

/**
 * Learned per-provenance weights. Entries sum to 1.
 */
export type ArbitrationProfile = Readonly<Record<ProvenanceClass, number>>;

/**
 * Markers attached to a candidate by the conflict policy.
 */
export type ArbitrationTag = 'arb_winner' | 'arb_uncertain' | 'arb_conflict';

/**
 * What arbitration did to a single candidate.
 */
export interface ArbitrationDetail {
  /** Effective weight of the candidate's provenance class */
  weight: number;
  /** Composite score after arbitration reweighting */
  adjustedScore: number;
  tags: ArbitrationTag[];
}

/**
 * A candidate as returned from retrieval.
 */
export interface RankedCandidate {
  id: string;
  text: string;
  source?: string;
  /** Composite score before arbitration */
  finalScore: number;
  /** Score the final order was built from */
  rankScore: number;
  /** Similarity used for selection (raw plus any keyword boost) */
  similarity: number;
  breakdown: ScoreBreakdown;
  provenanceClass: ProvenanceClass;
  arbitration?: ArbitrationDetail;
}

/**
 * Why a retrieval ended the way it did.
 */
export type RetrievalReason =
  | 'ok'
  | 'empty_query'
  | 'embedding_failed'
  | 'circuit_open'
  | 'store_unavailable'
  | 'no_candidates'
  | 'below_threshold'
  | 'cancelled';

/**
 * Which selection stages fired for a query.
 */
export interface SelectionStages {
  thresholdUsed: number;
  dynamicThresholdApplied: boolean;
  keywordBoostApplied: boolean;
  mmrApplied: boolean;
  top1FallbackApplied: boolean;
  minResultsBackfillApplied: boolean;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Observability data attached to every retrieval result.
 */
export interface RetrievalDiagnostics {
  retrieved: number;
  dropped: number;
  selected: number;
  returned: number;
  attempts: number;
  breakerState: CircuitState;
  stages?: SelectionStages;
  arbitrationWeights?: Record<ProvenanceClass, number>;
  beliefVersion?: number;
  durationMs: number;
}

/**
 * Result of a ranked retrieval. Never an exception: degraded outcomes are
 * reported through `reason`.
 */
export interface RetrievalResult {
  queryId: string;
  intent: QueryIntent;
  candidates: RankedCandidate[];
  reason: RetrievalReason;
  diagnostics: RetrievalDiagnostics;
}

/**
 * Options for a ranked retrieval.
 */
export interface RetrieveOptions {
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
  /** Number of results to return (default from config, 8) */
  topK?: number;
  /** Override intent detection */
  intent?: QueryIntent;
  /** Embeddings of content already in context, used for novelty */
  alreadySelected?: number[][];
}

/**
 * A plain similarity hit, returned by `search()`.
 */
export interface MemoryHit {
  id: string;
  text: string;
  /** Store similarity (0-1, higher is more relevant) */
  score: number;
  source?: string;
}

/**
 * Options for plain similarity search.
 */
export interface MemorySearchOptions {
  /** Maximum results to return (default: 8) */
  limit?: number;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
}

/**
 * Core interface for ranked memory retrieval.
 */
export interface MemoryRetriever {
  /**
   * Retrieve, score, select and order memories for a request.
   *
   * @param request - The current user request (string or Parts)
   */
  retrieve(
    request: string | Part[],
    options?: RetrieveOptions,
  ): Promise<RetrievalResult>;

  /**
   * Top matches by store similarity only, without scoring.
   */
  search(query: string, options?: MemorySearchOptions): Promise<MemoryHit[]>;
}
