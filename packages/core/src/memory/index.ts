/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Public exports for ranked memory retrieval.
 *
 * ## Architecture
 *
 * ```
 * Query → Embed → ResilientStore (over-retrieve, retry, breaker)
 *       → normalize → composite score → select → arbitrate → MMR
 *       → RetrievalResult
 *                ↓
 *       formatRankedCandidates() / buildMemoryBanner()
 * ```
 *
 * @example
 * ```typescript
 * import {
 *   ArbitrationProfileStore,
 *   LanceDBStore,
 *   RankedMemoryRetriever,
 *   formatRankedCandidates,
 *   loadActiveBeliefs,
 *   loadRetrievalConfig,
 * } from '@recall-engine/core';
 *
 * const store = new LanceDBStore('/path/to/memory.lance', {
 *   model: embeddings.getModel(),
 *   dimension: embeddings.getDimension(),
 * });
 * await store.init();
 *
 * const config = loadRetrievalConfig();
 * const profiles = new ArbitrationProfileStore(
 *   config.learning.profilePath,
 *   config.learning.floor,
 * );
 * await profiles.load();
 *
 * const retriever = new RankedMemoryRetriever({
 *   store,
 *   embeddings,
 *   config,
 *   profiles,
 *   beliefs: () => loadActiveBeliefs({ filePath: 'beliefs.json' }),
 * });
 *
 * const result = await retriever.retrieve(userMessage, { signal });
 * const formatted = formatRankedCandidates(result.candidates);
 * ```
 */

// =============================================================================
// Type exports
// =============================================================================

export type {
  ActiveBeliefSet,
  ArbitrationDetail,
  ArbitrationProfile,
  ArbitrationTag,
  Candidate,
  CircuitState,
  MemoryHit,
  MemoryRetriever,
  MemorySearchOptions,
  ProvenanceClass,
  QueryIntent,
  RankedCandidate,
  RetrievalDiagnostics,
  RetrievalReason,
  RetrievalResult,
  RetrieveOptions,
  ScoreBreakdown,
  ScoredCandidate,
  SelectionStages,
} from './types.js';

export { PROVENANCE_CLASSES } from './types.js';

// =============================================================================
// Retriever exports
// =============================================================================

export {
  RankedMemoryRetriever,
  extractQueryText,
  type BeliefSource,
  type RankedMemoryRetrieverOptions,
} from './RankedMemoryRetriever.js';

// =============================================================================
// Configuration exports
// =============================================================================

export {
  DEFAULT_INTENT_MULTIPLIERS,
  DEFAULT_SCORING_WEIGHTS,
  defaultRetrievalConfig,
  loadRetrievalConfig,
  parseWeightList,
  resetConfigWarnings,
  retrievalConfigSchema,
  type ArbitrationConfig,
  type ConflictPolicy,
  type LearningConfig,
  type LoadRetrievalConfigOptions,
  type ResilienceConfig,
  type RetrievalConfig,
  type RetrievalConfigOverrides,
  type ScoringConfig,
  type ScoringWeights,
  type SelectionConfig,
} from './config.js';

// =============================================================================
// Formatter exports
// =============================================================================

export {
  buildMemoryBanner,
  estimateTokens,
  explainBreakdown,
  formatMemoryHits,
  formatRankedCandidates,
  sanitizeMemoryText,
  type FormatRankedOptions,
  type MemoryBannerOptions,
} from './formatters.js';

// =============================================================================
// Beliefs and normalization exports
// =============================================================================

export {
  EMPTY_BELIEF_SET,
  createActiveBeliefSet,
  loadActiveBeliefs,
  type LoadActiveBeliefsOptions,
} from './beliefs.js';

export {
  CANDIDATE_DEFAULTS,
  detectProvenanceClass,
  normalizeCandidate,
  normalizeCandidates,
  normalizeTag,
} from './normalize.js';

export { DimensionMismatchError, cosine } from './vectors.js';

// =============================================================================
// Scoring exports
// =============================================================================

export {
  computeCompositeScore,
  scoreCandidates,
  type ScoreBatchOptions,
  type ScoringContext,
} from './scoring/compositeScore.js';

export {
  beliefAlignment,
  type BeliefAlignmentOptions,
} from './scoring/beliefAlignment.js';

export {
  assertionContradictionDetector,
  combineDetectors,
  defaultContradictionDetector,
  flagContradictionDetector,
  type ContradictionDetector,
} from './scoring/contradiction.js';

// =============================================================================
// Selection exports
// =============================================================================

export {
  selectCandidates,
  type SelectableHit,
  type SelectionResult,
} from './selection/candidateSelection.js';

export { mmr, type MmrItem } from './selection/mmr.js';

// =============================================================================
// Arbitration exports
// =============================================================================

export { detectQueryIntent } from './arbitration/intent.js';

export {
  arbitrate,
  arbitrationFactor,
  computeArbitrationWeights,
  type ArbitratedCandidate,
} from './arbitration/weights.js';

export {
  resolveConflicts,
  type ResolveConflictsOptions,
} from './arbitration/conflicts.js';

export {
  ArbitrationSignalLog,
  type ArbitrationOutcome,
  type ArbitrationSignals,
  type ClassSignals,
} from './arbitration/signals.js';

export { ArbitrationProfileStore } from './arbitration/profileStore.js';

export {
  MetaArbitrator,
  applyDelta,
  proposeDelta,
  type MetaArbitrationRun,
  type MetaArbitrationStatus,
} from './arbitration/metaArbitration.js';

// =============================================================================
// Resilience exports
// =============================================================================

export {
  CircuitBreaker,
  type BreakerPermit,
  type CircuitBreakerSnapshot,
} from './resilience/circuitBreaker.js';

export {
  MalformedStoreResponseError,
  ResilientStore,
  type FetchOutcome,
  type FetchReason,
  type ResilientStoreDeps,
} from './resilience/resilientStore.js';

export {
  RetrievalCancelledError,
  StoreTimeoutError,
} from './resilience/retry.js';

// =============================================================================
// Store exports
// =============================================================================

export type {
  EmbeddingSpaceConfig,
  MemoryStore,
  StoreClient,
  StoreHit,
  StoreSearchOptions,
  StoredMemoryEntry,
} from './store/index.js';

export {
  InMemoryStore,
  LanceDBStore,
  computeEmbeddingSpaceId,
} from './store/index.js';

// =============================================================================
// Embeddings exports
// =============================================================================

export type { EmbeddingClient } from './embeddings/index.js';
