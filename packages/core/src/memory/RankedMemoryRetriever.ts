/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Ranked memory retrieval over a vector store.
 *
 * ## Pipeline
 *
 * The retrieval pipeline follows "over-retrieve then rank":
 * 1. Embed the query using the configured embedding client
 * 2. Fetch ~50 candidates through the resilient store (retry, timeout,
 *    circuit breaker)
 * 3. Score every candidate (similarity, recency, trust, confidence,
 *    belief alignment, usage, novelty, contradiction penalty)
 * 4. Select: threshold, fallbacks, keyword boost
 * 5. Arbitrate by provenance class for the query intent
 * 6. Order the top K with MMR, then apply the conflict policy
 *
 * ## Key Guards
 *
 * - Check signal.aborted between async stages
 * - Degraded outcomes are reported through `reason`, never thrown
 * - The only rejection is a dimension mismatch with `strictDimensions`
 */

import type { Part } from '@google/genai';
import { v4 as uuidv4 } from 'uuid';
import { debugLogger } from '../utils/debugLogger.js';
import { EMPTY_BELIEF_SET } from './beliefs.js';
import { loadRetrievalConfig, type RetrievalConfig } from './config.js';
import type { EmbeddingClient } from './embeddings/embeddings.js';
import { detectQueryIntent } from './arbitration/intent.js';
import { resolveConflicts } from './arbitration/conflicts.js';
import type { ArbitrationProfileStore } from './arbitration/profileStore.js';
import type { ClassWeights } from './arbitration/provenance.js';
import { arbitrate, type ArbitratedCandidate } from './arbitration/weights.js';
import {
  ResilientStore,
  type ResilientStoreDeps,
} from './resilience/resilientStore.js';
import { scoreCandidates } from './scoring/compositeScore.js';
import {
  defaultContradictionDetector,
  type ContradictionDetector,
} from './scoring/contradiction.js';
import { selectCandidates } from './selection/candidateSelection.js';
import { mmr } from './selection/mmr.js';
import type { StoreClient } from './store/store.js';
import type {
  ActiveBeliefSet,
  CircuitState,
  MemoryHit,
  MemoryRetriever,
  MemorySearchOptions,
  RankedCandidate,
  RetrievalDiagnostics,
  RetrievalReason,
  RetrievalResult,
  RetrieveOptions,
} from './types.js';

/**
 * Where the active belief snapshot comes from. Functions are called once
 * per query.
 */
export type BeliefSource =
  | ActiveBeliefSet
  | (() => ActiveBeliefSet | Promise<ActiveBeliefSet>);

/**
 * Options for creating a RankedMemoryRetriever.
 */
export interface RankedMemoryRetrieverOptions {
  /** Vector store to search */
  store: StoreClient;

  /** Embedding client for queries */
  embeddings: EmbeddingClient;

  /** Configuration (default: loaded from the environment) */
  config?: RetrievalConfig;

  /** Active belief tags (default: none) */
  beliefs?: BeliefSource;

  /** Learned arbitration profile; without one only intent weights apply */
  profiles?: ArbitrationProfileStore;

  /** Contradiction hook (default: flag + assertion detector) */
  detector?: ContradictionDetector;

  /** Injectable clock, sleep and random sources */
  deps?: ResilientStoreDeps;
}

/**
 * A ranked entry together with the embedding MMR needs.
 */
interface OrderableEntry {
  entry: ArbitratedCandidate;
  embedding?: readonly number[];
}

/**
 * Ranked retrieval of memories for a request.
 *
 * @example
 * ```typescript
 * const retriever = new RankedMemoryRetriever({
 *   store: new InMemoryStore(384),
 *   embeddings,
 *   beliefs: () => loadActiveBeliefs({ filePath: 'beliefs.json' }),
 * });
 *
 * const result = await retriever.retrieve('How do I rotate the deploy keys?', {
 *   signal,
 *   topK: 8,
 * });
 * if (result.reason === 'ok') {
 *   prompt += formatRankedCandidates(result.candidates);
 * }
 * ```
 */
export class RankedMemoryRetriever implements MemoryRetriever {
  private readonly embeddings: EmbeddingClient;
  private readonly config: RetrievalConfig;
  private readonly beliefs?: BeliefSource;
  private readonly profiles?: ArbitrationProfileStore;
  private readonly detector: ContradictionDetector;
  private readonly resilientStore: ResilientStore;
  private readonly now: () => number;

  constructor(options: RankedMemoryRetrieverOptions) {
    this.embeddings = options.embeddings;
    this.config = options.config ?? loadRetrievalConfig();
    this.beliefs = options.beliefs;
    this.profiles = options.profiles;
    this.detector = options.detector ?? defaultContradictionDetector;
    this.now = options.deps?.now ?? Date.now;
    this.resilientStore = new ResilientStore(
      options.store,
      this.config.resilience,
      options.deps,
    );
  }

  getConfig(): RetrievalConfig {
    return this.config;
  }

  getBreakerState(): CircuitState {
    return this.resilientStore.getBreaker().getState();
  }

  /**
   * Retrieve, score, select and order memories for a request.
   *
   * @param request - The current user request (string or Parts)
   * @param options - Retrieval options
   */
  async retrieve(
    request: string | Part[],
    options: RetrieveOptions = {},
  ): Promise<RetrievalResult> {
    const startedAt = this.now();
    const queryId = uuidv4();
    const { signal } = options;
    const topK = options.topK ?? this.config.retrieval.topK;
    const query = extractQueryText(request);
    const intent = options.intent ?? detectQueryIntent(query);

    const finish = (
      reason: RetrievalReason,
      candidates: RankedCandidate[] = [],
      diagnostics: Partial<RetrievalDiagnostics> = {},
    ): RetrievalResult => {
      const result: RetrievalResult = {
        queryId,
        intent,
        candidates,
        reason,
        diagnostics: {
          retrieved: 0,
          dropped: 0,
          selected: 0,
          attempts: 0,
          breakerState: this.getBreakerState(),
          ...diagnostics,
          returned: candidates.length,
          durationMs: this.now() - startedAt,
        },
      };
      debugLogger.log(
        `RankedMemoryRetriever: query=${queryId} intent=${intent} reason=${reason} returned=${candidates.length}`,
      );
      return result;
    };

    if (signal?.aborted) {
      return finish('cancelled');
    }
    if (!query) {
      return finish('empty_query');
    }

    debugLogger.log(
      `RankedMemoryRetriever: query="${query.slice(0, 50)}...", intent=${intent}, topK=${topK}`,
    );

    // 1. Embed
    let queryVector: number[];
    try {
      queryVector = await this.embeddings.embedOne(query, signal);
    } catch (error) {
      if (signal?.aborted) {
        return finish('cancelled');
      }
      debugLogger.warn(
        `RankedMemoryRetriever: Failed to embed query: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return finish('embedding_failed');
    }
    if (signal?.aborted) {
      return finish('cancelled');
    }
    if (queryVector.length === 0) {
      debugLogger.warn('RankedMemoryRetriever: Empty query embedding');
      return finish('embedding_failed');
    }

    // 2. Fetch (over-retrieve)
    const fetched = await this.resilientStore.fetch(
      queryVector,
      this.config.retrieval.candidatePoolSize,
      signal,
    );
    const fetchDiagnostics: Partial<RetrievalDiagnostics> = {
      retrieved: fetched.candidates.length,
      dropped: fetched.dropped,
      attempts: fetched.attempts,
      breakerState: fetched.breakerState,
    };
    if (fetched.reason !== 'ok') {
      return finish(fetched.reason, [], fetchDiagnostics);
    }
    if (fetched.candidates.length === 0) {
      return finish('no_candidates', [], fetchDiagnostics);
    }

    // 3. Score
    const beliefs = await this.loadBeliefs();
    const now = new Date(this.now());
    const scored = scoreCandidates(
      fetched.candidates,
      queryVector,
      this.config.scoring,
      {
        beliefs,
        now,
        alreadySelected: options.alreadySelected,
        detector: this.detector,
      },
    );

    // 4. Select (diversity is applied once, at the end)
    const selection = selectCandidates(
      query,
      scored.map((s) => s.candidate),
      { ...this.config.selection, mmrEnabled: false },
    );
    const selectedDiagnostics: Partial<RetrievalDiagnostics> = {
      ...fetchDiagnostics,
      selected: selection.selected.length,
      stages: selection.stages,
      beliefVersion: beliefs.version,
    };
    if (selection.selected.length === 0) {
      return finish(selection.reason, [], selectedDiagnostics);
    }
    const selectedIds = new Set(selection.selected.map((c) => c.id));
    // Keyword boost feeds the ranking similarity, so boosted hits are re-scored.
    const kept = selection.stages.keywordBoostApplied
      ? scoreCandidates(selection.selected, queryVector, this.config.scoring, {
          beliefs,
          now,
          alreadySelected: options.alreadySelected,
          detector: this.detector,
          similarityOverrides: selection.boostedSimilarity,
        })
      : scored.filter((s) => selectedIds.has(s.candidate.id));

    // 5. Arbitrate
    const arbitration = this.config.arbitration;
    let entries: ArbitratedCandidate[];
    let weights: ClassWeights | undefined;
    if (arbitration.enabled) {
      ({ ranked: entries, weights } = arbitrate(
        kept,
        intent,
        arbitration,
        this.profiles?.get(),
      ));
    } else {
      entries = kept.map((s) => ({
        scored: s,
        weight: 1,
        adjustedScore: s.finalScore,
        tags: [],
      }));
    }

    if (signal?.aborted) {
      return finish('cancelled', [], selectedDiagnostics);
    }

    // 6. Order
    let ordered = this.orderFinal(entries, queryVector.length, topK);
    if (arbitration.enabled) {
      ordered = resolveConflicts(ordered, arbitration.conflictPolicy, {
        conflictEpsilon: arbitration.conflictEpsilon,
        uncertainThreshold: arbitration.uncertainThreshold,
        now,
      });
    }

    const candidates = ordered.map((entry) =>
      toRankedCandidate(
        entry,
        selection.boostedSimilarity.get(entry.scored.candidate.id) ??
          entry.scored.candidate.rawSimilarity,
        arbitration.enabled,
      ),
    );

    return finish('ok', candidates, {
      ...selectedDiagnostics,
      arbitrationWeights: weights,
    });
  }

  /**
   * Top matches by store similarity only, without scoring.
   *
   * @param query - Search query string
   * @param options - Search options
   * @returns Array of memory hits
   */
  async search(
    query: string,
    options?: MemorySearchOptions,
  ): Promise<MemoryHit[]> {
    const { limit = this.config.retrieval.topK, signal } = options ?? {};

    if (signal?.aborted || !query.trim()) {
      return [];
    }

    let queryVector: number[];
    try {
      queryVector = await this.embeddings.embedOne(query, signal);
    } catch (error) {
      if (!signal?.aborted) {
        debugLogger.warn(
          `RankedMemoryRetriever: Search embedding failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
      return [];
    }
    if (signal?.aborted || queryVector.length === 0) {
      return [];
    }

    const fetched = await this.resilientStore.fetch(queryVector, limit, signal);
    return [...fetched.candidates]
      .sort((a, b) => b.rawSimilarity - a.rawSimilarity)
      .slice(0, limit)
      .map((c) => ({
        id: c.id,
        text: c.text,
        score: c.rawSimilarity,
        source: c.source,
      }));
  }

  // ============================================================================
  // Private helper methods
  // ============================================================================

  private async loadBeliefs(): Promise<ActiveBeliefSet> {
    const source = this.beliefs;
    if (!source) {
      return EMPTY_BELIEF_SET;
    }
    if (typeof source !== 'function') {
      return source;
    }
    try {
      return await source();
    } catch (error) {
      debugLogger.warn(
        `RankedMemoryRetriever: Failed to load active beliefs: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return EMPTY_BELIEF_SET;
    }
  }

  /**
   * MMR over rank scores, or a plain cut at `topK`.
   *
   * Embeddings from another space (possible only without
   * `strictDimensions`) are left out of the diversity term.
   */
  private orderFinal(
    entries: ArbitratedCandidate[],
    dimension: number,
    topK: number,
  ): ArbitratedCandidate[] {
    const retrieval = this.config.retrieval;
    if (!retrieval.finalMmrEnabled) {
      return entries.slice(0, topK);
    }
    const items: OrderableEntry[] = entries.map((entry) => {
      const embedding = entry.scored.candidate.embedding;
      return {
        entry,
        embedding:
          embedding && embedding.length === dimension ? embedding : undefined,
      };
    });
    return mmr(
      items,
      topK,
      retrieval.finalMmrLambda,
      (item) => item.entry.adjustedScore,
    ).map((item) => item.entry);
  }
}

/**
 * Extract text from a request (string or Part[]).
 */
export function extractQueryText(request: string | Part[]): string {
  if (typeof request === 'string') {
    return request.trim();
  }
  return request
    .map((part) => part.text)
    .filter((text): text is string => typeof text === 'string')
    .join(' ')
    .trim();
}

function toRankedCandidate(
  entry: ArbitratedCandidate,
  similarity: number,
  arbitrated: boolean,
): RankedCandidate {
  const { candidate, finalScore, breakdown } = entry.scored;
  return {
    id: candidate.id,
    text: candidate.text,
    source: candidate.source,
    finalScore,
    rankScore: entry.adjustedScore,
    similarity,
    breakdown,
    provenanceClass: candidate.provenanceClass,
    arbitration: arbitrated
      ? {
          weight: entry.weight,
          adjustedScore: entry.adjustedScore,
          tags: entry.tags,
        }
      : undefined,
  };
}

