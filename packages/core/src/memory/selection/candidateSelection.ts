/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Staged candidate selection.
 *
 * Stages, each optional except the first:
 * 1. Threshold filter on raw similarity
 * 2. Dynamic threshold: if nothing passed, retry at
 *    `min(threshold, max(floor, top * 0.98))`
 * 3. Keyword boost on the surviving hits (ranking only)
 * 4. MMR, only when every surviving hit carries an embedding
 * 5. Top-1 fallback
 * 6. Minimum-results backfill
 *
 * With every optional stage disabled this is exactly
 * `hits.filter(h => h.rawSimilarity >= threshold)`, in input order.
 */

import type { SelectionConfig } from '../config.js';
import type { SelectionStages } from '../types.js';
import { applyKeywordBoost } from './keywordBoost.js';
import { mmr } from './mmr.js';
import {
  buildSelectionTelemetry,
  emitSelectionTelemetry,
} from './telemetry.js';

const DYNAMIC_THRESHOLD_RATIO = 0.98;

export interface SelectableHit {
  id: string;
  rawSimilarity: number;
  text: string;
  tags: readonly string[];
  embedding?: readonly number[];
}

export interface SelectionResult<T extends SelectableHit> {
  selected: T[];
  /** Similarity each selected hit was ranked by (raw plus keyword boost) */
  boostedSimilarity: Map<string, number>;
  stages: SelectionStages;
  reason: 'ok' | 'no_candidates' | 'below_threshold';
}

interface Entry<T> {
  hit: T;
  similarity: number;
}

function byRawSimilarityDesc<T extends SelectableHit>(hits: readonly T[]): T[] {
  return [...hits].sort((a, b) => b.rawSimilarity - a.rawSimilarity);
}

/**
 * Select candidates from raw hits. Pure given its inputs, so running it
 * twice on the same input yields the same output.
 */
export function selectCandidates<T extends SelectableHit>(
  query: string,
  hits: readonly T[],
  cfg: SelectionConfig,
): SelectionResult<T> {
  const stages: SelectionStages = {
    thresholdUsed: cfg.threshold,
    dynamicThresholdApplied: false,
    keywordBoostApplied: false,
    mmrApplied: false,
    top1FallbackApplied: false,
    minResultsBackfillApplied: false,
  };
  const raw = (hit: T): Entry<T> => ({ hit, similarity: hit.rawSimilarity });

  // 1. Threshold
  let entries: Array<Entry<T>> = hits
    .filter((h) => h.rawSimilarity >= cfg.threshold)
    .map(raw);

  // 2. Dynamic threshold
  if (cfg.dynamicThresholdEnabled && entries.length === 0 && hits.length > 0) {
    const sorted = byRawSimilarityDesc(hits);
    const used = Math.min(
      cfg.threshold,
      Math.max(
        cfg.floorThreshold,
        sorted[0].rawSimilarity * DYNAMIC_THRESHOLD_RATIO,
      ),
    );
    entries = sorted.filter((h) => h.rawSimilarity >= used).map(raw);
    stages.thresholdUsed = used;
    stages.dynamicThresholdApplied = true;
  }

  // 3. Keyword boost
  if (cfg.keywordBoostEnabled && entries.length > 0) {
    const result = applyKeywordBoost(entries, query, {
      fields: cfg.keywordFields,
      unit: cfg.keywordBoostUnit,
      cap: cfg.keywordBoostCap,
    });
    entries = result.entries;
    stages.keywordBoostApplied = result.boosted > 0;
  }

  // 4. MMR
  if (
    cfg.mmrEnabled &&
    entries.length > 0 &&
    entries.every((e) => e.hit.embedding && e.hit.embedding.length > 0)
  ) {
    entries = mmr(
      entries.map((e) => ({ ...e, embedding: e.hit.embedding })),
      cfg.mmrK,
      cfg.mmrLambda,
      (e) => e.similarity,
    ).map(({ hit, similarity }) => ({ hit, similarity }));
    stages.mmrApplied = true;
  }

  // 5. Top-1
  if (cfg.top1FallbackEnabled && entries.length === 0 && hits.length > 0) {
    let best = hits[0];
    for (const hit of hits) {
      if (hit.rawSimilarity > best.rawSimilarity) {
        best = hit;
      }
    }
    entries = [raw(best)];
    stages.top1FallbackApplied = true;
  }

  // 6. Minimum results
  if (entries.length === 0 && cfg.minResults > 0 && hits.length > 0) {
    entries = byRawSimilarityDesc(hits).slice(0, cfg.minResults).map(raw);
    stages.minResultsBackfillApplied = true;
  }

  const selected = entries.map((e) => e.hit);
  const boostedSimilarity = new Map<string, number>(
    entries.map((e) => [e.hit.id, e.similarity]),
  );

  if (cfg.logTelemetry) {
    emitSelectionTelemetry(
      buildSelectionTelemetry(
        query,
        hits,
        selected,
        (hit) => boostedSimilarity.get(hit.id) ?? hit.rawSimilarity,
        cfg,
      ),
    );
  }

  return {
    selected,
    boostedSimilarity,
    stages,
    reason:
      hits.length === 0
        ? 'no_candidates'
        : selected.length === 0
          ? 'below_threshold'
          : 'ok',
  };
}
