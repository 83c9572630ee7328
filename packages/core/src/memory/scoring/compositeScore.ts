/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Composite multiplicative scoring.
 *
 * ```
 * base       = w_sim * similarity
 * multiplier = (1 + w_rec*recency)
 *            * (1 + w_cred*(credibility - 0.5))
 *            * (1 + w_conf*(confidence - 0.5))
 *            * (1 + w_bel*(beliefAlignment - 0.5))
 *            * (1 + w_use*usage)
 *            * (1 + w_nov*novelty)
 *            * (1 - conflictPenalty)            // only when contradicted
 * final      = base * multiplier
 * ```
 *
 * Each factor is computed independently from the candidate, the query
 * vector and the passed-in context. Nothing here reads ambient state.
 */

import { debugLogger } from '../../utils/debugLogger.js';
import type { ScoringConfig } from '../config.js';
import type {
  ActiveBeliefSet,
  Candidate,
  ScoreBreakdown,
  ScoredCandidate,
} from '../types.js';
import { DimensionMismatchError, clamp01, cosine, meanCosine } from '../vectors.js';
import { beliefAlignment } from './beliefAlignment.js';
import type { ContradictionDetector } from './contradiction.js';

const MS_PER_DAY = 86_400_000;
const USAGE_RATE = 0.1;

export interface ScoringContext {
  beliefs: ActiveBeliefSet;
  /** Reference time for recency */
  now: Date;
  /** Whether the candidate is contradicted by a favored candidate */
  contradicted?: boolean;
  /** Ranking similarity to use in place of the cosine (keyword-boosted) */
  similarity?: number;
}

export function ageInDays(timestamp: Date | undefined, now: Date): number {
  if (!timestamp) {
    return 0;
  }
  return Math.max(0, (now.getTime() - timestamp.getTime()) / MS_PER_DAY);
}

export function recencyFactor(ageDays: number, decayLambda: number): number {
  return Math.exp(-decayLambda * ageDays);
}

/** Saturating: `1 - exp(-0.1 * timesUsed)`. */
export function usageFactor(timesUsed: number): number {
  return 1 - Math.exp(-USAGE_RATE * Math.max(0, timesUsed));
}

export function noveltyFactor(
  embedding: readonly number[] | undefined,
  alreadySelected: ReadonlyArray<readonly number[]>,
): number {
  if (!embedding || alreadySelected.length === 0) {
    return 0;
  }
  return 1 - meanCosine(embedding, alreadySelected);
}

/**
 * Score a single candidate.
 *
 * @throws DimensionMismatchError if the candidate's embedding and the
 *   query vector come from different spaces
 */
export function computeCompositeScore(
  candidate: Candidate,
  queryVector: readonly number[] | undefined,
  alreadySelected: ReadonlyArray<readonly number[]>,
  config: ScoringConfig,
  context: ScoringContext,
): { finalScore: number; breakdown: ScoreBreakdown } {
  const w = config.weights;

  const cosineSimilarity = cosine(candidate.embedding, queryVector);
  const similarity =
    context.similarity === undefined
      ? cosineSimilarity
      : clamp01(context.similarity);
  const recency = recencyFactor(
    ageInDays(candidate.timestamp, context.now),
    config.decayLambda,
  );
  const credibility = clamp01(candidate.sourceTrust);
  const confidence = clamp01(candidate.confidence);
  const alignment = config.beliefScoringEnabled
    ? beliefAlignment(candidate.beliefTags, context.beliefs, {
        alpha: config.beliefAlpha,
        importanceBoost: config.importanceBoost,
        importantPrefixes: config.importantPrefixes,
      })
    : 0.5;
  const usage = usageFactor(candidate.timesUsed);
  const novelty = noveltyFactor(candidate.embedding, alreadySelected);
  const conflictPenalty =
    config.contradictionsEnabled && context.contradicted
      ? config.contradictionPenalty
      : 0;

  const base = w.similarity * similarity;
  let multiplier =
    (1 + w.recency * recency) *
    (1 + w.credibility * (credibility - 0.5)) *
    (1 + w.confidence * (confidence - 0.5)) *
    (1 + w.beliefAlignment * (alignment - 0.5)) *
    (1 + w.usage * usage) *
    (1 + w.novelty * novelty);
  if (conflictPenalty > 0) {
    multiplier *= Math.max(0, 1 - conflictPenalty);
  }
  const finalScore = base * multiplier;

  return {
    finalScore,
    breakdown: {
      similarity,
      recency,
      credibility,
      confidence,
      beliefAlignment: alignment,
      usage,
      novelty,
      conflictPenalty,
      final: finalScore,
    },
  };
}

const ZERO_BREAKDOWN: ScoreBreakdown = Object.freeze({
  similarity: 0,
  recency: 0,
  credibility: 0,
  confidence: 0,
  beliefAlignment: 0,
  usage: 0,
  novelty: 0,
  conflictPenalty: 0,
  final: 0,
});

/**
 * Highest score first; ties broken by id so the order is reproducible.
 */
export function compareScored(
  a: { finalScore: number; candidate: { id: string } },
  b: { finalScore: number; candidate: { id: string } },
): number {
  if (b.finalScore !== a.finalScore) {
    return b.finalScore - a.finalScore;
  }
  return a.candidate.id < b.candidate.id
    ? -1
    : a.candidate.id > b.candidate.id
      ? 1
      : 0;
}

export interface ScoreBatchOptions {
  beliefs: ActiveBeliefSet;
  now?: Date;
  /** Embeddings already in context, for novelty */
  alreadySelected?: ReadonlyArray<readonly number[]>;
  detector?: ContradictionDetector;
  /** Per-id ranking similarity overriding the cosine, e.g. after keyword boost */
  similarityOverrides?: ReadonlyMap<string, number>;
}

/**
 * Score a batch and return it sorted by score.
 *
 * Candidates are scored independently. When contradictions are enabled, a
 * second pass re-scores each candidate the detector flags against the
 * candidates ranked above it on the first pass.
 *
 * Dimension mismatches are rethrown when `strictDimensions` is set;
 * otherwise the candidate is logged and scores zero.
 */
export function scoreCandidates(
  candidates: readonly Candidate[],
  queryVector: readonly number[],
  config: ScoringConfig,
  options: ScoreBatchOptions,
): ScoredCandidate[] {
  const now = options.now ?? new Date();
  const alreadySelected = options.alreadySelected ?? [];

  const scoreOne = (
    candidate: Candidate,
    contradicted: boolean,
  ): ScoredCandidate => {
    try {
      const { finalScore, breakdown } = computeCompositeScore(
        candidate,
        queryVector,
        alreadySelected,
        config,
        {
          beliefs: options.beliefs,
          now,
          contradicted,
          similarity: options.similarityOverrides?.get(candidate.id),
        },
      );
      return { candidate, finalScore, breakdown };
    } catch (error) {
      if (error instanceof DimensionMismatchError && !config.strictDimensions) {
        debugLogger.warn(
          `scoreCandidates: Skipping ${candidate.id}: ${error.message}`,
        );
        return { candidate, finalScore: 0, breakdown: { ...ZERO_BREAKDOWN } };
      }
      throw error;
    }
  };

  const firstPass = candidates
    .map((candidate) => scoreOne(candidate, false))
    .sort(compareScored);

  const detector = options.detector;
  if (!config.contradictionsEnabled || !detector) {
    return firstPass;
  }

  return firstPass
    .map((scored, index) =>
      detector.isContradicted(scored.candidate, firstPass.slice(0, index))
        ? scoreOne(scored.candidate, true)
        : scored,
    )
    .sort(compareScored);
}
