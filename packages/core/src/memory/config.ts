/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Validated configuration for the retrieval core.
 *
 * Configuration is built once (defaults ← `RECALL_*` environment variables
 * ← programmatic overrides) and passed down by reference. Every field is
 * validated on its own: an invalid value falls back to that field's
 * default and is reported with a single warning per key, so a bad value
 * never stops retrieval.
 *
 * ## Environment variables
 *
 * | Variable                          | Field                                 |
 * | --------------------------------- | ------------------------------------- |
 * | RECALL_THRESHOLD                  | selection.threshold                   |
 * | RECALL_DYNAMIC_THRESHOLD          | selection.dynamicThresholdEnabled     |
 * | RECALL_DYNAMIC_FLOOR              | selection.floorThreshold              |
 * | RECALL_TOP1_FALLBACK              | selection.top1FallbackEnabled         |
 * | RECALL_MIN_RESULTS                | selection.minResults                  |
 * | RECALL_KEYWORD_BOOST              | selection.keywordBoostEnabled         |
 * | RECALL_KEYWORD_FIELDS             | selection.keywordFields (csv)         |
 * | RECALL_MMR_ENABLED / _LAMBDA / _K | selection.mmr*                        |
 * | RECALL_LOG_TELEMETRY              | selection.logTelemetry                |
 * | RECALL_SCORING_WEIGHTS            | scoring.weights (`sim=1.0,rec=0.6`)   |
 * | RECALL_DECAY_LAMBDA               | scoring.decayLambda                   |
 * | RECALL_CONFLICT_PENALTY           | scoring.contradictionPenalty          |
 * | RECALL_ARBITRATION_ENABLED        | arbitration.enabled                   |
 * | RECALL_ARB_MULT_<INTENT>_<CLASS>  | arbitration.intentMultipliers         |
 * | RECALL_META_ARB_*                 | learning.*                            |
 * | RECALL_BREAKER_* / RECALL_STORE_* | resilience.*                          |
 */

import { z } from 'zod';
import { debugLogger } from '../utils/debugLogger.js';
import { DEFAULT_CLASS_FLOOR } from './arbitration/provenance.js';
import {
  PROVENANCE_CLASSES,
  type ProvenanceClass,
  type QueryIntent,
} from './types.js';

const warnedKeys = new Set<string>();

function warnOnce(key: string, input: unknown, fallback: unknown): void {
  if (warnedKeys.has(key)) {
    return;
  }
  warnedKeys.add(key);
  debugLogger.warn(
    `RetrievalConfig: Invalid value for ${key} (${JSON.stringify(input)}), using default ${JSON.stringify(fallback)}`,
  );
}

/**
 * Forget which keys have already been warned about. Test-only.
 */
export function resetConfigWarnings(): void {
  warnedKeys.clear();
}

interface NumberBounds {
  min?: number;
  max?: number;
  int?: boolean;
}

function num(key: string, fallback: number, bounds: NumberBounds = {}) {
  let schema = z.number().finite();
  if (bounds.int) {
    schema = schema.int();
  }
  if (bounds.min !== undefined) {
    schema = schema.min(bounds.min);
  }
  if (bounds.max !== undefined) {
    schema = schema.max(bounds.max);
  }
  return schema.default(fallback).catch((ctx) => {
    warnOnce(key, ctx.input, fallback);
    return fallback;
  });
}

function bool(key: string, fallback: boolean) {
  return z
    .boolean()
    .default(fallback)
    .catch((ctx) => {
      warnOnce(key, ctx.input, fallback);
      return fallback;
    });
}

function stringList(key: string, fallback: string[]) {
  return z
    .array(z.string().min(1))
    .min(1)
    .default(fallback)
    .catch((ctx) => {
      warnOnce(key, ctx.input, fallback);
      return fallback;
    });
}

function classTable(
  key: string,
  fallback: Record<ProvenanceClass, number>,
) {
  return z
    .object({
      base: num(`${key}.base`, fallback.base, { min: 0 }),
      episodic: num(`${key}.episodic`, fallback.episodic, { min: 0 }),
      procedural: num(`${key}.procedural`, fallback.procedural, { min: 0 }),
      abstraction: num(`${key}.abstraction`, fallback.abstraction, { min: 0 }),
    })
    .default({});
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SCORING_WEIGHTS = {
  similarity: 1.0,
  recency: 0.6,
  credibility: 0.5,
  confidence: 0.3,
  beliefAlignment: 0.4,
  usage: 0.2,
  novelty: 0.1,
} as const;

const UNIFORM_CLASS_WEIGHTS = {
  base: 0.25,
  episodic: 0.25,
  procedural: 0.25,
  abstraction: 0.25,
} as const;

/** Intent multipliers: how favours procedural, why favours abstraction. */
export const DEFAULT_INTENT_MULTIPLIERS = {
  how: { base: 0.8, episodic: 1.0, procedural: 1.5, abstraction: 0.9 },
  why: { base: 0.8, episodic: 1.0, procedural: 0.9, abstraction: 1.5 },
  fact: { base: 1.3, episodic: 1.3, procedural: 0.9, abstraction: 0.9 },
} as const;

const CONFLICT_POLICIES = [
  'hierarchical',
  'confidence',
  'recency',
  'uncertain',
] as const;

export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

// ============================================================================
// Schema
// ============================================================================

const selectionSchema = z
  .object({
    threshold: num('selection.threshold', 0.3, { min: 0, max: 1 }),
    dynamicThresholdEnabled: bool('selection.dynamicThresholdEnabled', false),
    floorThreshold: num('selection.floorThreshold', 0.15, { min: 0, max: 1 }),
    top1FallbackEnabled: bool('selection.top1FallbackEnabled', false),
    minResults: num('selection.minResults', 0, { min: 0, int: true }),
    keywordBoostEnabled: bool('selection.keywordBoostEnabled', false),
    keywordFields: stringList('selection.keywordFields', ['content', 'tags']),
    keywordBoostUnit: num('selection.keywordBoostUnit', 0.05, {
      min: 0,
      max: 1,
    }),
    keywordBoostCap: num('selection.keywordBoostCap', 0.15, {
      min: 0,
      max: 1,
    }),
    mmrEnabled: bool('selection.mmrEnabled', false),
    mmrLambda: num('selection.mmrLambda', 0.7, { min: 0, max: 1 }),
    mmrK: num('selection.mmrK', 5, { min: 1, int: true }),
    logTelemetry: bool('selection.logTelemetry', false),
    previewChars: num('selection.previewChars', 160, { min: 24, int: true }),
  })
  .default({});

const scoringSchema = z
  .object({
    weights: z
      .object({
        similarity: num(
          'scoring.weights.similarity',
          DEFAULT_SCORING_WEIGHTS.similarity,
          { min: 0 },
        ),
        recency: num('scoring.weights.recency', DEFAULT_SCORING_WEIGHTS.recency, {
          min: 0,
        }),
        credibility: num(
          'scoring.weights.credibility',
          DEFAULT_SCORING_WEIGHTS.credibility,
          { min: 0 },
        ),
        confidence: num(
          'scoring.weights.confidence',
          DEFAULT_SCORING_WEIGHTS.confidence,
          { min: 0 },
        ),
        beliefAlignment: num(
          'scoring.weights.beliefAlignment',
          DEFAULT_SCORING_WEIGHTS.beliefAlignment,
          { min: 0 },
        ),
        usage: num('scoring.weights.usage', DEFAULT_SCORING_WEIGHTS.usage, {
          min: 0,
        }),
        novelty: num('scoring.weights.novelty', DEFAULT_SCORING_WEIGHTS.novelty, {
          min: 0,
        }),
      })
      .default({}),
    decayLambda: num('scoring.decayLambda', 0.015, { min: 0 }),
    beliefScoringEnabled: bool('scoring.beliefScoringEnabled', true),
    beliefAlpha: num('scoring.beliefAlpha', 0.1, { min: 0 }),
    importanceBoost: num('scoring.importanceBoost', 0.1, { min: 0, max: 1 }),
    importantPrefixes: stringList('scoring.importantPrefixes', [
      'core.identity',
      'core.ethic',
    ]),
    contradictionsEnabled: bool('scoring.contradictionsEnabled', true),
    contradictionPenalty: num('scoring.contradictionPenalty', 0.05, {
      min: 0,
      max: 1,
    }),
    strictDimensions: bool('scoring.strictDimensions', true),
  })
  .default({});

const arbitrationSchema = z
  .object({
    enabled: bool('arbitration.enabled', true),
    mode: z
      .enum(['context', 'static'])
      .default('context')
      .catch((ctx) => {
        warnOnce('arbitration.mode', ctx.input, 'context');
        return 'context';
      }),
    strength: num('arbitration.strength', 0.5, { min: 0, max: 1 }),
    baseWeights: classTable('arbitration.baseWeights', UNIFORM_CLASS_WEIGHTS),
    intentMultipliers: z
      .object({
        how: classTable(
          'arbitration.intentMultipliers.how',
          DEFAULT_INTENT_MULTIPLIERS.how,
        ),
        why: classTable(
          'arbitration.intentMultipliers.why',
          DEFAULT_INTENT_MULTIPLIERS.why,
        ),
        fact: classTable(
          'arbitration.intentMultipliers.fact',
          DEFAULT_INTENT_MULTIPLIERS.fact,
        ),
      })
      .default({}),
    conflictPolicy: z
      .enum(CONFLICT_POLICIES)
      .default('hierarchical')
      .catch((ctx) => {
        warnOnce('arbitration.conflictPolicy', ctx.input, 'hierarchical');
        return 'hierarchical';
      }),
    conflictEpsilon: num('arbitration.conflictEpsilon', 0.25, {
      min: 0,
      max: 1,
    }),
    uncertainThreshold: num('arbitration.uncertainThreshold', 0.2, {
      min: 0,
      max: 1,
    }),
  })
  .default({});

const learningSchema = z
  .object({
    enabled: bool('learning.enabled', false),
    observeOnly: bool('learning.observeOnly', false),
    maxShift: num('learning.maxShift', 0.1, { min: 0, max: 1 }),
    damping: num('learning.damping', 0.2, { min: 0, max: 1 }),
    floor: num('learning.floor', DEFAULT_CLASS_FLOOR, { min: 0, max: 0.25 }),
    windowSize: num('learning.windowSize', 200, { min: 1, int: true }),
    minIntervalSec: num('learning.minIntervalSec', 300, { min: 0 }),
    profilePath: z
      .string()
      .min(1)
      .optional()
      .catch((ctx) => {
        warnOnce('learning.profilePath', ctx.input, undefined);
        return undefined;
      }),
  })
  .default({});

const resilienceSchema = z
  .object({
    failureLimit: num('resilience.failureLimit', 3, { min: 1, int: true }),
    openDurationSec: num('resilience.openDurationSec', 20, { min: 0 }),
    maxRetries: num('resilience.maxRetries', 2, { min: 0, int: true }),
    timeoutMs: num('resilience.timeoutMs', 8000, { min: 1 }),
    backoffBaseMs: num('resilience.backoffBaseMs', 200, { min: 0 }),
  })
  .default({});

const retrievalSchema = z
  .object({
    topK: num('retrieval.topK', 8, { min: 1, int: true }),
    candidatePoolSize: num('retrieval.candidatePoolSize', 50, {
      min: 1,
      int: true,
    }),
    finalMmrEnabled: bool('retrieval.finalMmrEnabled', true),
    finalMmrLambda: num('retrieval.finalMmrLambda', 0.7, { min: 0, max: 1 }),
  })
  .default({});

export const retrievalConfigSchema = z.object({
  selection: selectionSchema,
  scoring: scoringSchema,
  arbitration: arbitrationSchema,
  learning: learningSchema,
  resilience: resilienceSchema,
  retrieval: retrievalSchema,
});

export type RetrievalConfig = z.infer<typeof retrievalConfigSchema>;
export type SelectionConfig = RetrievalConfig['selection'];
export type ScoringConfig = RetrievalConfig['scoring'];
export type ScoringWeights = ScoringConfig['weights'];
export type ArbitrationConfig = RetrievalConfig['arbitration'];
export type LearningConfig = RetrievalConfig['learning'];
export type ResilienceConfig = RetrievalConfig['resilience'];

/**
 * Partial overrides, merged one level deep over environment values.
 */
export type RetrievalConfigOverrides = {
  [S in keyof RetrievalConfig]?: Partial<RetrievalConfig[S]>;
};

// ============================================================================
// Environment parsing
// ============================================================================

type Env = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'n', 'off']);

function readRaw(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Unparseable input is passed through as the raw string so that the schema
 * rejects it and reports the key.
 */
function envNumber(env: Env, name: string): number | string | undefined {
  const raw = readRaw(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isNaN(value) ? raw : value;
}

function envBoolean(env: Env, name: string): boolean | string | undefined {
  const raw = readRaw(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const lowered = raw.toLowerCase();
  if (TRUE_VALUES.has(lowered)) {
    return true;
  }
  if (FALSE_VALUES.has(lowered)) {
    return false;
  }
  return raw;
}

function envList(env: Env, name: string): string[] | undefined {
  const raw = readRaw(env, name);
  if (raw === undefined) {
    return undefined;
  }
  return raw
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
}

const WEIGHT_ALIASES: Record<string, keyof ScoringWeights> = {
  sim: 'similarity',
  similarity: 'similarity',
  rec: 'recency',
  recency: 'recency',
  cred: 'credibility',
  credibility: 'credibility',
  conf: 'confidence',
  confidence: 'confidence',
  bel: 'beliefAlignment',
  belief: 'beliefAlignment',
  use: 'usage',
  usage: 'usage',
  nov: 'novelty',
  novelty: 'novelty',
};

/**
 * Parse `sim=1.0,rec=0.6,...`. Unknown names are ignored with a warning;
 * unparseable values reach the schema as strings and fall back there.
 */
export function parseWeightList(
  raw: string,
): Partial<Record<keyof ScoringWeights, number | string>> {
  const out: Partial<Record<keyof ScoringWeights, number | string>> = {};
  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) {
      continue;
    }
    const eq = trimmed.indexOf('=');
    const name = (eq === -1 ? trimmed : trimmed.slice(0, eq))
      .trim()
      .toLowerCase()
      .replace(/^w_/, '');
    const field = WEIGHT_ALIASES[name];
    if (!field) {
      warnOnce(`scoring.weights.${name}`, trimmed, 'ignored');
      continue;
    }
    const valueText = eq === -1 ? '' : trimmed.slice(eq + 1).trim();
    const value = Number(valueText);
    out[field] = valueText === '' || Number.isNaN(value) ? valueText : value;
  }
  return out;
}

function envClassTable(
  env: Env,
  prefix: string,
): Partial<Record<ProvenanceClass, number | string>> {
  const out: Partial<Record<ProvenanceClass, number | string>> = {};
  for (const cls of PROVENANCE_CLASSES) {
    const value = envNumber(env, `${prefix}_${cls.toUpperCase()}`);
    if (value !== undefined) {
      out[cls] = value;
    }
  }
  return out;
}

function intentTable(
  env: Env,
): Partial<Record<QueryIntent, Partial<Record<ProvenanceClass, number | string>>>> {
  return {
    how: envClassTable(env, 'RECALL_ARB_MULT_HOW'),
    why: envClassTable(env, 'RECALL_ARB_MULT_WHY'),
    fact: envClassTable(env, 'RECALL_ARB_MULT_FACT'),
  };
}

function withoutUndefined(
  values: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function fromEnv(env: Env): Record<string, Record<string, unknown>> {
  const weightsRaw = readRaw(env, 'RECALL_SCORING_WEIGHTS');
  const nodeEnv = readRaw(env, 'NODE_ENV');

  return {
    selection: withoutUndefined({
      threshold: envNumber(env, 'RECALL_THRESHOLD'),
      dynamicThresholdEnabled: envBoolean(env, 'RECALL_DYNAMIC_THRESHOLD'),
      floorThreshold: envNumber(env, 'RECALL_DYNAMIC_FLOOR'),
      top1FallbackEnabled: envBoolean(env, 'RECALL_TOP1_FALLBACK'),
      minResults: envNumber(env, 'RECALL_MIN_RESULTS'),
      keywordBoostEnabled: envBoolean(env, 'RECALL_KEYWORD_BOOST'),
      keywordFields: envList(env, 'RECALL_KEYWORD_FIELDS'),
      mmrEnabled: envBoolean(env, 'RECALL_MMR_ENABLED'),
      mmrLambda: envNumber(env, 'RECALL_MMR_LAMBDA'),
      mmrK: envNumber(env, 'RECALL_MMR_K'),
      logTelemetry: envBoolean(env, 'RECALL_LOG_TELEMETRY'),
      previewChars: envNumber(env, 'RECALL_LOG_PREVIEW_CHARS'),
    }),
    scoring: withoutUndefined({
      weights: weightsRaw === undefined ? undefined : parseWeightList(weightsRaw),
      decayLambda: envNumber(env, 'RECALL_DECAY_LAMBDA'),
      beliefScoringEnabled: envBoolean(env, 'RECALL_BELIEFS_ENABLED'),
      beliefAlpha: envNumber(env, 'RECALL_BELIEF_ALPHA'),
      importanceBoost: envNumber(env, 'RECALL_BELIEF_IMPORTANCE_BOOST'),
      importantPrefixes: envList(env, 'RECALL_BELIEF_IMPORTANT_PREFIXES'),
      contradictionsEnabled: envBoolean(env, 'RECALL_CONTRADICTIONS_ENABLED'),
      contradictionPenalty: envNumber(env, 'RECALL_CONFLICT_PENALTY'),
      strictDimensions:
        envBoolean(env, 'RECALL_STRICT_DIMENSIONS') ??
        nodeEnv !== 'production',
    }),
    arbitration: withoutUndefined({
      enabled: envBoolean(env, 'RECALL_ARBITRATION_ENABLED'),
      mode: readRaw(env, 'RECALL_ARBITRATION_MODE')?.toLowerCase(),
      strength: envNumber(env, 'RECALL_ARB_STRENGTH'),
      baseWeights: envClassTable(env, 'RECALL_ARB_BASE'),
      intentMultipliers: intentTable(env),
      conflictPolicy: readRaw(env, 'RECALL_ARB_CONFLICT_RESOLUTION')?.toLowerCase(),
      conflictEpsilon: envNumber(env, 'RECALL_ARB_CONFLICT_EPSILON'),
      uncertainThreshold: envNumber(env, 'RECALL_ARB_UNCERTAIN_THRESHOLD'),
    }),
    learning: withoutUndefined({
      enabled: envBoolean(env, 'RECALL_META_ARB_ENABLED'),
      observeOnly: envBoolean(env, 'RECALL_META_ARB_OBSERVE_ONLY'),
      maxShift: envNumber(env, 'RECALL_META_ARB_MAX_SHIFT'),
      damping: envNumber(env, 'RECALL_META_ARB_DAMPING'),
      floor: envNumber(env, 'RECALL_META_ARB_FLOOR'),
      windowSize: envNumber(env, 'RECALL_META_ARB_WINDOW'),
      minIntervalSec: envNumber(env, 'RECALL_META_ARB_MIN_INTERVAL_SEC'),
      profilePath: readRaw(env, 'RECALL_META_ARB_PROFILE_PATH'),
    }),
    resilience: withoutUndefined({
      failureLimit: envNumber(env, 'RECALL_BREAKER_FAILURE_LIMIT'),
      openDurationSec: envNumber(env, 'RECALL_BREAKER_OPEN_SEC'),
      maxRetries: envNumber(env, 'RECALL_STORE_MAX_RETRIES'),
      timeoutMs: envNumber(env, 'RECALL_STORE_TIMEOUT_MS'),
      backoffBaseMs: envNumber(env, 'RECALL_STORE_BACKOFF_MS'),
    }),
    retrieval: withoutUndefined({
      topK: envNumber(env, 'RECALL_TOP_K'),
      candidatePoolSize: envNumber(env, 'RECALL_CANDIDATE_POOL'),
      finalMmrEnabled: envBoolean(env, 'RECALL_FINAL_MMR'),
      finalMmrLambda: envNumber(env, 'RECALL_FINAL_MMR_LAMBDA'),
    }),
  };
}

export interface LoadRetrievalConfigOptions {
  /** Environment to read (default: process.env) */
  env?: Env;
  /** Programmatic overrides, applied over the environment */
  overrides?: RetrievalConfigOverrides;
}

/**
 * Build the retrieval configuration.
 *
 * Never throws: invalid values fall back to their defaults.
 *
 * @example
 * ```typescript
 * const config = loadRetrievalConfig({
 *   overrides: { selection: { dynamicThresholdEnabled: true } },
 * });
 * ```
 */
export function loadRetrievalConfig(
  options: LoadRetrievalConfigOptions = {},
): RetrievalConfig {
  const env = options.env ?? process.env;
  const raw = fromEnv(env);
  const overrides: Record<string, unknown> = options.overrides ?? {};

  for (const [section, values] of Object.entries(overrides)) {
    if (values !== null && typeof values === 'object') {
      raw[section] = { ...(raw[section] ?? {}), ...values };
    }
  }

  return retrievalConfigSchema.parse(raw);
}

/**
 * Configuration with every field at its default, ignoring the environment.
 */
export function defaultRetrievalConfig(): RetrievalConfig {
  return retrievalConfigSchema.parse({});
}
