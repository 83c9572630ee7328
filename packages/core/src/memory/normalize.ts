/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Boundary normalization of raw store hits into Candidates.
 *
 * Store payloads arrive as loosely typed maps, with camelCase or snake_case
 * keys depending on who wrote them. They are coerced exactly once, here;
 * everything downstream works on `Candidate` and never sees `unknown`.
 *
 * Malformed values never fail the batch. They become the documented
 * default for that field. Only a hit without a usable id is dropped.
 */

import { clamp01 } from './vectors.js';
import type { Candidate, ProvenanceClass } from './types.js';

export const CANDIDATE_DEFAULTS = {
  sourceTrust: 0.6,
  confidence: 0.5,
  importance: 0.5,
  timesUsed: 0,
} as const;

type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First defined value among `keys`, looked up in each record in turn.
 */
function pick(records: UnknownRecord[], ...keys: string[]): unknown {
  for (const record of records) {
    for (const key of keys) {
      const value = record[key];
      if (value !== undefined && value !== null) {
        return value;
      }
    }
  }
  return undefined;
}

export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    return ['1', 'true', 'yes', 'y'].includes(value.trim().toLowerCase());
  }
  return false;
}

function toOptionalString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.length > 0 ? value : undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/**
 * Accepts plain arrays and Float32/Float64 arrays. Anything containing a
 * non-finite entry, or empty, is treated as missing.
 */
export function toEmbedding(value: unknown): number[] | undefined {
  let values: unknown[];
  if (Array.isArray(value)) {
    values = value;
  } else if (value instanceof Float32Array || value instanceof Float64Array) {
    values = Array.from(value);
  } else {
    return undefined;
  }
  if (values.length === 0) {
    return undefined;
  }
  const out: number[] = [];
  for (const v of values) {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      return undefined;
    }
    out.push(v);
  }
  return out;
}

/**
 * Accepts Date, epoch milliseconds or a date string. Invalid → undefined.
 */
export function toTimestamp(value: unknown): Date | undefined {
  let date: Date | undefined;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'number') {
    date = new Date(value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    date = new Date(value);
  }
  if (!date || Number.isNaN(date.getTime())) {
    return undefined;
  }
  return date;
}

/**
 * Lower-case a belief tag and replace anything other than alphanumerics,
 * `:`, `_` and `.` with `_`.
 */
export function normalizeTag(tag: string): string {
  return tag
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9:_.]/g, '_');
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(
    (v): v is string => typeof v === 'string' && v.length > 0,
  );
}

/**
 * Belief tags may be plain strings or `{tag|label|key}` objects.
 */
export function extractBeliefTags(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const tags: string[] = [];
  for (const entry of value) {
    let raw: unknown = entry;
    if (isRecord(entry)) {
      raw = entry['tag'] ?? entry['label'] ?? entry['key'];
    }
    if (typeof raw === 'string') {
      const tag = normalizeTag(raw);
      if (tag) {
        tags.push(tag);
      }
    }
  }
  return tags;
}

const PROVENANCE_TAGS: ReadonlyArray<[string, ProvenanceClass]> = [
  ['procedural_active', 'procedural'],
  ['abstraction_active', 'abstraction'],
  ['episodic_active', 'episodic'],
];

function isProvenanceClass(value: unknown): value is ProvenanceClass {
  return (
    value === 'base' ||
    value === 'episodic' ||
    value === 'procedural' ||
    value === 'abstraction'
  );
}

/**
 * Explicit class first, then `type: "abstraction"`, then marker tags.
 */
export function detectProvenanceClass(
  explicit: unknown,
  type: unknown,
  tags: readonly string[],
): ProvenanceClass {
  if (typeof explicit === 'string') {
    const lowered = explicit.toLowerCase();
    if (isProvenanceClass(lowered)) {
      return lowered;
    }
  }
  if (typeof type === 'string' && type.toLowerCase() === 'abstraction') {
    return 'abstraction';
  }
  for (const [tag, cls] of PROVENANCE_TAGS) {
    if (tags.includes(tag)) {
      return cls;
    }
  }
  return 'base';
}

/**
 * Normalize one raw hit.
 *
 * The hit may be `{id, similarity, payload}` as returned by a StoreClient
 * or a flat record; payload fields take precedence over top-level ones.
 *
 * @returns The candidate, or undefined if the hit has no usable id
 */
export function normalizeCandidate(hit: unknown): Candidate | undefined {
  if (!isRecord(hit)) {
    return undefined;
  }
  const payload = isRecord(hit['payload']) ? hit['payload'] : {};
  const sources = [payload, hit];

  const id = toOptionalString(pick([hit, payload], 'id', '_id', 'uuid'));
  if (id === undefined) {
    return undefined;
  }

  const tags = toStringList(pick(sources, 'tags'));
  const numberOr = (fallback: number, ...keys: string[]): number =>
    toFiniteNumber(pick(sources, ...keys)) ?? fallback;

  return {
    id,
    embedding: toEmbedding(pick([hit, payload], 'embedding', 'vector')),
    rawSimilarity: clamp01(
      toFiniteNumber(pick([hit, payload], 'similarity', 'score', '_similarity')) ??
        0,
    ),
    text: toOptionalString(pick(sources, 'text', 'content')) ?? '',
    source: toOptionalString(pick(sources, 'source')),
    tags,
    timestamp: toTimestamp(
      pick(
        sources,
        'timestamp',
        'timestampUTC',
        'timestamp_utc',
        'createdAt',
        'created_at',
      ),
    ),
    sourceTrust: clamp01(
      numberOr(CANDIDATE_DEFAULTS.sourceTrust, 'sourceTrust', 'source_trust'),
    ),
    confidence: clamp01(numberOr(CANDIDATE_DEFAULTS.confidence, 'confidence')),
    importance: clamp01(numberOr(CANDIDATE_DEFAULTS.importance, 'importance')),
    beliefTags: extractBeliefTags(
      pick(sources, 'beliefTags', 'belief_tags', 'beliefs'),
    ),
    timesUsed: Math.max(
      0,
      Math.floor(
        numberOr(CANDIDATE_DEFAULTS.timesUsed, 'timesUsed', 'times_used'),
      ),
    ),
    contradictionFlag: toBoolean(
      pick(sources, 'contradictionFlag', 'contradiction_flag', 'contradiction'),
    ),
    conflictScore: Math.max(0, numberOr(0, 'conflictScore', 'conflict_score')),
    provenanceClass: detectProvenanceClass(
      pick(sources, 'provenanceClass', 'provenance_class'),
      pick(sources, 'type'),
      tags,
    ),
    assertionKey: toOptionalString(
      pick(sources, 'assertionKey', 'assertion_key'),
    ),
    assertionValue: toOptionalString(
      pick(sources, 'assertionValue', 'assertion_value'),
    ),
    payload,
  };
}

/**
 * Normalize a batch, dropping hits without an id.
 */
export function normalizeCandidates(hits: readonly unknown[]): {
  candidates: Candidate[];
  dropped: number;
} {
  const candidates: Candidate[] = [];
  let dropped = 0;
  for (const hit of hits) {
    const candidate = normalizeCandidate(hit);
    if (candidate) {
      candidates.push(candidate);
    } else {
      dropped++;
    }
  }
  return { candidates, dropped };
}
