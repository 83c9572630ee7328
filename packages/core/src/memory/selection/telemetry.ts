/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview One-line JSON telemetry for candidate selection.
 */

import { debugLogger } from '../../utils/debugLogger.js';
import type { SelectionConfig } from '../config.js';

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const URL_PATTERN = /https?:\/\/[^\s]+/g;
const SECRET_PATTERN =
  /(sk-[A-Za-z0-9]{16,}|api[_-]?key[:=][^\s]+|Bearer\s+[A-Za-z0-9._-]{16,})/gi;

/**
 * Mask emails, URLs and API-key shapes before text reaches a log line.
 */
export function scrub(text: string): string {
  return text
    .replace(EMAIL_PATTERN, '[EMAIL]')
    .replace(URL_PATTERN, '[URL]')
    .replace(SECRET_PATTERN, '[SECRET]');
}

interface TelemetryHit {
  id: string;
  rawSimilarity: number;
  text: string;
}

export interface SelectionTelemetry {
  event: 'vector_recall';
  ts: string;
  query: string;
  cfg: {
    threshold: number;
    dynamic: boolean;
    floor: number;
    top1: boolean;
    minResults: number;
    keywordBoost: boolean;
    mmr: boolean;
  };
  counts: { raw: number; aboveThreshold: number; selected: number };
  topSamples: Array<{ id: string; score: number; preview: string }>;
  version: 1;
}

export function buildSelectionTelemetry(
  query: string,
  hits: readonly TelemetryHit[],
  selected: readonly TelemetryHit[],
  similarityOf: (hit: TelemetryHit) => number,
  cfg: SelectionConfig,
  now: Date = new Date(),
): SelectionTelemetry {
  return {
    event: 'vector_recall',
    ts: now.toISOString(),
    query: scrub(query.slice(0, 200)),
    cfg: {
      threshold: cfg.threshold,
      dynamic: cfg.dynamicThresholdEnabled,
      floor: cfg.floorThreshold,
      top1: cfg.top1FallbackEnabled,
      minResults: cfg.minResults,
      keywordBoost: cfg.keywordBoostEnabled,
      mmr: cfg.mmrEnabled,
    },
    counts: {
      raw: hits.length,
      aboveThreshold: hits.filter((h) => h.rawSimilarity >= cfg.threshold)
        .length,
      selected: selected.length,
    },
    topSamples: selected.slice(0, 3).map((hit) => ({
      id: hit.id,
      score: Math.round(similarityOf(hit) * 10_000) / 10_000,
      preview: scrub(hit.text).slice(0, cfg.previewChars),
    })),
    version: 1,
  };
}

export function emitSelectionTelemetry(record: SelectionTelemetry): void {
  debugLogger.log(JSON.stringify(record));
}
