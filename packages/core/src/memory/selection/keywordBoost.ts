/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Lexical keyword boost for selection ranking.
 */

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Case-insensitive word tokens.
 */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(TOKEN_PATTERN) ?? []);
}

export interface KeywordSearchable {
  text: string;
  tags: readonly string[];
}

function haystackFor(hit: KeywordSearchable, fields: readonly string[]): string {
  const parts: string[] = [];
  for (const field of fields) {
    const name = field.trim().toLowerCase();
    if (name === 'content' || name === 'text') {
      parts.push(hit.text);
    } else if (name === 'tags') {
      parts.push(hit.tags.join(' '));
    }
  }
  return parts.join(' \n ');
}

export interface KeywordBoostOptions {
  fields: readonly string[];
  /** Boost per overlapping token */
  unit: number;
  /** Maximum boost per hit */
  cap: number;
}

/**
 * Boost for one hit: `min(cap, unit * |queryTokens ∩ hitTokens|)`.
 */
export function keywordBoostFor(
  queryTokens: ReadonlySet<string>,
  hit: KeywordSearchable,
  options: KeywordBoostOptions,
): number {
  if (queryTokens.size === 0) {
    return 0;
  }
  let overlap = 0;
  for (const token of tokenize(haystackFor(hit, options.fields))) {
    if (queryTokens.has(token)) {
      overlap++;
    }
  }
  return Math.min(options.cap, options.unit * overlap);
}

/**
 * Add the keyword boost to each entry's similarity (capped at 1) and
 * re-sort by the boosted value. Entries are copied, not mutated.
 */
export function applyKeywordBoost<T extends KeywordSearchable>(
  entries: ReadonlyArray<{ hit: T; similarity: number }>,
  query: string,
  options: KeywordBoostOptions,
): { entries: Array<{ hit: T; similarity: number }>; boosted: number } {
  const queryTokens = tokenize(query);
  let boosted = 0;
  const out = entries.map((entry) => {
    const extra = keywordBoostFor(queryTokens, entry.hit, options);
    if (extra > 0) {
      boosted++;
      return { hit: entry.hit, similarity: Math.min(1, entry.similarity + extra) };
    }
    return { hit: entry.hit, similarity: entry.similarity };
  });
  out.sort((a, b) => b.similarity - a.similarity);
  return { entries: out, boosted };
}
