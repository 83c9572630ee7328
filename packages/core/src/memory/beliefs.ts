/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Active belief snapshots.
 *
 * The set of currently emphasized belief tags is passed to scoring as an
 * immutable, versioned snapshot. A new snapshot replaces the old one; a
 * snapshot is never edited in place.
 */

import { readFile } from 'node:fs/promises';
import { debugLogger } from '../utils/debugLogger.js';
import { normalizeTag } from './normalize.js';
import type { ActiveBeliefSet } from './types.js';

export const EMPTY_BELIEF_SET: ActiveBeliefSet = Object.freeze({
  version: 0,
  tags: new Set<string>(),
});

/**
 * Build a frozen snapshot from raw tags. Tags are normalized and
 * de-duplicated; empty tags are dropped.
 */
export function createActiveBeliefSet(
  tags: Iterable<string>,
  version = 1,
): ActiveBeliefSet {
  const normalized = new Set<string>();
  for (const tag of tags) {
    const t = normalizeTag(tag);
    if (t) {
      normalized.add(t);
    }
  }
  return Object.freeze({ version, tags: normalized });
}

export interface LoadActiveBeliefsOptions {
  /** JSON file holding an array of tag strings */
  filePath?: string;
  /** Tags emphasized by the current session */
  sessionTags?: Iterable<string>;
  /** Always-on system tags */
  systemTags?: Iterable<string>;
  version?: number;
}

/**
 * Aggregate belief tags from a JSON file and session/system sources.
 *
 * A missing or unreadable file contributes no tags; it is logged, not
 * thrown.
 */
export async function loadActiveBeliefs(
  options: LoadActiveBeliefsOptions = {},
): Promise<ActiveBeliefSet> {
  const tags: string[] = [
    ...(options.systemTags ?? []),
    ...(options.sessionTags ?? []),
  ];

  if (options.filePath) {
    try {
      const parsed: unknown = JSON.parse(
        await readFile(options.filePath, 'utf-8'),
      );
      if (Array.isArray(parsed)) {
        for (const entry of parsed) {
          if (typeof entry === 'string' || typeof entry === 'number') {
            tags.push(String(entry));
          }
        }
      } else {
        debugLogger.warn(
          `loadActiveBeliefs: ${options.filePath} is not a JSON array, ignoring`,
        );
      }
    } catch (error) {
      debugLogger.warn(
        `loadActiveBeliefs: Failed to read ${options.filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  return createActiveBeliefSet(tags, options.version ?? 1);
}
