/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Conflict policy for candidates asserting the same thing.
 *
 * Candidates that share an `assertionKey` conflict when their confidences
 * are within `conflictEpsilon` of the group leader (the best-ranked
 * member). Only the slots held by a conflicting set are reordered; every
 * other candidate keeps its position.
 *
 * - hierarchical: ranking order stands; the leader is the winner, marked
 *   uncertain when its confidence margin is below `uncertainThreshold`
 * - confidence: the most confident member takes the first slot
 * - recency: the newest member takes the first slot
 * - uncertain: every member is marked uncertain, no winner
 */

import type { ArbitrationConfig, ConflictPolicy } from '../config.js';
import type { ArbitrationTag, Candidate } from '../types.js';
import type { ArbitratedCandidate } from './weights.js';

export interface ResolveConflictsOptions
  extends Pick<ArbitrationConfig, 'conflictEpsilon' | 'uncertainThreshold'> {
  /** Reference time for candidates without a timestamp (default: now) */
  now?: Date;
}

function withTag(
  entry: ArbitratedCandidate,
  tag: ArbitrationTag,
): ArbitratedCandidate {
  return entry.tags.includes(tag)
    ? entry
    : { ...entry, tags: [...entry.tags, tag] };
}

/**
 * Index (into `members`) of the member with the largest key; earliest wins
 * ties.
 */
function argMax(
  members: readonly ArbitratedCandidate[],
  key: (candidate: Candidate) => number,
): number {
  let best = 0;
  for (let i = 1; i < members.length; i++) {
    if (key(members[i].scored.candidate) > key(members[best].scored.candidate)) {
      best = i;
    }
  }
  return best;
}

/**
 * Indices of each conflicting set, in ranking order, leader first.
 */
function findConflictSets(
  ranked: readonly ArbitratedCandidate[],
  epsilon: number,
): number[][] {
  const groups = new Map<string, number[]>();
  ranked.forEach((entry, index) => {
    const key = entry.scored.candidate.assertionKey;
    if (key === undefined) {
      return;
    }
    const group = groups.get(key);
    if (group) {
      group.push(index);
    } else {
      groups.set(key, [index]);
    }
  });

  const sets: number[][] = [];
  for (const group of groups.values()) {
    if (group.length < 2) {
      continue;
    }
    const [leader, ...rest] = group;
    const leaderConfidence = ranked[leader].scored.candidate.confidence;
    const contenders = rest.filter(
      (i) =>
        Math.abs(ranked[i].scored.candidate.confidence - leaderConfidence) <=
        epsilon,
    );
    if (contenders.length > 0) {
      sets.push([leader, ...contenders]);
    }
  }
  return sets;
}

export function resolveConflicts(
  ranked: readonly ArbitratedCandidate[],
  policy: ConflictPolicy,
  options: ResolveConflictsOptions,
): ArbitratedCandidate[] {
  const out = [...ranked];
  const nowMs = (options.now ?? new Date()).getTime();

  for (const slots of findConflictSets(ranked, options.conflictEpsilon)) {
    const members = slots.map((i) => ranked[i]);

    switch (policy) {
      case 'hierarchical': {
        const [leader, ...contenders] = members;
        const leaderConfidence = leader.scored.candidate.confidence;
        const closest = Math.min(
          ...contenders.map((c) =>
            Math.abs(leaderConfidence - c.scored.candidate.confidence),
          ),
        );
        let winner = withTag(leader, 'arb_winner');
        if (closest < options.uncertainThreshold) {
          winner = withTag(winner, 'arb_uncertain');
        }
        out[slots[0]] = winner;
        contenders.forEach((c, i) => {
          out[slots[i + 1]] = withTag(c, 'arb_conflict');
        });
        break;
      }
      case 'confidence':
      case 'recency': {
        const best =
          policy === 'confidence'
            ? argMax(members, (c) => c.confidence)
            : argMax(members, (c) => c.timestamp?.getTime() ?? nowMs);
        const reordered = [
          withTag(members[best], 'arb_winner'),
          ...members
            .filter((_, i) => i !== best)
            .map((m) => withTag(m, 'arb_conflict')),
        ];
        reordered.forEach((entry, i) => {
          out[slots[i]] = entry;
        });
        break;
      }
      case 'uncertain':
        slots.forEach((slot, i) => {
          out[slot] = withTag(members[i], 'arb_uncertain');
        });
        break;
      default: {
        const unreachable: never = policy;
        throw new Error(`Unknown conflict policy: ${String(unreachable)}`);
      }
    }
  }
  return out;
}
