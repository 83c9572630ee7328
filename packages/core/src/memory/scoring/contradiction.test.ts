/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Tests for contradiction detectors
 */

import { describe, it, expect } from 'vitest';
import {
  assertionContradictionDetector,
  combineDetectors,
  defaultContradictionDetector,
  flagContradictionDetector,
  type ContradictionDetector,
} from './contradiction.js';
import { makeCandidate } from '../candidates.test-util.js';
import type { Candidate, ScoredCandidate } from '../types.js';

function favored(candidate: Candidate): ScoredCandidate {
  return {
    candidate,
    finalScore: 1,
    breakdown: {
      similarity: 1,
      recency: 1,
      credibility: 0.5,
      confidence: 0.5,
      beliefAlignment: 0.5,
      usage: 0,
      novelty: 0,
      conflictPenalty: 0,
      final: 1,
    },
  };
}

describe('flagContradictionDetector', () => {
  it('should follow the stored flag and conflict score', () => {
    expect(
      flagContradictionDetector.isContradicted(
        makeCandidate({ id: 'a', contradictionFlag: true }),
        [],
      ),
    ).toBe(true);
    expect(
      flagContradictionDetector.isContradicted(
        makeCandidate({ id: 'b', conflictScore: 0.2 }),
        [],
      ),
    ).toBe(true);
    expect(
      flagContradictionDetector.isContradicted(makeCandidate({ id: 'c' }), []),
    ).toBe(false);
  });
});

describe('assertionContradictionDetector', () => {
  const friday = makeCandidate({
    id: 'f',
    assertionKey: 'deploy.day',
    assertionValue: 'friday',
  });

  it('should flag a different value for the same key', () => {
    const monday = makeCandidate({
      id: 'm',
      assertionKey: 'deploy.day',
      assertionValue: 'monday',
    });
    expect(
      assertionContradictionDetector.isContradicted(monday, [favored(friday)]),
    ).toBe(true);
  });

  it('should not flag agreement, other keys or itself', () => {
    const agreeing = makeCandidate({
      id: 'f2',
      assertionKey: 'deploy.day',
      assertionValue: 'friday',
    });
    const otherKey = makeCandidate({
      id: 'o',
      assertionKey: 'deploy.time',
      assertionValue: '10:00',
    });
    expect(
      assertionContradictionDetector.isContradicted(agreeing, [favored(friday)]),
    ).toBe(false);
    expect(
      assertionContradictionDetector.isContradicted(otherKey, [favored(friday)]),
    ).toBe(false);
    expect(
      assertionContradictionDetector.isContradicted(friday, [favored(friday)]),
    ).toBe(false);
  });

  it('should ignore candidates without an assertion key', () => {
    expect(
      assertionContradictionDetector.isContradicted(makeCandidate({ id: 'x' }), [
        favored(friday),
      ]),
    ).toBe(false);
  });
});

describe('combineDetectors', () => {
  it('should flag when any detector does', () => {
    const never: ContradictionDetector = { isContradicted: () => false };
    const always: ContradictionDetector = { isContradicted: () => true };
    const candidate = makeCandidate({ id: 'a' });

    expect(combineDetectors(never, always).isContradicted(candidate, [])).toBe(
      true,
    );
    expect(combineDetectors(never).isContradicted(candidate, [])).toBe(false);
    expect(
      defaultContradictionDetector.isContradicted(
        makeCandidate({ id: 'b', contradictionFlag: true }),
        [],
      ),
    ).toBe(true);
  });
});
