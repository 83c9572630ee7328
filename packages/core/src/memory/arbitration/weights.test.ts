/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Tests for arbitration weights and reweighting
 */

import { describe, it, expect } from 'vitest';
import {
  arbitrate,
  arbitrationFactor,
  computeArbitrationWeights,
} from './weights.js';
import { makeScored } from './arbitration.test-util.js';
import { defaultRetrievalConfig, type ArbitrationConfig } from '../config.js';
import { PROVENANCE_CLASSES } from '../types.js';

function arbitrationConfig(
  overrides: Partial<ArbitrationConfig> = {},
): ArbitrationConfig {
  return { ...defaultRetrievalConfig().arbitration, ...overrides };
}

function sum(weights: Record<string, number>): number {
  return Object.values(weights).reduce((a, b) => a + b, 0);
}

describe('computeArbitrationWeights', () => {
  it('should favour procedural memories for how queries', () => {
    const w = computeArbitrationWeights('how', arbitrationConfig());
    expect(sum(w)).toBeCloseTo(1, 9);
    expect(w.procedural).toBeCloseTo(0.375 / 1.05, 9);
    expect(w.procedural).toBe(Math.max(...Object.values(w)));
  });

  it('should favour abstractions for why queries', () => {
    const w = computeArbitrationWeights('why', arbitrationConfig());
    expect(sum(w)).toBeCloseTo(1, 9);
    expect(w.abstraction).toBe(Math.max(...Object.values(w)));
  });

  it('should tie base and episodic at the top for fact queries', () => {
    const w = computeArbitrationWeights('fact', arbitrationConfig());
    expect(sum(w)).toBeCloseTo(1, 9);
    expect(w.base).toBe(w.episodic);
    expect(w.base).toBeGreaterThan(w.procedural);
    expect(w.base).toBeCloseTo(0.325 / 1.1, 9);
  });

  it('should ignore intent multipliers in static mode', () => {
    const w = computeArbitrationWeights(
      'how',
      arbitrationConfig({ mode: 'static' }),
    );
    for (const cls of PROVENANCE_CLASSES) {
      expect(w[cls]).toBeCloseTo(0.25, 9);
    }
  });

  it('should normalize non-uniform base weights', () => {
    const w = computeArbitrationWeights(
      'fact',
      arbitrationConfig({
        baseWeights: {
          base: 0.3,
          episodic: 0.25,
          procedural: 0.3,
          abstraction: 0.3,
        },
      }),
    );
    expect(sum(w)).toBeCloseTo(1, 9);
    expect(Object.keys(w).sort()).toEqual([
      'abstraction',
      'base',
      'episodic',
      'procedural',
    ]);
  });

  it('should blend a learned profile with intent multipliers', () => {
    const w = computeArbitrationWeights('how', arbitrationConfig(), {
      base: 0.1,
      episodic: 0.2,
      procedural: 0.6,
      abstraction: 0.1,
    });
    expect(w.procedural).toBeGreaterThan(w.episodic);
    expect(sum(w)).toBeCloseTo(1, 9);
  });
});

describe('arbitrationFactor', () => {
  it('should be neutral at the uniform weight', () => {
    expect(arbitrationFactor(0.25, 0.5)).toBe(1);
  });

  it('should scale with weight and strength', () => {
    expect(arbitrationFactor(0.5, 0.5)).toBe(1.5);
    expect(arbitrationFactor(0, 1)).toBe(0);
    expect(arbitrationFactor(0.9, 0)).toBe(1);
  });
});

describe('arbitrate', () => {
  const candidates = [
    makeScored('b', 1, { provenanceClass: 'base' }),
    makeScored('e', 1, { provenanceClass: 'episodic' }),
    makeScored('p', 1, { provenanceClass: 'procedural' }),
    makeScored('a', 1, { provenanceClass: 'abstraction' }),
  ];

  it('should put procedural first for how', () => {
    const { ranked } = arbitrate(candidates, 'how', arbitrationConfig());
    expect(ranked[0].scored.candidate.id).toBe('p');
  });

  it('should put abstraction first for why', () => {
    const { ranked } = arbitrate(candidates, 'why', arbitrationConfig());
    expect(ranked[0].scored.candidate.id).toBe('a');
  });

  it('should put base or episodic first for fact', () => {
    const { ranked } = arbitrate(candidates, 'fact', arbitrationConfig());
    expect(['b', 'e']).toContain(ranked[0].scored.candidate.id);
  });

  it('should keep composite order when weights are uniform', () => {
    const { ranked, weights } = arbitrate(
      [
        makeScored('1', 0.2),
        makeScored('2', 0.4),
        makeScored('3', 0.3),
      ],
      'how',
      arbitrationConfig({ mode: 'static' }),
    );
    expect(ranked.map((r) => r.scored.candidate.id)).toEqual(['2', '3', '1']);
    expect(ranked.map((r) => r.adjustedScore)).toEqual([0.4, 0.3, 0.2]);
    expect(weights.base).toBeCloseTo(0.25, 9);
  });

  it('should record the class weight on each candidate', () => {
    const { ranked, weights } = arbitrate(
      candidates,
      'how',
      arbitrationConfig(),
    );
    for (const entry of ranked) {
      expect(entry.weight).toBe(weights[entry.scored.candidate.provenanceClass]);
      expect(entry.tags).toEqual([]);
    }
  });
});
