/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Tests for retrieval configuration
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DEFAULT_INTENT_MULTIPLIERS,
  DEFAULT_SCORING_WEIGHTS,
  defaultRetrievalConfig,
  loadRetrievalConfig,
  parseWeightList,
  resetConfigWarnings,
} from './config.js';
import { debugLogger } from '../utils/debugLogger.js';

describe('retrieval config', () => {
  beforeEach(() => {
    resetConfigWarnings();
    vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
  });

  describe('defaults', () => {
    it('should fill every section', () => {
      const config = defaultRetrievalConfig();

      expect(config.selection).toMatchObject({
        threshold: 0.3,
        dynamicThresholdEnabled: false,
        floorThreshold: 0.15,
        keywordFields: ['content', 'tags'],
        mmrEnabled: false,
        mmrLambda: 0.7,
        mmrK: 5,
      });
      expect(config.scoring.weights).toEqual(DEFAULT_SCORING_WEIGHTS);
      expect(config.scoring.decayLambda).toBe(0.015);
      expect(config.arbitration).toMatchObject({
        enabled: true,
        mode: 'context',
        strength: 0.5,
        conflictPolicy: 'hierarchical',
        baseWeights: { base: 0.25, episodic: 0.25, procedural: 0.25, abstraction: 0.25 },
        intentMultipliers: DEFAULT_INTENT_MULTIPLIERS,
      });
      expect(config.learning).toMatchObject({
        enabled: false,
        observeOnly: false,
        windowSize: 200,
      });
      expect(config.learning.profilePath).toBeUndefined();
      expect(config.resilience).toEqual({
        failureLimit: 3,
        openDurationSec: 20,
        maxRetries: 2,
        timeoutMs: 8000,
        backoffBaseMs: 200,
      });
      expect(config.retrieval).toEqual({
        topK: 8,
        candidatePoolSize: 50,
        finalMmrEnabled: true,
        finalMmrLambda: 0.7,
      });
      expect(debugLogger.warn).not.toHaveBeenCalled();
    });

    it('should relax strict dimensions in production', () => {
      expect(loadRetrievalConfig({ env: {} }).scoring.strictDimensions).toBe(true);
      expect(
        loadRetrievalConfig({ env: { NODE_ENV: 'production' } }).scoring
          .strictDimensions,
      ).toBe(false);
      expect(
        loadRetrievalConfig({
          env: { NODE_ENV: 'production', RECALL_STRICT_DIMENSIONS: 'on' },
        }).scoring.strictDimensions,
      ).toBe(true);
    });
  });

  describe('environment', () => {
    it('should read numbers, flags and lists', () => {
      const config = loadRetrievalConfig({
        env: {
          RECALL_THRESHOLD: ' 0.45 ',
          RECALL_DYNAMIC_THRESHOLD: 'yes',
          RECALL_TOP1_FALLBACK: 'OFF',
          RECALL_KEYWORD_FIELDS: 'Content, Source,',
          RECALL_TOP_K: '5',
          RECALL_ARB_CONFLICT_RESOLUTION: 'Recency',
          RECALL_META_ARB_PROFILE_PATH: '/var/lib/recall/profile.json',
        },
      });

      expect(config.selection.threshold).toBe(0.45);
      expect(config.selection.dynamicThresholdEnabled).toBe(true);
      expect(config.selection.top1FallbackEnabled).toBe(false);
      expect(config.selection.keywordFields).toEqual(['content', 'source']);
      expect(config.retrieval.topK).toBe(5);
      expect(config.arbitration.conflictPolicy).toBe('recency');
      expect(config.learning.profilePath).toBe('/var/lib/recall/profile.json');
    });

    it('should read scoring weights by alias', () => {
      const config = loadRetrievalConfig({
        env: { RECALL_SCORING_WEIGHTS: 'sim=2, w_rec=0.3' },
      });
      expect(config.scoring.weights).toEqual({
        ...DEFAULT_SCORING_WEIGHTS,
        similarity: 2,
        recency: 0.3,
      });
    });

    it('should read per-class intent multipliers', () => {
      const config = loadRetrievalConfig({
        env: { RECALL_ARB_MULT_HOW_PROCEDURAL: '2', RECALL_ARB_BASE_EPISODIC: '0.5' },
      });
      expect(config.arbitration.intentMultipliers.how).toEqual({
        ...DEFAULT_INTENT_MULTIPLIERS.how,
        procedural: 2,
      });
      expect(config.arbitration.intentMultipliers.why).toEqual(
        DEFAULT_INTENT_MULTIPLIERS.why,
      );
      expect(config.arbitration.baseWeights.episodic).toBe(0.5);
      expect(config.arbitration.baseWeights.base).toBe(0.25);
    });

    it('should fall back per field and warn once per key', () => {
      const env = {
        RECALL_THRESHOLD: 'abc',
        RECALL_MMR_LAMBDA: '1.5',
        RECALL_TOP_K: '12',
      };

      const first = loadRetrievalConfig({ env });
      const second = loadRetrievalConfig({ env });

      expect(first.selection.threshold).toBe(0.3);
      expect(first.selection.mmrLambda).toBe(0.7);
      expect(first.retrieval.topK).toBe(12);
      expect(second.selection.threshold).toBe(0.3);
      expect(debugLogger.warn).toHaveBeenCalledTimes(2);
      expect(debugLogger.warn).toHaveBeenCalledWith(
        'RetrievalConfig: Invalid value for selection.threshold ("abc"), using default 0.3',
      );
      expect(debugLogger.warn).toHaveBeenCalledWith(
        'RetrievalConfig: Invalid value for selection.mmrLambda (1.5), using default 0.7',
      );
    });

    it('should reject unknown flags and policies', () => {
      const config = loadRetrievalConfig({
        env: {
          RECALL_MMR_ENABLED: 'maybe',
          RECALL_ARB_CONFLICT_RESOLUTION: 'coin-flip',
          RECALL_MIN_RESULTS: '2.5',
        },
      });
      expect(config.selection.mmrEnabled).toBe(false);
      expect(config.arbitration.conflictPolicy).toBe('hierarchical');
      expect(config.selection.minResults).toBe(0);
      expect(debugLogger.warn).toHaveBeenCalledTimes(3);
    });
  });

  describe('overrides', () => {
    it('should apply over the environment one section at a time', () => {
      const config = loadRetrievalConfig({
        env: { RECALL_TOP_K: '5', RECALL_CANDIDATE_POOL: '30' },
        overrides: { retrieval: { topK: 3 } },
      });
      expect(config.retrieval.topK).toBe(3);
      expect(config.retrieval.candidatePoolSize).toBe(30);
    });

    it('should validate override values too', () => {
      const config = loadRetrievalConfig({
        env: {},
        overrides: { resilience: { failureLimit: 0 } },
      });
      expect(config.resilience.failureLimit).toBe(3);
    });
  });

  describe('parseWeightList', () => {
    it('should map aliases and keep unparseable values for the schema', () => {
      expect(parseWeightList('sim=1.5, conf=x, , nov')).toEqual({
        similarity: 1.5,
        confidence: 'x',
        novelty: '',
      });
    });

    it('should skip unknown names with a warning', () => {
      expect(parseWeightList('bogus=2,bel=0.2')).toEqual({ beliefAlignment: 0.2 });
      expect(debugLogger.warn).toHaveBeenCalledWith(
        'RetrievalConfig: Invalid value for scoring.weights.bogus ("bogus=2"), using default "ignored"',
      );
    });
  });
});
