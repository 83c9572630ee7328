/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Tests for RankedMemoryRetriever
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  RankedMemoryRetriever,
  extractQueryText,
  type RankedMemoryRetrieverOptions,
} from './RankedMemoryRetriever.js';
import { loadRetrievalConfig, type RetrievalConfigOverrides } from './config.js';
import type { EmbeddingClient } from './embeddings/embeddings.js';
import { InMemoryStore } from './store/inMemoryStore.js';
import type { StoreClient, StoreHit, StoredMemoryEntry } from './store/store.js';
import { debugLogger } from '../utils/debugLogger.js';

const NOW = new Date('2025-06-01T00:00:00Z');
const DAY = 86_400_000;

class FakeEmbeddings implements EmbeddingClient {
  readonly embedOne = vi.fn(async (text: string): Promise<number[]> => {
    const vector = this.vectors[text];
    if (!vector) {
      throw new Error(`no vector for "${text}"`);
    }
    return vector;
  });

  constructor(private readonly vectors: Record<string, number[]>) {}

  async embed(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((t) => this.embedOne(t)));
  }

  getDimension(): number {
    return 2;
  }

  getModel(): string {
    return 'fake';
  }
}

const QUERIES = {
  'deploy schedule': [1, 0],
  'how do I deploy': [1, 0],
  'rotate api keys': [1, 0],
};

function config(overrides: RetrievalConfigOverrides = {}) {
  return loadRetrievalConfig({
    env: {},
    overrides: {
      ...overrides,
      retrieval: { finalMmrEnabled: false, ...overrides.retrieval },
    },
  });
}

async function storeWith(entries: StoredMemoryEntry[]): Promise<InMemoryStore> {
  const store = new InMemoryStore(2);
  await store.upsert(entries);
  return store;
}

function retriever(
  options: Partial<RankedMemoryRetrieverOptions> & { store: StoreClient },
): RankedMemoryRetriever {
  return new RankedMemoryRetriever({
    embeddings: new FakeEmbeddings(QUERIES),
    config: config(),
    ...options,
    deps: {
      now: () => NOW.getTime(),
      sleep: async () => {},
      ...options.deps,
    },
  });
}

describe('RankedMemoryRetriever', () => {
  beforeEach(() => {
    vi.spyOn(debugLogger, 'log').mockImplementation(() => {});
    vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
  });

  describe('retrieve', () => {
    it('should rank a fresh trusted memory above a stale untrusted one', async () => {
      const store = await storeWith([
        {
          id: 'B',
          text: 'Deploys happen on Thursdays',
          embedding: [0.99, 0.141],
          payload: {
            timestamp: new Date(NOW.getTime() - 30 * DAY).toISOString(),
            sourceTrust: 0.3,
            confidence: 0.3,
          },
        },
        {
          id: 'A',
          text: 'Deploys happen on Fridays',
          embedding: [1, 0],
          payload: {
            timestamp: NOW.toISOString(),
            sourceTrust: 0.9,
            confidence: 0.8,
          },
        },
      ]);

      const result = await retriever({ store }).retrieve('deploy schedule');

      expect(result.reason).toBe('ok');
      expect(result.intent).toBe('fact');
      expect(result.queryId).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
      expect(result.candidates.map((c) => c.id)).toEqual(['A', 'B']);
      expect(result.candidates[0].breakdown.recency).toBe(1);
      expect(result.candidates[0].text).toBe('Deploys happen on Fridays');
      expect(result.diagnostics).toMatchObject({
        retrieved: 2,
        selected: 2,
        returned: 2,
        attempts: 1,
        dropped: 0,
        breakerState: 'closed',
        beliefVersion: 0,
      });
    });

    it('should report an empty query without embedding', async () => {
      const embeddings = new FakeEmbeddings(QUERIES);
      const result = await retriever({
        store: new InMemoryStore(2),
        embeddings,
      }).retrieve('   ');

      expect(result.reason).toBe('empty_query');
      expect(result.candidates).toEqual([]);
      expect(embeddings.embedOne).not.toHaveBeenCalled();
    });

    it('should report an embedding failure', async () => {
      const result = await retriever({ store: new InMemoryStore(2) }).retrieve(
        'unknown query',
      );
      expect(result.reason).toBe('embedding_failed');
    });

    it('should report no candidates for an empty store', async () => {
      const result = await retriever({ store: new InMemoryStore(2) }).retrieve(
        'deploy schedule',
      );
      expect(result.reason).toBe('no_candidates');
      expect(result.diagnostics.attempts).toBe(1);
    });

    it('should report below_threshold when nothing passes selection', async () => {
      const store = await storeWith([
        { id: 'far', text: 'unrelated', embedding: [0, 1] },
      ]);
      const result = await retriever({ store }).retrieve('deploy schedule');
      expect(result.reason).toBe('below_threshold');
      expect(result.diagnostics.stages?.thresholdUsed).toBe(0.3);
    });

    it('should accept Part arrays as the request', async () => {
      const store = await storeWith([
        { id: 'A', text: 'Run the deploy script', embedding: [1, 0] },
      ]);
      const result = await retriever({ store }).retrieve([
        { text: 'how do I' },
        { text: 'deploy' },
      ]);
      expect(result.intent).toBe('how');
      expect(result.candidates.map((c) => c.id)).toEqual(['A']);
    });

    it('should return cancelled when the signal is already aborted', async () => {
      const store = await storeWith([
        { id: 'A', text: 'a', embedding: [1, 0] },
      ]);
      const search = vi.spyOn(store, 'search');
      const controller = new AbortController();
      controller.abort();

      const result = await retriever({ store }).retrieve('deploy schedule', {
        signal: controller.signal,
      });

      expect(result.reason).toBe('cancelled');
      expect(search).not.toHaveBeenCalled();
    });

    it('should return cancelled when aborted during embedding', async () => {
      const controller = new AbortController();
      const embeddings = new FakeEmbeddings(QUERIES);
      embeddings.embedOne.mockImplementation(async () => {
        controller.abort();
        return [1, 0];
      });
      const store = await storeWith([
        { id: 'A', text: 'a', embedding: [1, 0] },
      ]);
      const search = vi.spyOn(store, 'search');

      const result = await retriever({ store, embeddings }).retrieve(
        'deploy schedule',
        { signal: controller.signal },
      );

      expect(result.reason).toBe('cancelled');
      expect(search).not.toHaveBeenCalled();
    });

    it('should report store_unavailable after exhausting retries', async () => {
      const search = vi.fn(async (): Promise<StoreHit[]> => {
        throw new Error('connection refused');
      });
      const result = await retriever({ store: { search } }).retrieve(
        'deploy schedule',
      );
      expect(result.reason).toBe('store_unavailable');
      expect(result.diagnostics.attempts).toBe(3);
      expect(search).toHaveBeenCalledTimes(3);
    });

    it('should open the circuit after repeated timeouts and skip the store', async () => {
      const search = vi.fn(
        (_vector: number[], options: { signal?: AbortSignal }) =>
          new Promise<StoreHit[]>((_, reject) => {
            options.signal?.addEventListener('abort', () =>
              reject(new Error('aborted')),
            );
          }),
      );
      const r = retriever({
        store: { search },
        config: config({
          resilience: { maxRetries: 0, timeoutMs: 20, failureLimit: 3 },
        }),
      });

      for (let i = 0; i < 3; i++) {
        const result = await r.retrieve('deploy schedule');
        expect(result.reason).toBe('store_unavailable');
      }
      const fourth = await r.retrieve('deploy schedule');

      expect(fourth.reason).toBe('circuit_open');
      expect(fourth.diagnostics.attempts).toBe(0);
      expect(fourth.diagnostics.breakerState).toBe('open');
      expect(search).toHaveBeenCalledTimes(3);
    });

    it('should order by composite score only when arbitration is disabled', async () => {
      const store = await storeWith([
        { id: '1', text: 'one', embedding: [1, 0], payload: { confidence: 0.2 } },
        { id: '2', text: 'two', embedding: [1, 0], payload: { confidence: 0.4 } },
        { id: '3', text: 'three', embedding: [1, 0], payload: { confidence: 0.3 } },
      ]);
      const result = await retriever({
        store,
        config: config({ arbitration: { enabled: false } }),
      }).retrieve('deploy schedule');

      expect(result.candidates.map((c) => c.id)).toEqual(['2', '3', '1']);
      expect(result.candidates[0].arbitration).toBeUndefined();
      expect(result.candidates[0].rankScore).toBe(result.candidates[0].finalScore);
      expect(result.diagnostics.arbitrationWeights).toBeUndefined();
    });

    it('should favour procedural memories for how queries', async () => {
      const store = await storeWith([
        { id: 'b', text: 'base fact', embedding: [1, 0] },
        {
          id: 'p',
          text: 'step by step',
          embedding: [1, 0],
          payload: { provenanceClass: 'procedural' },
        },
      ]);
      const result = await retriever({ store }).retrieve('how do I deploy');

      expect(result.intent).toBe('how');
      expect(result.candidates.map((c) => c.id)).toEqual(['p', 'b']);
      expect(result.candidates[0].provenanceClass).toBe('procedural');
      expect(result.candidates[0].arbitration?.weight).toBeCloseTo(0.375 / 1.05, 9);
      expect(result.diagnostics.arbitrationWeights?.procedural).toBeCloseTo(
        0.375 / 1.05,
        9,
      );
    });

    it('should tag a close conflict winner as uncertain', async () => {
      const store = await storeWith([
        {
          id: 'x1',
          text: 'The service runs on port 8080',
          embedding: [1, 0],
          payload: { confidence: 0.5, assertionKey: 'service.port', assertionValue: '8080' },
        },
        {
          id: 'x2',
          text: 'The service runs on port 9090',
          embedding: [1, 0],
          payload: { confidence: 0.45, assertionKey: 'service.port', assertionValue: '9090' },
        },
      ]);
      const result = await retriever({ store }).retrieve('deploy schedule');

      expect(result.candidates[0].id).toBe('x1');
      expect(result.candidates[0].arbitration?.tags).toEqual([
        'arb_winner',
        'arb_uncertain',
      ]);
      expect(result.candidates[1].arbitration?.tags).toEqual(['arb_conflict']);
      expect(result.candidates[1].breakdown.conflictPenalty).toBe(0.05);
    });

    it('should rank by keyword-boosted similarity when the boost is on', async () => {
      const entries = [
        { id: 'a', text: 'note about builds', embedding: [1, 0.05] },
        { id: 'b', text: 'rotate api keys monthly', embedding: [1, 0.1] },
      ];

      const plain = await retriever({
        store: await storeWith(entries),
      }).retrieve('rotate api keys');
      expect(plain.candidates.map((c) => c.id)).toEqual(['a', 'b']);

      const boosted = await retriever({
        store: await storeWith(entries),
        config: config({ selection: { keywordBoostEnabled: true } }),
      }).retrieve('rotate api keys');

      expect(boosted.candidates.map((c) => c.id)).toEqual(['b', 'a']);
      expect(boosted.candidates[0].similarity).toBe(1);
      expect(boosted.candidates[0].breakdown.similarity).toBe(1);
      expect(boosted.diagnostics.stages?.keywordBoostApplied).toBe(true);
    });

    it('should diversify the final order with MMR', async () => {
      const store = await storeWith([
        { id: 'A', text: 'a', embedding: [1, 0] },
        { id: 'A2', text: 'a again', embedding: [0.999, 0.045] },
        { id: 'C', text: 'c', embedding: [0.8, 0.6] },
      ]);
      const result = await retriever({
        store,
        config: config({
          retrieval: { finalMmrEnabled: true, finalMmrLambda: 0.3 },
        }),
      }).retrieve('deploy schedule', { topK: 2 });

      expect(result.candidates.map((c) => c.id)).toEqual(['A', 'C']);
    });

    it('should truncate to topK without MMR', async () => {
      const store = await storeWith([
        { id: 'A', text: 'a', embedding: [1, 0] },
        { id: 'A2', text: 'a again', embedding: [0.999, 0.045] },
        { id: 'C', text: 'c', embedding: [0.8, 0.6] },
      ]);
      const result = await retriever({ store }).retrieve('deploy schedule', {
        topK: 2,
      });
      expect(result.candidates.map((c) => c.id)).toEqual(['A', 'A2']);
      expect(result.diagnostics.selected).toBe(3);
      expect(result.diagnostics.returned).toBe(2);
    });

    it('should score with a failing belief source as if no beliefs were active', async () => {
      const store = await storeWith([
        { id: 'A', text: 'a', embedding: [1, 0] },
      ]);
      const result = await retriever({
        store,
        beliefs: () => {
          throw new Error('belief store offline');
        },
      }).retrieve('deploy schedule');

      expect(result.reason).toBe('ok');
      expect(result.diagnostics.beliefVersion).toBe(0);
      expect(debugLogger.warn).toHaveBeenCalledWith(
        'RankedMemoryRetriever: Failed to load active beliefs: belief store offline',
      );
    });
  });

  describe('search', () => {
    it('should return hits by raw similarity', async () => {
      const store = await storeWith([
        { id: 'C', text: 'c', embedding: [0.8, 0.6], payload: { source: 'notes.md' } },
        { id: 'A', text: 'a', embedding: [1, 0] },
      ]);
      const hits = await retriever({ store }).search('deploy schedule', {
        limit: 1,
      });
      expect(hits).toEqual([{ id: 'A', text: 'a', score: 1, source: undefined }]);
    });

    it('should return an empty list when embedding fails', async () => {
      const hits = await retriever({ store: new InMemoryStore(2) }).search(
        'unknown query',
      );
      expect(hits).toEqual([]);
    });
  });
});

describe('extractQueryText', () => {
  it('should join text parts and skip the rest', () => {
    expect(
      extractQueryText([
        { text: 'why does' },
        { inlineData: { mimeType: 'image/png', data: 'AAAA' } },
        { text: 'the build fail ' },
      ]),
    ).toBe('why does the build fail');
  });
});
