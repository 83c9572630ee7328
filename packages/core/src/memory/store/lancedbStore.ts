/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview LanceDB implementation of the MemoryStore interface.
 *
 * LanceDB is an embedded vector database that stores vectors + metadata together.
 * It's file-based (no server needed).
 *
 * @see https://lancedb.github.io/lancedb/
 *
 * ## Table Schema
 *
 * - id: string (unique identifier)
 * - text: string (memory content)
 * - payload: string (scoring metadata as JSON)
 * - updatedAt: timestamp ms
 * - embedding: vector (dimension matches embedding model)
 * - embedding_model: string (lineage tracking)
 * - embedding_dim: number (lineage tracking)
 *
 * Search uses cosine distance; similarity is `1 - distance`, clamped to
 * [0, 1]. Failures are rethrown so the resilient layer can retry and
 * count them.
 */

import * as lancedb from '@lancedb/lancedb';
import { debugLogger } from '../../utils/debugLogger.js';
import { isRecord, toEmbedding, toFiniteNumber } from '../normalize.js';
import { DimensionMismatchError, clamp01 } from '../vectors.js';
import type {
  MemoryStore,
  StoreHit,
  StoreSearchOptions,
  StoredMemoryEntry,
} from './store.js';

/**
 * Base table name for memory entries in LanceDB.
 * Full table name includes embedding space suffix.
 */
const MEMORY_ENTRIES_TABLE_BASE = 'memory_entries';

/**
 * Maximum IDs per delete batch to avoid query size limits.
 */
const DELETE_BATCH_SIZE = 200;

/**
 * The embedding space a table holds. Vectors from different spaces are
 * never mixed: each space gets its own table.
 */
export interface EmbeddingSpaceConfig {
  /** Embedding provider name (default: 'external') */
  provider?: string;

  /** Embedding model name */
  model: string;

  /** Embedding dimension (e.g., 384, 768, 1536) */
  dimension: number;

  /** Model version for tracking updates (default: 'v1') */
  version?: string;
}

/**
 * Compute a stable embedding space ID: provider|model|dim|version
 */
export function computeEmbeddingSpaceId(config: EmbeddingSpaceConfig): string {
  return `${config.provider ?? 'external'}|${config.model}|${config.dimension}|${config.version ?? 'v1'}`;
}

/**
 * LanceDB record shape.
 * Includes index signature for LanceDB compatibility.
 */
interface LanceDBRecord {
  [key: string]: unknown;
  id: string;
  text: string;
  payload: string; // JSON object as string
  updatedAt: number; // Unix timestamp ms
  embedding: number[];
  embedding_model: string;
  embedding_dim: number;
}

/**
 * Arrow vectors come back as objects with `toArray()`.
 */
function readVector(value: unknown): number[] | undefined {
  if (isRecord(value)) {
    const toArray = value['toArray'];
    if (typeof toArray === 'function') {
      const converted: unknown = toArray.call(value);
      return toEmbedding(converted);
    }
  }
  return toEmbedding(value);
}

function parsePayload(raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'string') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * LanceDB implementation of the MemoryStore interface.
 *
 * Table names are derived from the embedding space:
 * `memory_entries__{provider}__{model}__{dimension}__{version}`
 */
export class LanceDBStore implements MemoryStore {
  private readonly dbPath: string;
  private readonly embeddingSpace: Required<EmbeddingSpaceConfig>;
  private readonly spaceId: string;
  private readonly tableName: string;
  private table: lancedb.Table | null = null;
  private initPromise: Promise<void> | null = null;

  /**
   * @param dbPath - Path to the LanceDB database directory
   * @param embeddingSpace - Embedding space the table holds
   */
  constructor(dbPath: string, embeddingSpace: EmbeddingSpaceConfig) {
    this.dbPath = dbPath;
    this.embeddingSpace = {
      provider: 'external',
      version: 'v1',
      ...embeddingSpace,
    };
    this.spaceId = computeEmbeddingSpaceId(this.embeddingSpace);
    this.tableName = this.generateTableName(this.embeddingSpace);
  }

  private generateTableName(space: Required<EmbeddingSpaceConfig>): string {
    const sanitize = (s: string): string =>
      s.toLowerCase().replace(/[^a-z0-9]/g, '_');

    return `${MEMORY_ENTRIES_TABLE_BASE}__${sanitize(space.provider)}__${sanitize(space.model)}__${space.dimension}__${sanitize(space.version)}`;
  }

  getSpaceId(): string {
    return this.spaceId;
  }

  getTableName(): string {
    return this.tableName;
  }

  /**
   * Open the table, creating it if needed.
   *
   * Another process may create the same table concurrently: try open
   * first, then create, then open again if create fails.
   */
  async init(): Promise<void> {
    if (this.table) {
      return;
    }

    // Prevent concurrent init calls
    if (this.initPromise) {
      return this.initPromise;
    }

    this.initPromise = this.doInit();
    return this.initPromise;
  }

  private async doInit(): Promise<void> {
    try {
      debugLogger.log(
        `LanceDBStore: Initializing at ${this.dbPath} (table: ${this.tableName}, space: ${this.spaceId})`,
      );

      const db = await lancedb.connect(this.dbPath);

      try {
        this.table = await db.openTable(this.tableName);
        debugLogger.log(`LanceDBStore: Opened existing table ${this.tableName}`);
      } catch {
        try {
          const placeholder: LanceDBRecord = {
            id: '__placeholder__',
            text: '',
            payload: '{}',
            updatedAt: Date.now(),
            embedding: new Array<number>(this.embeddingSpace.dimension).fill(0),
            embedding_model: this.embeddingSpace.model,
            embedding_dim: this.embeddingSpace.dimension,
          };
          const table = await db.createTable(this.tableName, [placeholder]);
          await table.delete(`id = '${this.escapeString('__placeholder__')}'`);
          this.table = table;
          debugLogger.log(
            `LanceDBStore: Created new table ${this.tableName} (dim=${this.embeddingSpace.dimension})`,
          );
        } catch (createError) {
          debugLogger.log(
            `LanceDBStore: Create failed, retrying open: ${createError instanceof Error ? createError.message : 'Unknown'}`,
          );
          this.table = await db.openTable(this.tableName);
        }
      }

      this.initPromise = null;
      debugLogger.log('LanceDBStore: Initialized successfully');
    } catch (error) {
      this.initPromise = null; // allow retry
      debugLogger.warn(
        `LanceDBStore: Failed to initialize: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      throw error;
    }
  }

  /**
   * Add or update entries.
   *
   * LanceDB has no native upsert: existing ids are deleted, then the new
   * rows are added.
   *
   * @throws DimensionMismatchError if any entry has the wrong dimension
   */
  async upsert(entries: StoredMemoryEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    const table = this.getTable();
    const expectedDim = this.embeddingSpace.dimension;

    for (const entry of entries) {
      if (entry.embedding.length !== expectedDim) {
        throw new DimensionMismatchError(expectedDim, entry.embedding.length);
      }
    }

    debugLogger.log(`LanceDBStore: Upserting ${entries.length} entries`);
    await this.deleteByIds(
      entries.map((e) => e.id),
      table,
    );

    const now = Date.now();
    const records: LanceDBRecord[] = entries.map((e) => ({
      id: e.id,
      text: e.text,
      payload: JSON.stringify(e.payload ?? {}),
      updatedAt: now,
      embedding: e.embedding,
      embedding_model: this.embeddingSpace.model,
      embedding_dim: expectedDim,
    }));
    await table.add(records);
  }

  private async deleteByIds(ids: string[], table: lancedb.Table): Promise<void> {
    for (let i = 0; i < ids.length; i += DELETE_BATCH_SIZE) {
      const batch = ids.slice(i, i + DELETE_BATCH_SIZE);
      const escapedIds = batch.map((id) => `'${this.escapeString(id)}'`);
      await table.delete(`id IN (${escapedIds.join(',')})`);
    }
  }

  /**
   * Escape a string for use in SQL predicates.
   */
  private escapeString(s: string): string {
    return s.replace(/'/g, "''");
  }

  async delete(id: string): Promise<void> {
    const table = this.getTable();
    debugLogger.log(`LanceDBStore: Deleting entry ${id}`);
    await table.delete(`id = '${this.escapeString(id)}'`);
  }

  /**
   * Cosine nearest-neighbour search.
   *
   * @throws If the table is not initialized, the query fails, or the
   *   signal aborts
   */
  async search(
    queryVector: number[],
    options: StoreSearchOptions,
  ): Promise<StoreHit[]> {
    options.signal?.throwIfAborted();
    const table = this.getTable();

    const rows: unknown[] = await table
      .vectorSearch(queryVector)
      .distanceType('cosine')
      .limit(options.topK)
      .toArray();

    options.signal?.throwIfAborted();

    const hits: StoreHit[] = [];
    for (const row of rows) {
      const hit = this.toStoreHit(row);
      if (hit) {
        hits.push(hit);
      }
    }
    debugLogger.log(`LanceDBStore: Vector search returned ${hits.length} results`);
    return hits;
  }

  async getById(id: string): Promise<StoredMemoryEntry | undefined> {
    const table = this.getTable();
    const rows: unknown[] = await table
      .query()
      .where(`id = '${this.escapeString(id)}'`)
      .limit(1)
      .toArray();

    const row = rows[0];
    if (!isRecord(row) || typeof row['id'] !== 'string') {
      return undefined;
    }
    return {
      id: row['id'],
      text: typeof row['text'] === 'string' ? row['text'] : '',
      embedding: readVector(row['embedding']) ?? [],
      payload: parsePayload(row['payload']),
    };
  }

  async close(): Promise<void> {
    if (!this.table) {
      return;
    }
    debugLogger.log('LanceDBStore: Closing connection');
    // LanceDB doesn't require explicit close, but we reset state
    this.table = null;
  }

  private toStoreHit(row: unknown): StoreHit | undefined {
    if (!isRecord(row) || typeof row['id'] !== 'string') {
      return undefined;
    }
    const distance = toFiniteNumber(row['_distance']) ?? 1;
    const payload = parsePayload(row['payload']);
    return {
      id: row['id'],
      similarity: clamp01(1 - distance),
      payload: {
        ...payload,
        text: typeof row['text'] === 'string' ? row['text'] : '',
        embedding: readVector(row['embedding']),
      },
    };
  }

  private getTable(): lancedb.Table {
    if (!this.table) {
      throw new Error('LanceDBStore not initialized. Call init() first.');
    }
    return this.table;
  }
}
