/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * PostgreSQL vector store implementation with pgvector
 * Provides persistent vector storage and similarity search capabilities
 *
 * @packageDocumentation
 */

import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { stringifyError } from '@backstage/errors';
import { IVectorStore } from '../interfaces';
import { Metadata, MetadataFilter, PostgresConfig, RetrievalResult, VectorRecord } from '../models';
import { DimensionMismatchError, StoreIOError } from '../errors';
import { applyMigrations } from '../database/migrations';
import { batchDimension } from './InMemoryVectorStore';

export interface PgVectorStoreOptions {
  collection: string;
  /**
   * Apply pending SQL migrations during initialize() instead of only verifying the schema
   */
  autoMigrate?: boolean;
}

interface ChunkRow {
  id: string;
  content: string;
  metadata: Metadata;
  distance: number | string;
}

const UPSERT_CHUNK = `
  INSERT INTO rag_chunks (collection, id, embedding, metadata, content)
  VALUES ($1, $2, $3::vector, $4::jsonb, $5)
  ON CONFLICT (collection, id)
  DO UPDATE SET
    embedding = EXCLUDED.embedding,
    metadata = EXCLUDED.metadata,
    content = EXCLUDED.content,
    updated_at = CURRENT_TIMESTAMP
`;

/**
 * PostgreSQL vector store using pgvector extension
 * Follows Single Responsibility Principle
 *
 * Each instance serves one named collection. Entries, metadata and the
 * collection's dimension survive restarts; a new process opening the same
 * database and collection sees the same entries.
 */
export class PgVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private readonly collection: string;
  private readonly autoMigrate: boolean;
  private initialized = false;
  private establishedDimension: number | null = null;

  constructor(logger: Logger, config: PostgresConfig, options: PgVectorStoreOptions) {
    this.logger = logger;
    this.collection = options.collection;
    this.autoMigrate = options.autoMigrate ?? false;

    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5000,
    });

    this.pool.on('error', err => {
      this.logger.error('Unexpected PostgreSQL pool error', err);
    });
  }

  /**
   * Initialize the vector store (migrate or verify schema, load the collection)
   * Should be called after construction
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgVectorStore already initialized');
      return;
    }

    try {
      this.logger.info(`Initializing PgVectorStore (collection: ${this.collection})...`);

      await this.testConnection();

      if (this.autoMigrate) {
        await applyMigrations(this.pool, this.logger);
      }

      await this.verifyPgVector();
      await this.verifySchema();
      await this.ensureCollection();

      this.initialized = true;
      this.logger.info('PgVectorStore initialized successfully');
    } catch (error) {
      this.logger.error('Failed to initialize PgVectorStore', error);
      throw new StoreIOError('PgVectorStore initialization failed', error);
    }
  }

  /**
   * Test database connection
   */
  private async testConnection(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ now: Date }>('SELECT NOW() as now');
      this.logger.debug(`Database connection successful: ${result.rows[0].now}`);
    } finally {
      client.release();
    }
  }

  /**
   * Verify pgvector extension is installed
   */
  private async verifyPgVector(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ installed: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') as installed",
      );

      if (!result.rows[0].installed) {
        throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
      }

      this.logger.debug('pgvector extension verified');
    } finally {
      client.release();
    }
  }

  /**
   * Verify collection and chunk tables exist
   */
  private async verifySchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ exists: boolean }>(
        `SELECT COUNT(*) = 2 as exists
         FROM information_schema.tables
         WHERE table_name IN ('rag_collections', 'rag_chunks')`,
      );

      if (!result.rows[0].exists) {
        this.logger.warn('Vector tables do not exist. Please run migrations.');
        throw new Error('Vector tables not found. Run migrations first.');
      }

      this.logger.debug('Database schema verified');
    } finally {
      client.release();
    }
  }

  /**
   * Create the collection row if missing and load its dimension
   */
  private async ensureCollection(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(
        'INSERT INTO rag_collections (name) VALUES ($1) ON CONFLICT (name) DO NOTHING',
        [this.collection],
      );
      const result = await client.query<{ dimension: number | null }>(
        'SELECT dimension FROM rag_collections WHERE name = $1',
        [this.collection],
      );
      this.establishedDimension = result.rows[0]?.dimension ?? null;
      this.logger.debug(
        `Collection ${this.collection} dimension: ${this.establishedDimension ?? 'not established'}`,
      );
    } finally {
      client.release();
    }
  }

  /**
   * Upsert records in a single transaction
   */
  async add(records: VectorRecord[]): Promise<void> {
    this.ensureInitialized();

    if (records.length === 0) {
      return;
    }

    const dimension = batchDimension(records, this.establishedDimension);

    const client = await this.connect();
    try {
      await client.query('BEGIN');

      if (this.establishedDimension === null) {
        await this.setDimension(client, dimension);
      }
      await this.upsert(client, records);

      await client.query('COMMIT');
      this.establishedDimension = dimension;
      this.logger.info(`Stored batch of ${records.length} vectors in ${this.collection}`);
    } catch (error) {
      await this.rollback(client);
      this.logger.error('Failed to store vector batch', error);
      throw new StoreIOError(`Failed to store ${records.length} vectors`, error);
    } finally {
      client.release();
    }
  }

  /**
   * Nearest neighbours by cosine distance (pgvector `<=>`), filtered by JSONB containment
   */
  async query(vector: number[], k: number, filter?: MetadataFilter): Promise<RetrievalResult[]> {
    this.ensureInitialized();

    if (this.establishedDimension !== null && vector.length !== this.establishedDimension) {
      throw new DimensionMismatchError(this.establishedDimension, vector.length, 'query vector');
    }
    if (k <= 0) {
      return [];
    }

    const client = await this.connect();
    try {
      const result = await client.query<ChunkRow>(
        `SELECT
          id,
          content,
          metadata,
          embedding <=> $2::vector as distance
        FROM rag_chunks
        WHERE collection = $1 AND metadata @> $3::jsonb
        ORDER BY distance ASC, id ASC
        LIMIT $4`,
        [this.collection, this.vectorToSql(vector), JSON.stringify(filter ?? {}), k],
      );

      const results: RetrievalResult[] = result.rows.map(row => ({
        chunkId: row.id,
        text: row.content,
        metadata: row.metadata,
        distance: typeof row.distance === 'number' ? row.distance : parseFloat(row.distance),
      }));

      this.logger.debug(
        `Found ${results.length} results for query (filter: ${filter ? JSON.stringify(filter) : 'none'})`,
      );

      return results;
    } catch (error) {
      this.logger.error('Failed to search vectors', error);
      throw new StoreIOError('Vector search failed', error);
    } finally {
      client.release();
    }
  }

  /**
   * Remove every entry of the collection and forget its dimension
   */
  async reset(): Promise<void> {
    this.ensureInitialized();

    const client = await this.connect();
    try {
      await client.query('BEGIN');
      const cleared = await this.deleteAll(client);
      await this.setDimension(client, null);
      await client.query('COMMIT');

      this.establishedDimension = null;
      this.logger.info(`Cleared ${cleared} vectors from ${this.collection}`);
    } catch (error) {
      await this.rollback(client);
      this.logger.error('Failed to clear vectors', error);
      throw new StoreIOError(`Failed to reset collection ${this.collection}`, error);
    } finally {
      client.release();
    }
  }

  /**
   * Delete the collection's entries and write `records` in one transaction
   */
  async replaceAll(records: VectorRecord[]): Promise<void> {
    this.ensureInitialized();

    const dimension = records.length === 0 ? null : batchDimension(records, null);

    const client = await this.connect();
    try {
      await client.query('BEGIN');
      const cleared = await this.deleteAll(client);
      await this.setDimension(client, dimension);
      await this.upsert(client, records);
      await client.query('COMMIT');

      this.establishedDimension = dimension;
      this.logger.info(`Replaced ${cleared} vectors with ${records.length} in ${this.collection}`);
    } catch (error) {
      await this.rollback(client);
      this.logger.error('Failed to replace vectors', error);
      throw new StoreIOError(`Failed to replace collection ${this.collection}`, error);
    } finally {
      client.release();
    }
  }

  async count(): Promise<number> {
    this.ensureInitialized();

    const client = await this.connect();
    try {
      const result = await client.query<{ count: string }>(
        'SELECT COUNT(*) as count FROM rag_chunks WHERE collection = $1',
        [this.collection],
      );
      return parseInt(result.rows[0].count, 10);
    } catch (error) {
      this.logger.error('Failed to count vectors', error);
      throw new StoreIOError('Failed to count vectors', error);
    } finally {
      client.release();
    }
  }

  dimension(): number | null {
    return this.establishedDimension;
  }

  /**
   * Close the connection pool
   * Should be called on application shutdown
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.logger.info('PgVectorStore connection pool closed');
    } catch (error) {
      this.logger.error('Error closing PgVectorStore pool', error);
      throw new StoreIOError('Failed to close connection pool', error);
    }
  }

  private async connect(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      this.logger.error('Failed to acquire PostgreSQL connection', error);
      throw new StoreIOError('Failed to connect to PostgreSQL', error);
    }
  }

  /**
   * Best effort; a failed rollback is logged so the original error surfaces
   */
  private async rollback(client: PoolClient): Promise<void> {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      this.logger.error(`Rollback failed: ${stringifyError(rollbackError)}`);
    });
  }

  private async deleteAll(client: PoolClient): Promise<number> {
    const result = await client.query('DELETE FROM rag_chunks WHERE collection = $1', [this.collection]);
    return result.rowCount ?? 0;
  }

  private async setDimension(client: PoolClient, dimension: number | null): Promise<void> {
    await client.query(
      'UPDATE rag_collections SET dimension = $2, updated_at = CURRENT_TIMESTAMP WHERE name = $1',
      [this.collection, dimension],
    );
  }

  private async upsert(client: PoolClient, records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      await client.query(UPSERT_CHUNK, [
        this.collection,
        record.id,
        this.vectorToSql(record.vector),
        JSON.stringify(record.metadata),
        record.text,
      ]);
    }
  }

  /**
   * Convert number array to PostgreSQL vector format
   */
  private vectorToSql(vector: number[]): string {
    return `[${vector.join(',')}]`;
  }

  /**
   * Ensure the store is initialized
   */
  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgVectorStore not initialized. Call initialize() first.');
    }
  }
}
