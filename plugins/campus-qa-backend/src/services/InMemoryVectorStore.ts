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
 * In-memory vector store implementation
 * Provides vector storage and similarity search capabilities
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { MetadataFilter, Metadata, RetrievalResult, VectorRecord } from '../models';
import { DimensionMismatchError } from '../errors';

/**
 * Cosine distance (1 - cosine similarity); 1 when either vector has zero norm
 */
export function cosineDistance(a: number[], b: number[]): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);

  if (denominator === 0) {
    return 1;
  }

  return 1 - dotProduct / denominator;
}

/**
 * Dimension shared by a non-empty batch, checked against an established one
 */
export function batchDimension(records: VectorRecord[], established: number | null): number {
  const dimension = established ?? records[0].vector.length;
  for (const record of records) {
    if (record.vector.length !== dimension) {
      throw new DimensionMismatchError(dimension, record.vector.length, `record ${record.id}`);
    }
  }
  return dimension;
}

export function matchesFilter(metadata: Metadata, filter?: MetadataFilter): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

/**
 * In-memory vector store using cosine distance
 * Follows Single Responsibility Principle
 *
 * Note: entries live only as long as the process; use PgVectorStore for a
 * persistent collection.
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly records: Map<string, VectorRecord> = new Map();
  private establishedDimension: number | null = null;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async initialize(): Promise<void> {
    this.logger.debug('InMemoryVectorStore ready');
  }

  async add(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    this.establishedDimension = batchDimension(records, this.establishedDimension);
    this.store(records);
    this.logger.info(`Stored batch of ${records.length} vectors`);
  }

  async replaceAll(records: VectorRecord[]): Promise<void> {
    const dimension = records.length === 0 ? null : batchDimension(records, null);

    const previous = this.records.size;
    this.records.clear();
    this.establishedDimension = dimension;
    this.store(records);
    this.logger.info(`Replaced ${previous} vectors with ${records.length}`);
  }

  private store(records: VectorRecord[]): void {
    for (const record of records) {
      this.records.set(record.id, {
        ...record,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    }
  }

  async query(vector: number[], k: number, filter?: MetadataFilter): Promise<RetrievalResult[]> {
    if (this.establishedDimension !== null && vector.length !== this.establishedDimension) {
      throw new DimensionMismatchError(this.establishedDimension, vector.length, 'query vector');
    }
    if (k <= 0) {
      return [];
    }

    const results: RetrievalResult[] = [];
    for (const record of this.records.values()) {
      if (!matchesFilter(record.metadata, filter)) {
        continue;
      }
      results.push({
        chunkId: record.id,
        text: record.text,
        metadata: { ...record.metadata },
        distance: cosineDistance(vector, record.vector),
      });
    }

    results.sort((a, b) => a.distance - b.distance || a.chunkId.localeCompare(b.chunkId));
    const topResults = results.slice(0, k);

    this.logger.debug(
      `Found ${topResults.length} results for query (filter: ${filter ? JSON.stringify(filter) : 'none'})`,
    );

    return topResults;
  }

  async reset(): Promise<void> {
    const count = this.records.size;
    this.records.clear();
    this.establishedDimension = null;
    this.logger.info(`Cleared ${count} vectors from store`);
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  dimension(): number | null {
    return this.establishedDimension;
  }

  async close(): Promise<void> {
    this.logger.debug('InMemoryVectorStore closed');
  }
}
