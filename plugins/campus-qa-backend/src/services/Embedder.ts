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
 * Embedder adapter shared by ingestion and retrieval
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IEmbedder, IEmbeddingBackend } from '../interfaces';
import { DimensionMismatchError, ExternalModelError } from '../errors';

export interface EmbedderOptions {
  model: string;
  batchSize: number;
  /**
   * When set, the reported dimension must match it.
   */
  expectedDimension?: number;
}

const DIMENSION_SAMPLE = 'dimension check';

/**
 * Maps text to fixed-dimension vectors through a single embedding model.
 *
 * The same instance (or one built with the same model identifier) must be
 * used at ingestion and query time; vectors from different models are not
 * comparable.
 */
export class Embedder implements IEmbedder {
  readonly model: string;

  private readonly logger: Logger;
  private readonly backend: IEmbeddingBackend;
  private readonly batchSize: number;
  private readonly expectedDimension?: number;
  private establishedDimension: number | null = null;

  constructor(logger: Logger, backend: IEmbeddingBackend, options: EmbedderOptions) {
    this.logger = logger;
    this.backend = backend;
    this.model = options.model;
    this.batchSize = Math.max(1, options.batchSize);
    this.expectedDimension = options.expectedDimension;
  }

  async initialize(): Promise<void> {
    if (this.establishedDimension !== null) {
      return;
    }

    const [sample] = await this.request([DIMENSION_SAMPLE]);
    if (this.expectedDimension !== undefined && sample.length !== this.expectedDimension) {
      throw new DimensionMismatchError(this.expectedDimension, sample.length, `model ${this.model}`);
    }

    this.establishedDimension = sample.length;
    this.logger.info(`Embedding model ${this.model} ready (dimension ${sample.length})`);
  }

  dimension(): number {
    if (this.establishedDimension === null) {
      throw new Error('Embedder not initialized. Call initialize() first.');
    }
    return this.establishedDimension;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    if (texts.length > 1) {
      this.logger.info(`Generating embeddings for ${texts.length} texts`);
    }

    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const embedded = await this.request(batch);
      for (const vector of embedded) {
        this.checkDimension(vector);
        vectors.push(vector);
      }
    }

    return vectors;
  }

  private async request(batch: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.backend.generateEmbeddings(batch, this.model);
    } catch (error) {
      if (error instanceof ExternalModelError) {
        throw error;
      }
      throw new ExternalModelError(`Embedding request to ${this.model} failed`, error);
    }

    if (vectors.length !== batch.length) {
      throw new ExternalModelError(
        `Embedding backend returned ${vectors.length} vectors for ${batch.length} inputs`,
      );
    }
    return vectors;
  }

  private checkDimension(vector: number[]): void {
    if (this.establishedDimension === null) {
      this.establishedDimension = vector.length;
      return;
    }
    if (vector.length !== this.establishedDimension) {
      throw new DimensionMismatchError(this.establishedDimension, vector.length, `model ${this.model}`);
    }
  }
}
