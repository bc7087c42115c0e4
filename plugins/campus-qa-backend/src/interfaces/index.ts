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
 * Service interfaces following SOLID principles
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  CampusQaConfig,
  Chunk,
  ChunkingMode,
  MetadataFilter,
  Query,
  RetrievalResult,
  VectorRecord,
} from '../models';

/**
 * Options forwarded to the generation backend
 */
export interface GenerationOptions {
  maxTokens: number;
  temperature: number;
}

/**
 * Interface for text generation
 * Single Responsibility: turns a prompt into text
 */
export interface ITextGenerator {
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

/**
 * Raw embedding backend (one network call per invocation)
 */
export interface IEmbeddingBackend {
  generateEmbeddings(inputs: string[], model: string): Promise<number[][]>;
}

/**
 * Interface for the embedder used at both ingestion and query time
 */
export interface IEmbedder {
  readonly model: string;

  initialize(): Promise<void>;

  embed(text: string): Promise<number[]>;

  /**
   * Embed several texts, preserving input order
   */
  embedBatch(texts: string[]): Promise<number[][]>;

  dimension(): number;
}

/**
 * Interface for vector store operations
 * Single Responsibility: Manages vector storage and retrieval
 */
export interface IVectorStore {
  initialize(): Promise<void>;

  /**
   * Upsert records by id
   */
  add(records: VectorRecord[]): Promise<void>;

  /**
   * Nearest neighbours by cosine distance, optionally restricted by metadata
   */
  query(vector: number[], k: number, filter?: MetadataFilter): Promise<RetrievalResult[]>;

  /**
   * Delete every entry; safe to call repeatedly
   */
  reset(): Promise<void>;

  /**
   * Atomically swap the whole collection for `records`; an empty batch
   * leaves the collection empty with no established dimension
   */
  replaceAll(records: VectorRecord[]): Promise<void>;

  count(): Promise<number>;

  /**
   * Dimension established by the first add, or null while empty
   */
  dimension(): number | null;

  close(): Promise<void>;
}

/**
 * Interface for document processing
 * Single Responsibility: Handles cleaning and chunking
 */
export interface IDocumentProcessor {
  clean(text: string): string;

  chunk(text: string, mode?: ChunkingMode): string[];

  createChunks(text: string, source: string): Chunk[];
}

export interface ScopeClassification {
  accepted: boolean;
  score: number;
  reason: string;
  matchedKeywords: string[];
}

/**
 * Interface for the out-of-domain question gate
 */
export interface IScopeGate {
  readonly refusalMessage: string;

  classify(question: string): ScopeClassification;
}

/**
 * Interface for retrieval
 */
export interface IRetriever {
  buildQuery(question: string): Query;

  retrieve(question: string, k?: number): Promise<RetrievalResult[]>;

  formatContext(results: RetrievalResult[]): string;
}

/**
 * Interface for configuration management
 * Single Responsibility: Manages service configuration
 */
export interface IConfigService {
  getConfig(): CampusQaConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}
