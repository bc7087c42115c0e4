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
 * Domain models and data structures
 *
 * @packageDocumentation
 */

/**
 * Scalar values allowed in chunk metadata and filters
 */
export type MetadataValue = string | number | boolean;

/**
 * Flat metadata attached to every stored chunk
 */
export type Metadata = Record<string, MetadataValue>;

/**
 * Conjunction of exact-match constraints over stored metadata
 */
export type MetadataFilter = Record<string, MetadataValue>;

/**
 * A bounded, indexed unit of corpus text
 */
export interface Chunk {
  id: string;
  text: string;
  metadata: Metadata;
}

/**
 * Entry written to a vector store
 */
export interface VectorRecord {
  id: string;
  vector: number[];
  metadata: Metadata;
  text: string;
}

/**
 * Nearest-neighbour hit, ordered ascending by cosine distance
 */
export interface RetrievalResult {
  chunkId: string;
  text: string;
  metadata: Metadata;
  distance: number;
}

/**
 * Per-request retrieval query
 */
export interface Query {
  rawText: string;
  expandedText: string;
  filter?: MetadataFilter;
}

export interface AnswerSource {
  chunkId: number;
  source: string;
  relevanceScore: number;
}

export interface AnswerMetadata {
  guardrailTriggered: boolean;
  retrievalCount: number;
  question: string;
  topK: number;
  error?: string;
}

/**
 * Structured, citation-bearing answer returned for every question
 */
export interface Answer {
  text: string;
  citations: string[];
  sources: AnswerSource[];
  metadata: AnswerMetadata;
}

export type ChunkingMode = 'words' | 'sentences' | 'sections';

/**
 * Ollama generate API response structure
 */
export interface OllamaGenerateResponse {
  model: string;
  created_at: string;
  response: string;
  done: boolean;
}

/**
 * Ollama embed API response structure
 */
export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Vector store configuration
 */
export interface VectorStoreConfig {
  type: 'memory' | 'postgresql';
  collection: string;
  autoMigrate: boolean;
  postgresql?: PostgresConfig;
}

/**
 * Configuration for the question answering service
 */
export interface CampusQaConfig {
  generationModel: string;
  embeddingModel: string;
  embeddingDimension?: number;
  embeddingBatchSize: number;
  ollamaBaseUrl: string;
  chunkSize: number;
  chunkOverlap: number;
  chunkingMode: ChunkingMode;
  defaultTopK: number;
  applyMetadataFilter: boolean;
  generation: {
    maxTokens: number;
    temperature: number;
  };
  scopeGate: {
    threshold: number;
    keywords: string[];
    refusalMessage: string;
  };
  domainDescription: string;
  corpus: {
    path?: string;
    source: string;
    smokeQuestion?: string;
  };
  vectorStore: VectorStoreConfig;
  server: {
    host: string;
    port: number;
  };
  logLevel: string;
}
