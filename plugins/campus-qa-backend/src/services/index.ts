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
 * Service exports
 *
 * @packageDocumentation
 */

export { ConfigService, DEFAULT_REFUSAL_MESSAGE, readEnvConfig } from './ConfigService';
export { OllamaLLMService } from './OllamaLLMService';
export type { FetchFunction, OllamaLLMServiceDependencies } from './OllamaLLMService';
export { Embedder } from './Embedder';
export type { EmbedderOptions } from './Embedder';
export { DocumentProcessor } from './DocumentProcessor';
export type { ChunkingOptions } from './DocumentProcessor';
export { InMemoryVectorStore, cosineDistance, matchesFilter } from './InMemoryVectorStore';
export { PgVectorStore } from './PgVectorStore';
export type { PgVectorStoreOptions } from './PgVectorStore';
export { VectorStoreFactory } from './VectorStoreFactory';
export { ScopeGate } from './ScopeGate';
export type { ScopeGateOptions } from './ScopeGate';
export { IngestionPipeline } from './IngestionPipeline';
export type { IngestOptions, IngestionReport } from './IngestionPipeline';
export { RAGService, createRAGService } from './RAGService';
export type {
  IModelHealthCheck,
  RAGServiceDependencies,
  ServiceHealth,
  ServiceIngestOptions,
  ServiceStats,
} from './RAGService';
