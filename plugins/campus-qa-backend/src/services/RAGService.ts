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
 * RAG Service implementation
 * Owns the pipeline components and their lifecycle
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { stringifyError } from '@backstage/errors';
import {
  IConfigService,
  IEmbeddingBackend,
  ITextGenerator,
  IVectorStore,
  ServiceDependencies,
} from '../interfaces';
import { Answer } from '../models';
import { DimensionMismatchError, ServiceNotReadyError } from '../errors';
import { AnswerOrchestrator } from '../rag/AnswerOrchestrator';
import { Retriever } from '../rag/Retriever';
import { AnswerOptions, AnswerOutcome } from '../rag/types';
import { ConfigService } from './ConfigService';
import { DocumentProcessor } from './DocumentProcessor';
import { Embedder } from './Embedder';
import { IngestionPipeline, IngestionReport } from './IngestionPipeline';
import { OllamaLLMService } from './OllamaLLMService';
import { ScopeGate } from './ScopeGate';
import { VectorStoreFactory } from './VectorStoreFactory';

/**
 * Reachability check for the model server
 */
export interface IModelHealthCheck {
  healthCheck(): Promise<boolean>;
}

export interface RAGServiceDependencies extends ServiceDependencies {
  generator: ITextGenerator;
  embeddingBackend: IEmbeddingBackend;
  vectorStore: IVectorStore;
  modelHealth?: IModelHealthCheck;
}

export interface ServiceIngestOptions {
  source?: string;
  smokeQuestion?: string;
  /**
   * Run the text cleaner before chunking
   */
  clean?: boolean;
}

export interface ServiceStats {
  documentCount: number;
  collection: string;
  embeddingModel: string;
  generationModel: string;
  dimension: number | null;
}

export interface ServiceHealth {
  status: 'ok' | 'degraded';
  modelReachable: boolean;
  documentCount: number | null;
}

/**
 * Service that wires the RAG pipeline together
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class RAGService {
  readonly vectorStore: IVectorStore;
  readonly embedder: Embedder;
  readonly documentProcessor: DocumentProcessor;
  readonly scopeGate: ScopeGate;
  readonly retriever: Retriever;
  readonly orchestrator: AnswerOrchestrator;
  readonly ingestion: IngestionPipeline;

  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly modelHealth?: IModelHealthCheck;

  private initialized = false;
  private ingestionInProgress = false;

  constructor(dependencies: RAGServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.vectorStore = dependencies.vectorStore;
    this.modelHealth = dependencies.modelHealth;

    const config = this.configService.getConfig();

    this.embedder = new Embedder(this.logger, dependencies.embeddingBackend, {
      model: config.embeddingModel,
      batchSize: config.embeddingBatchSize,
      expectedDimension: config.embeddingDimension,
    });
    this.documentProcessor = new DocumentProcessor(this.logger, {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      mode: config.chunkingMode,
    });
    this.scopeGate = new ScopeGate(this.logger, config.scopeGate);
    this.retriever = new Retriever({
      logger: this.logger,
      embedder: this.embedder,
      vectorStore: this.vectorStore,
      defaultTopK: config.defaultTopK,
      applyMetadataFilter: config.applyMetadataFilter,
    });
    this.orchestrator = new AnswerOrchestrator({
      logger: this.logger,
      scopeGate: this.scopeGate,
      retriever: this.retriever,
      generator: dependencies.generator,
      domainDescription: config.domainDescription,
      defaults: {
        topK: config.defaultTopK,
        maxTokens: config.generation.maxTokens,
        temperature: config.generation.temperature,
      },
    });
    this.ingestion = new IngestionPipeline({
      logger: this.logger,
      documentProcessor: this.documentProcessor,
      embedder: this.embedder,
      vectorStore: this.vectorStore,
      retriever: this.retriever,
    });
  }

  /**
   * Open the store and measure the embedding model.
   * Fails when the stored collection was built with another dimension.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.logger.info('Initializing RAG service...');
    await this.vectorStore.initialize();
    await this.embedder.initialize();

    const storeDimension = this.vectorStore.dimension();
    const embedderDimension = this.embedder.dimension();
    if (storeDimension !== null && storeDimension !== embedderDimension) {
      throw new DimensionMismatchError(
        storeDimension,
        embedderDimension,
        `collection ${this.configService.getConfig().vectorStore.collection} vs model ${this.embedder.model}`,
      );
    }

    this.initialized = true;
    const count = await this.vectorStore.count();
    this.logger.info(`RAG service ready with ${count} documents`);
  }

  async close(): Promise<void> {
    await this.vectorStore.close();
    this.initialized = false;
    this.logger.info('RAG service closed');
  }

  async evaluate(question: string, options?: AnswerOptions): Promise<AnswerOutcome> {
    this.ensureInitialized();
    return this.orchestrator.evaluate(question, options);
  }

  async answer(question: string, options?: AnswerOptions): Promise<Answer> {
    this.ensureInitialized();
    return this.orchestrator.answer(question, options);
  }

  async answerBatch(questions: string[], options?: AnswerOptions): Promise<Answer[]> {
    this.ensureInitialized();
    return this.orchestrator.answerBatch(questions, options);
  }

  /**
   * Rebuild the index from a corpus
   */
  async ingest(text: string, options: ServiceIngestOptions = {}): Promise<IngestionReport> {
    this.ensureInitialized();

    if (this.ingestionInProgress) {
      throw new Error('Ingestion already in progress');
    }

    const { corpus } = this.configService.getConfig();
    try {
      this.ingestionInProgress = true;
      const input = options.clean ? this.documentProcessor.clean(text) : text;
      return await this.ingestion.ingest(input, {
        source: options.source ?? corpus.source,
        smokeQuestion: options.smokeQuestion ?? corpus.smokeQuestion,
      });
    } catch (error) {
      this.logger.error(`Ingestion failed: ${stringifyError(error)}`);
      throw error;
    } finally {
      this.ingestionInProgress = false;
    }
  }

  async getStats(): Promise<ServiceStats> {
    this.ensureInitialized();
    const config = this.configService.getConfig();

    return {
      documentCount: await this.vectorStore.count(),
      collection: config.vectorStore.collection,
      embeddingModel: config.embeddingModel,
      generationModel: config.generationModel,
      dimension: this.vectorStore.dimension(),
    };
  }

  async healthCheck(): Promise<ServiceHealth> {
    const modelReachable = this.modelHealth ? await this.modelHealth.healthCheck() : true;

    let documentCount: number | null = null;
    if (this.initialized) {
      try {
        documentCount = await this.vectorStore.count();
      } catch (error) {
        this.logger.error(`Health check could not count documents: ${stringifyError(error)}`);
      }
    }

    return {
      status: modelReachable && documentCount !== null ? 'ok' : 'degraded',
      modelReachable,
      documentCount,
    };
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new ServiceNotReadyError('RAGService not initialized. Call initialize() first.');
    }
  }
}

/**
 * Production wiring: Ollama for both models and the configured vector store.
 * Returns an initialized service; on failure the store is closed again.
 */
export async function createRAGService(
  configService: ConfigService,
  logger: Logger,
): Promise<RAGService> {
  const ollama = new OllamaLLMService({ logger, config: configService });
  const vectorStore = await VectorStoreFactory.create(configService, logger);

  const service = new RAGService({
    logger,
    config: configService,
    generator: ollama,
    embeddingBackend: ollama,
    vectorStore,
    modelHealth: ollama,
  });

  try {
    await service.initialize();
  } catch (error) {
    await vectorStore.close();
    throw error;
  }

  return service;
}
