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
 * Offline ingestion: chunk, embed, rebuild the index
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { stringifyError } from '@backstage/errors';
import { IDocumentProcessor, IEmbedder, IRetriever, IVectorStore } from '../interfaces';
import { VectorRecord } from '../models';

export interface IngestionPipelineDependencies {
  logger: Logger;
  documentProcessor: IDocumentProcessor;
  embedder: IEmbedder;
  vectorStore: IVectorStore;
  /**
   * Used for the optional post-ingest smoke query
   */
  retriever?: IRetriever;
}

export interface IngestOptions {
  source: string;
  /**
   * Question whose top results are logged once the index is rebuilt
   */
  smokeQuestion?: string;
}

export interface IngestionReport {
  chunkCount: number;
  dimension: number | null;
  storedCount: number;
  durationMs: number;
}

/**
 * Rebuilds the vector index from a cleaned corpus.
 *
 * Every chunk is embedded before the store is touched, and the store swaps
 * its contents in one atomic replace, so a failing embedding backend or
 * store leaves the previous index in place.
 */
export class IngestionPipeline {
  private readonly logger: Logger;
  private readonly documentProcessor: IDocumentProcessor;
  private readonly embedder: IEmbedder;
  private readonly vectorStore: IVectorStore;
  private readonly retriever?: IRetriever;

  constructor(dependencies: IngestionPipelineDependencies) {
    this.logger = dependencies.logger;
    this.documentProcessor = dependencies.documentProcessor;
    this.embedder = dependencies.embedder;
    this.vectorStore = dependencies.vectorStore;
    this.retriever = dependencies.retriever;
  }

  async ingest(text: string, options: IngestOptions): Promise<IngestionReport> {
    const startedAt = Date.now();
    this.logger.info(`Starting ingestion of ${options.source}`);

    const chunks = this.documentProcessor.createChunks(text, options.source);
    if (chunks.length === 0) {
      this.logger.warn('No chunks produced from input text');
    } else {
      this.logger.info(`Created ${chunks.length} chunks`);
    }

    const vectors = await this.embedder.embedBatch(chunks.map(chunk => chunk.text));

    const records: VectorRecord[] = chunks.map((chunk, index) => ({
      id: chunk.id,
      vector: vectors[index],
      metadata: chunk.metadata,
      text: chunk.text,
    }));

    await this.vectorStore.replaceAll(records);

    const storedCount = await this.vectorStore.count();
    const report: IngestionReport = {
      chunkCount: chunks.length,
      dimension: this.vectorStore.dimension(),
      storedCount,
      durationMs: Date.now() - startedAt,
    };

    this.logger.info(
      `Ingestion complete: ${report.storedCount} chunks stored in ${report.durationMs}ms`,
    );

    if (options.smokeQuestion && storedCount > 0) {
      await this.smokeQuery(options.smokeQuestion);
    }

    return report;
  }

  private async smokeQuery(question: string): Promise<void> {
    if (!this.retriever) {
      return;
    }
    try {
      const results = await this.retriever.retrieve(question);
      this.logger.info(`Smoke query '${question}' returned ${results.length} results`);
      for (const [index, result] of results.entries()) {
        this.logger.debug(
          `Smoke result ${index + 1} (${result.chunkId}, distance ${result.distance.toFixed(4)}): ${result.text.slice(0, 100)}`,
        );
      }
    } catch (error) {
      this.logger.warn(`Smoke query failed: ${stringifyError(error)}`);
    }
  }
}
