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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import type { Logger } from 'winston';
import { RAGService, RAGServiceDependencies } from './RAGService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { DEFAULT_REFUSAL_MESSAGE } from './ConfigService';
import { DimensionMismatchError, ServiceNotReadyError } from '../errors';
import { CampusQaConfig } from '../models';
import { HashingEmbeddingBackend, StubGenerator, createTestConfig, createTestLogger } from '../testUtils';

const DIMENSION = 1024;
const REPLY = 'Applicants need a minimum CGPA of 3.0.';

const CORPUS = [
  'The Department of Computer Science offers BSc and MSc programs.',
  'Admission requirements include a minimum CGPA of 3.0.',
  'The faculty includes experienced professors and researchers.',
].join(' ');

describe('RAGService', () => {
  let logger: Logger;
  let vectorStore: InMemoryVectorStore;
  let generator: StubGenerator;

  const buildService = (
    overrides: Partial<CampusQaConfig> = {},
    extra: Partial<RAGServiceDependencies> = {},
  ) =>
    new RAGService({
      logger,
      config: createTestConfig({
        chunkingMode: 'sentences',
        chunkSize: 12,
        chunkOverlap: 2,
        ...overrides,
      }),
      generator,
      embeddingBackend: new HashingEmbeddingBackend(DIMENSION),
      vectorStore,
      ...extra,
    });

  beforeEach(() => {
    logger = createTestLogger();
    vectorStore = new InMemoryVectorStore(logger);
    generator = new StubGenerator(REPLY);
  });

  describe('initialize', () => {
    it('should establish the embedding dimension', async () => {
      const service = buildService();

      await service.initialize();
      await service.initialize();

      expect(service.embedder.dimension()).toBe(DIMENSION);
    });

    it('should fail when the stored collection uses another dimension', async () => {
      await vectorStore.add([{ id: 'chunk_0', vector: [1, 0, 0], metadata: {}, text: 'old' }]);

      await expect(buildService().initialize()).rejects.toThrow(DimensionMismatchError);
    });

    it('should fail when the configured dimension differs from the model', async () => {
      await expect(buildService({ embeddingDimension: 768 }).initialize()).rejects.toThrow(
        'Embedding dimension mismatch (model nomic-embed-text): expected 768, got 1024',
      );
    });

    it('should refuse requests before initialization', async () => {
      const pending = buildService().answer('What are the admission requirements?');

      await expect(pending).rejects.toThrow(ServiceNotReadyError);
      await expect(pending).rejects.toThrow('RAGService not initialized. Call initialize() first.');
    });
  });

  describe('end to end', () => {
    let service: RAGService;

    beforeEach(async () => {
      service = buildService();
      await service.initialize();
      await service.ingest(CORPUS);
    });

    it('should answer an in-scope question from the indexed corpus', async () => {
      const answer = await service.answer('What are the admission requirements?');

      expect(answer.text).toBe(REPLY);
      expect(answer.citations).toHaveLength(3);
      expect(answer.citations[0]).toBe('Admission requirements include a minimum CGPA of 3.0.');
      expect(answer.sources[0].chunkId).toBe(1);
      expect(answer.sources[0].source).toBe('department_document');
      expect(answer.sources[0].relevanceScore).toBeGreaterThan(0);
      expect(answer.sources[0].relevanceScore).toBeLessThanOrEqual(1);
      expect(answer.metadata).toEqual({
        guardrailTriggered: false,
        retrievalCount: 3,
        question: 'What are the admission requirements?',
        topK: 3,
      });
      expect(generator.prompts[0]).toContain(
        '[Context 1]\nAdmission requirements include a minimum CGPA of 3.0.\n',
      );
    });

    it('should refuse an out-of-scope question without generating', async () => {
      const answer = await service.answer('What is the weather today?');

      expect(answer).toEqual({
        text: DEFAULT_REFUSAL_MESSAGE,
        citations: [],
        sources: [],
        metadata: {
          guardrailTriggered: true,
          retrievalCount: 0,
          question: 'What is the weather today?',
          topK: 3,
        },
      });
      expect(generator.prompts).toEqual([]);
    });

    it('should answer with no context once the index is emptied', async () => {
      await service.ingest('');

      const outcome = await service.evaluate('What are the admission requirements?');

      expect(outcome.status).toBe('no_context');
      expect(outcome.answer.metadata.retrievalCount).toBe(0);
    });

    it('should answer a batch in order', async () => {
      const answers = await service.answerBatch(
        ['What is the weather today?', 'Who are the faculty members?'],
        { topK: 1 },
      );

      expect(answers.map(answer => answer.text)).toEqual([DEFAULT_REFUSAL_MESSAGE, REPLY]);
      expect(answers[1].citations).toEqual([
        'The faculty includes experienced professors and researchers.',
      ]);
    });

    it('should report collection statistics', async () => {
      await expect(service.getStats()).resolves.toEqual({
        documentCount: 3,
        collection: 'campus_documents',
        embeddingModel: 'nomic-embed-text',
        generationModel: 'tinyllama',
        dimension: DIMENSION,
      });
    });
  });

  describe('ingest', () => {
    it('should clean the corpus when asked to', async () => {
      const service = buildService();
      await service.initialize();
      const cleanSpy = jest.spyOn(service.documentProcessor, 'clean');

      const report = await service.ingest('Admission   requirements ™ apply .', {
        clean: true,
        source: 'notes.txt',
      });

      expect(cleanSpy).toHaveBeenCalledTimes(1);
      expect(report.chunkCount).toBe(1);
      const [stored] = await vectorStore.query(await service.embedder.embed('admission'), 1);
      expect(stored.text).toBe('Admission requirements apply.');
      expect(stored.metadata.source).toBe('notes.txt');
    });

    it('should reject a concurrent ingestion', async () => {
      const service = buildService();
      await service.initialize();

      const first = service.ingest(CORPUS);
      const second = service.ingest(CORPUS);

      await expect(second).rejects.toThrow('Ingestion already in progress');
      await expect(first).resolves.toMatchObject({ storedCount: 3 });
    });
  });

  describe('healthCheck', () => {
    it('should be ok when the model answers and the store counts', async () => {
      const service = buildService();
      await service.initialize();

      await expect(service.healthCheck()).resolves.toEqual({
        status: 'ok',
        modelReachable: true,
        documentCount: 0,
      });
    });

    it('should be degraded when the model server is unreachable', async () => {
      const service = buildService({}, { modelHealth: { healthCheck: async () => false } });
      await service.initialize();

      await expect(service.healthCheck()).resolves.toEqual({
        status: 'degraded',
        modelReachable: false,
        documentCount: 0,
      });
    });

    it('should be degraded before initialization', async () => {
      await expect(buildService().healthCheck()).resolves.toEqual({
        status: 'degraded',
        modelReachable: true,
        documentCount: null,
      });
    });
  });

  describe('close', () => {
    it('should close the store and stop serving', async () => {
      const closeSpy = jest.spyOn(vectorStore, 'close');
      const service = buildService();
      await service.initialize();

      await service.close();

      expect(closeSpy).toHaveBeenCalledTimes(1);
      await expect(service.getStats()).rejects.toThrow('RAGService not initialized');
    });
  });
});
