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
 * Unit tests for Retriever
 */

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Retriever, expandQuery, selectFilter } from './Retriever';
import { Embedder } from '../services/Embedder';
import { InMemoryVectorStore } from '../services/InMemoryVectorStore';
import { ValidationError } from '../errors';
import { RetrievalResult } from '../models';
import { HashingEmbeddingBackend, createTestLogger, hashEmbed } from '../testUtils';

const DIMENSION = 1024;

const CHUNKS = [
  {
    id: 'chunk_0',
    text: 'The Department of Computer Science offers BSc and MSc programs.',
    metadata: { hasEligibility: false, hasFaculty: false, hasPrograms: false },
  },
  {
    id: 'chunk_1',
    text: 'Admission requirements include a minimum CGPA of 3.0.',
    metadata: { hasEligibility: true, hasFaculty: false, hasPrograms: false },
  },
  {
    id: 'chunk_2',
    text: 'The faculty includes experienced professors and researchers.',
    metadata: { hasEligibility: false, hasFaculty: true, hasPrograms: false },
  },
];

describe('expandQuery', () => {
  it('should append every matching expansion in rule order', () => {
    expect(expandQuery('Who are the faculty members in the program?')).toBe(
      'Who are the faculty members in the program? faculty members professors offered programs degrees',
    );
  });

  it('should match triggers case-insensitively and keep the original text', () => {
    expect(expandQuery('ADMISSION dates')).toBe(
      'ADMISSION dates eligibility criteria admission requirements',
    );
  });

  it('should leave questions without triggers unchanged', () => {
    expect(expandQuery('Where is the library?')).toBe('Where is the library?');
  });
});

describe('selectFilter', () => {
  it('should map question intent to a metadata filter', () => {
    expect(selectFilter('What criteria apply?')).toEqual({ hasEligibility: true });
    expect(selectFilter('Who is the chairman?')).toEqual({ hasFaculty: true });
    expect(selectFilter('Which degrees are offered?')).toEqual({ hasPrograms: true });
  });

  it('should let the first matching intent win', () => {
    expect(selectFilter('Does faculty review admission?')).toEqual({ hasEligibility: true });
  });

  it('should return undefined without a recognised intent', () => {
    expect(selectFilter('Where is the library?')).toBeUndefined();
  });
});

describe('Retriever', () => {
  let embedder: Embedder;
  let vectorStore: InMemoryVectorStore;

  const buildRetriever = (applyMetadataFilter = false) =>
    new Retriever({
      logger: createTestLogger(),
      embedder,
      vectorStore,
      defaultTopK: 2,
      applyMetadataFilter,
    });

  beforeEach(async () => {
    embedder = new Embedder(createTestLogger(), new HashingEmbeddingBackend(DIMENSION), {
      model: 'test-model',
      batchSize: 8,
    });
    vectorStore = new InMemoryVectorStore(createTestLogger());
    await vectorStore.add(
      CHUNKS.map(chunk => ({ ...chunk, vector: hashEmbed(chunk.text, DIMENSION) })),
    );
  });

  describe('buildQuery', () => {
    it('should not attach a filter unless filtering is enabled', () => {
      expect(buildRetriever().buildQuery('Who is the dean?')).toEqual({
        rawText: 'Who is the dean?',
        expandedText: 'Who is the dean?',
      });
    });

    it('should attach the intent filter when filtering is enabled', () => {
      expect(buildRetriever(true).buildQuery('Who is the dean?')).toEqual({
        rawText: 'Who is the dean?',
        expandedText: 'Who is the dean?',
        filter: { hasFaculty: true },
      });
    });
  });

  describe('retrieve', () => {
    it('should embed the expanded question and query with the default k', async () => {
      const embedSpy = jest.spyOn(embedder, 'embed');
      const querySpy = jest.spyOn(vectorStore, 'query');

      const results = await buildRetriever().retrieve('Who are the faculty members?');

      expect(embedSpy).toHaveBeenCalledWith('Who are the faculty members? faculty members professors');
      expect(querySpy).toHaveBeenCalledWith(
        hashEmbed('Who are the faculty members? faculty members professors', DIMENSION),
        2,
        undefined,
      );
      expect(results).toHaveLength(2);
      expect(results[0].chunkId).toBe('chunk_2');
    });

    it('should honour an explicit k', async () => {
      await expect(buildRetriever().retrieve('Who are the faculty members?', 3)).resolves.toHaveLength(3);
    });

    it('should restrict results with the intent filter', async () => {
      const results = await buildRetriever(true).retrieve('Who is the chairman of the department?', 3);

      expect(results.map(result => result.chunkId)).toEqual(['chunk_2']);
    });

    it('should return an empty list when nothing is indexed', async () => {
      await vectorStore.reset();

      await expect(buildRetriever().retrieve('What are the admission requirements?')).resolves.toEqual([]);
    });

    it.each([0, -1, 1.5])('should reject k = %p', async k => {
      await expect(buildRetriever().retrieve('Who is the dean?', k)).rejects.toThrow(ValidationError);
    });
  });

  describe('formatContext', () => {
    const result = (chunkId: string, text: string): RetrievalResult => ({
      chunkId,
      text,
      metadata: {},
      distance: 0.1,
    });

    it('should number each context block', () => {
      expect(buildRetriever().formatContext([result('chunk_0', 'A'), result('chunk_1', 'B')])).toBe(
        '[Context 1]\nA\n\n[Context 2]\nB\n',
      );
    });

    it('should return an empty string for no results', () => {
      expect(buildRetriever().formatContext([])).toBe('');
    });
  });

  describe('retrieveAndFormat', () => {
    it('should return the formatted context with its results', async () => {
      const { context, results } = await buildRetriever().retrieveAndFormat(
        'Who are the faculty members?',
        1,
      );

      expect(results.map(item => item.chunkId)).toEqual(['chunk_2']);
      expect(context).toBe(
        '[Context 1]\nThe faculty includes experienced professors and researchers.\n',
      );
    });
  });
});
