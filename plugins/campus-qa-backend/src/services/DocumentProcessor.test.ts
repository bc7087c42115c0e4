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
 * Unit tests for DocumentProcessor
 */

import { describe, expect, it } from '@jest/globals';
import { DocumentProcessor } from './DocumentProcessor';
import { ValidationError } from '../errors';
import { ChunkingMode } from '../models';
import { createTestLogger } from '../testUtils';

const CORPUS = [
  'The Department of Computer Science offers BSc and MSc programs.',
  'Admission requirements include a minimum CGPA of 3.0.',
  'The faculty includes experienced professors and researchers.',
].join(' ');

const numberedWords = (count: number): string =>
  Array.from({ length: count }, (_, i) => `w${i + 1}`).join(' ');

const buildProcessor = (chunkSize: number, chunkOverlap: number, mode: ChunkingMode = 'sections') =>
  new DocumentProcessor(createTestLogger(), { chunkSize, chunkOverlap, mode });

describe('DocumentProcessor', () => {
  describe('constructor', () => {
    it('should reject an overlap equal to the chunk size', () => {
      expect(() => buildProcessor(5, 5)).toThrow(ValidationError);
    });

    it('should reject a non-positive chunk size', () => {
      expect(() => buildProcessor(0, 0)).toThrow('chunkSize must be a positive integer, got 0');
    });

    it('should reject a negative overlap', () => {
      expect(() => buildProcessor(5, -1)).toThrow(ValidationError);
    });
  });

  describe('clean', () => {
    const processor = buildProcessor(250, 50);

    it('should return an empty string for empty input', () => {
      expect(processor.clean('')).toBe('');
    });

    it('should replace unsupported symbols and collapse spaces', () => {
      expect(processor.clean('Hello™   world\t\tagain')).toBe('Hello world again');
    });

    it('should collapse runs of blank lines', () => {
      expect(processor.clean('first\n\n\n\nsecond')).toBe('first\n\nsecond');
    });

    it('should re-join hyphenated line breaks', () => {
      expect(processor.clean('infor-\nmation desk')).toBe('information desk');
    });

    it('should remove whitespace before punctuation', () => {
      expect(processor.clean('  Fees , dues and charges .  ')).toBe('Fees, dues and charges.');
    });
  });

  describe('chunkByWords', () => {
    it('should produce overlapping windows', () => {
      const chunks = buildProcessor(5, 2).chunkByWords(numberedWords(12));

      expect(chunks).toEqual([
        'w1 w2 w3 w4 w5',
        'w4 w5 w6 w7 w8',
        'w7 w8 w9 w10 w11',
        'w10 w11 w12',
      ]);
    });

    it('should return a single chunk when the text fits', () => {
      expect(buildProcessor(5, 2).chunkByWords(numberedWords(5))).toEqual(['w1 w2 w3 w4 w5']);
    });

    it('should return no chunks for whitespace-only input', () => {
      expect(buildProcessor(5, 2).chunkByWords('  \n ')).toEqual([]);
    });

    it('should match the expected chunk count for larger inputs', () => {
      // ceil((W - O) / (S - O)) with W=1000, S=250, O=50
      expect(buildProcessor(250, 50).chunkByWords(numberedWords(1000))).toHaveLength(5);
    });
  });

  describe('chunkBySentences', () => {
    it('should pack whole sentences up to the chunk size', () => {
      expect(buildProcessor(20, 2).chunkBySentences(CORPUS)).toEqual([
        'The Department of Computer Science offers BSc and MSc programs. Admission requirements include a minimum CGPA of 3.0.',
        'The faculty includes experienced professors and researchers.',
      ]);
    });

    it('should start a new chunk for every sentence that does not fit', () => {
      expect(buildProcessor(12, 2).chunkBySentences(CORPUS)).toHaveLength(3);
    });

    it('should keep an oversized sentence intact as its own chunk', () => {
      expect(buildProcessor(3, 0).chunkBySentences('One two three four five. Six.')).toEqual([
        'One two three four five.',
        'Six.',
      ]);
    });

    it('should return no chunks for empty input', () => {
      expect(buildProcessor(12, 2).chunkBySentences('')).toEqual([]);
    });
  });

  describe('chunkBySections', () => {
    it('should split before each department heading', () => {
      const text =
        'Department of Computer Science\nIntro text here.\nDepartment of Electrical Engineering\nMore text.';

      expect(buildProcessor(50, 5).chunkBySections(text)).toEqual([
        'Department of Computer Science\nIntro text here.',
        'Department of Electrical Engineering\nMore text.',
      ]);
    });

    it('should split before numbered lines', () => {
      const text = 'Overview of the campus.\n1. Fees are due monthly.\n2. Hostels are available.';

      expect(buildProcessor(50, 5).chunkBySections(text)).toEqual([
        'Overview of the campus.',
        '1. Fees are due monthly.',
        '2. Hostels are available.',
      ]);
    });

    it('should fall back to sentence packing without headings', () => {
      const text = 'no headings here. just two sentences.';

      expect(buildProcessor(50, 5).chunkBySections(text)).toEqual([
        'no headings here. just two sentences.',
      ]);
    });
  });

  describe('chunk', () => {
    it('should dispatch on the requested mode', () => {
      const processor = buildProcessor(5, 2, 'sentences');

      expect(processor.chunk(numberedWords(6), 'words')).toEqual(['w1 w2 w3 w4 w5', 'w4 w5 w6']);
      expect(processor.chunk(numberedWords(6))).toEqual([numberedWords(6)]);
    });
  });

  describe('extractMetadata', () => {
    const processor = buildProcessor(250, 50);

    it('should detect programs and the department name', () => {
      expect(
        processor.extractMetadata('The Department of Computer Science offers programs: BSc and MSc.'),
      ).toEqual({
        hasEligibility: false,
        hasPrograms: true,
        hasFaculty: false,
        hasIntroduction: false,
        department: 'Computer Science',
      });
    });

    it('should detect eligibility, faculty and introduction cues case-insensitively', () => {
      const metadata = processor.extractMetadata(
        'INTRODUCTION: Established in 1961. ADMISSION is open. The Dean leads the school.',
      );

      expect(metadata).toEqual({
        hasEligibility: true,
        hasPrograms: false,
        hasFaculty: true,
        hasIntroduction: true,
      });
    });

    it('should capture engineering departments', () => {
      expect(
        processor.extractMetadata('Department of Electrical Engineering was founded early.').department,
      ).toBe('Electrical Engineering');
    });
  });

  describe('createChunks', () => {
    it('should assign sequential ids, metadata, chunk index and source', () => {
      const chunks = buildProcessor(12, 2, 'sentences').createChunks(CORPUS, 'handbook.txt');

      expect(chunks.map(chunk => chunk.id)).toEqual(['chunk_0', 'chunk_1', 'chunk_2']);
      expect(chunks[1]).toEqual({
        id: 'chunk_1',
        text: 'Admission requirements include a minimum CGPA of 3.0.',
        metadata: {
          hasEligibility: true,
          hasPrograms: false,
          hasFaculty: false,
          hasIntroduction: false,
          chunkId: 1,
          source: 'handbook.txt',
        },
      });
      expect(chunks[0].metadata.department).toBe('Computer Science');
      expect(chunks[2].metadata.hasFaculty).toBe(true);
    });

    it('should return no chunks for empty text', () => {
      expect(buildProcessor(12, 2).createChunks('', 'empty.txt')).toEqual([]);
    });
  });
});
