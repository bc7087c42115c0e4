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
 * Document processor for cleaning and chunking
 * Handles document preparation for embedding
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IDocumentProcessor } from '../interfaces';
import { Chunk, ChunkingMode, Metadata } from '../models';
import { ValidationError } from '../errors';

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
  mode: ChunkingMode;
}

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

// "Department of ...", "3. Fees" at line start, or an all-caps line
const SECTION_BOUNDARY = /(?=\bDepartment of\b|^\d+\.|\n[A-Z][A-Z\s]{5,}\n)/m;

const DEPARTMENT_NAME = /Department of ([A-Z][a-z\s&]+(?:Engineering|Science|Management))/;

function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Service for processing documents into chunks
 * Follows Single Responsibility Principle
 */
export class DocumentProcessor implements IDocumentProcessor {
  private readonly logger: Logger;
  private readonly options: ChunkingOptions;

  constructor(logger: Logger, options: ChunkingOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    if (
      !Number.isInteger(options.chunkOverlap) ||
      options.chunkOverlap < 0 ||
      options.chunkOverlap >= options.chunkSize
    ) {
      throw new ValidationError(
        `chunkOverlap must satisfy 0 <= overlap < chunkSize, got ${options.chunkOverlap}`,
      );
    }

    this.logger = logger;
    this.options = options;
  }

  /**
   * Normalize extracted text before chunking
   */
  clean(text: string): string {
    if (!text) {
      this.logger.warn('Empty text provided for cleaning');
      return '';
    }

    let cleaned = text;

    // Drop symbols outside the punctuation we keep
    cleaned = cleaned.replace(/[^\w\s.,;:?!\-()[\]{}/'"%$#@&+=*]/g, ' ');

    cleaned = cleaned.replace(/[ \t]+/g, ' ');
    cleaned = cleaned.replace(/\n\s*\n\s*\n+/g, '\n\n');

    // Hyphenated line breaks left by extraction
    cleaned = cleaned.replace(/(\w)-\s+(\w)/g, '$1$2');
    cleaned = cleaned.replace(/\s+([.,;:!?])/g, '$1');

    this.logger.info(`Cleaned text: ${text.length} -> ${cleaned.trim().length} characters`);
    return cleaned.trim();
  }

  /**
   * Split text with the given (or configured) strategy
   */
  chunk(text: string, mode: ChunkingMode = this.options.mode): string[] {
    switch (mode) {
      case 'words':
        return this.chunkByWords(text);
      case 'sentences':
        return this.chunkBySentences(text);
      case 'sections':
      default:
        return this.chunkBySections(text);
    }
  }

  /**
   * Fixed windows of chunkSize words; consecutive windows share chunkOverlap words
   */
  chunkByWords(text: string): string[] {
    const words = text.split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) {
      this.logger.warn('Empty text provided for chunking');
      return [];
    }

    const { chunkSize, chunkOverlap } = this.options;
    const chunks: string[] = [];
    let start = 0;

    while (start < words.length) {
      const end = Math.min(start + chunkSize, words.length);
      chunks.push(words.slice(start, end).join(' '));

      if (end >= words.length) {
        break;
      }
      start += chunkSize - chunkOverlap;
    }

    this.logger.info(
      `Created ${chunks.length} chunks from ${words.length} words (size=${chunkSize}, overlap=${chunkOverlap})`,
    );
    return chunks;
  }

  /**
   * Greedily pack whole sentences while the word count stays within chunkSize
   */
  chunkBySentences(text: string): string[] {
    const sentences = text
      .split(SENTENCE_BOUNDARY)
      .map(sentence => sentence.trim())
      .filter(sentence => sentence.length > 0);

    const chunks: string[] = [];
    let current: string[] = [];
    let currentWordCount = 0;

    for (const sentence of sentences) {
      const sentenceWordCount = countWords(sentence);

      if (currentWordCount + sentenceWordCount <= this.options.chunkSize) {
        current.push(sentence);
        currentWordCount += sentenceWordCount;
      } else {
        if (current.length > 0) {
          chunks.push(current.join(' '));
        }
        current = [sentence];
        currentWordCount = sentenceWordCount;
      }
    }

    if (current.length > 0) {
      chunks.push(current.join(' '));
    }

    this.logger.debug(`Created ${chunks.length} sentence-based chunks`);
    return chunks;
  }

  /**
   * Split on heading-like markers, then sentence-pack each section
   */
  chunkBySections(text: string): string[] {
    const sections = text.split(SECTION_BOUNDARY);

    if (sections.length <= 1) {
      return this.chunkBySentences(text);
    }

    const chunks: string[] = [];
    for (const section of sections) {
      const trimmed = section.trim();
      if (trimmed.length > 0) {
        chunks.push(...this.chunkBySentences(trimmed));
      }
    }

    this.logger.info(`Created ${chunks.length} section-aware sentence chunks from ${sections.length} sections`);
    return chunks;
  }

  /**
   * Keyword and pattern flags used for optional metadata filtering
   */
  extractMetadata(chunkText: string): Metadata {
    const lower = chunkText.toLowerCase();
    const metadata: Metadata = {
      hasEligibility:
        lower.includes('eligibility') || lower.includes('admission') || lower.includes('requirement'),
      hasPrograms: lower.includes('offered programs') || lower.includes('programs:'),
      hasFaculty: lower.includes('faculty') || lower.includes('professor') || lower.includes('dean'),
      hasIntroduction: lower.includes('introduction:') || lower.includes('established'),
    };

    const departmentMatch = DEPARTMENT_NAME.exec(chunkText);
    if (departmentMatch) {
      metadata.department = departmentMatch[1].trim();
    }

    return metadata;
  }

  /**
   * Chunk a cleaned corpus and attach ids and metadata
   */
  createChunks(text: string, source: string): Chunk[] {
    return this.chunk(text).map((chunkText, index) => ({
      id: `chunk_${index}`,
      text: chunkText,
      metadata: {
        ...this.extractMetadata(chunkText),
        chunkId: index,
        source,
      },
    }));
  }
}
