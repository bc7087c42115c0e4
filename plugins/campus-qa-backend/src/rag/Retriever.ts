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
 * Question → expanded query → embedding → nearest chunks
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IEmbedder, IRetriever, IVectorStore } from '../interfaces';
import { MetadataFilter, Query, RetrievalResult } from '../models';
import { ValidationError } from '../errors';
import { RetrievedContext } from './types';

export interface RetrieverDependencies {
  logger: Logger;
  embedder: IEmbedder;
  vectorStore: IVectorStore;
  defaultTopK: number;
  applyMetadataFilter?: boolean;
}

interface ExpansionRule {
  triggers: string[];
  expansion: string;
}

interface FilterRule {
  triggers: string[];
  filter: MetadataFilter;
}

const EXPANSION_RULES: ExpansionRule[] = [
  {
    triggers: ['admission', 'requirement', 'eligibility'],
    expansion: 'eligibility criteria admission requirements',
  },
  { triggers: ['faculty', 'professor', 'staff'], expansion: 'faculty members professors' },
  { triggers: ['program', 'degree'], expansion: 'offered programs degrees' },
];

// First matching rule wins
const FILTER_RULES: FilterRule[] = [
  {
    triggers: ['admission', 'requirement', 'eligibility', 'criteria'],
    filter: { hasEligibility: true },
  },
  {
    triggers: ['faculty', 'professor', 'staff', 'dean', 'chairman'],
    filter: { hasFaculty: true },
  },
  { triggers: ['program', 'degree', 'offered'], filter: { hasPrograms: true } },
];

const containsAny = (text: string, triggers: string[]): boolean =>
  triggers.some(trigger => text.includes(trigger));

/**
 * Expand a question with related domain terms
 */
export function expandQuery(question: string): string {
  const lower = question.toLowerCase();
  const expansions = EXPANSION_RULES.filter(rule => containsAny(lower, rule.triggers)).map(
    rule => rule.expansion,
  );
  return expansions.length > 0 ? `${question} ${expansions.join(' ')}` : question;
}

/**
 * Metadata filter for the question's intent, if any
 */
export function selectFilter(question: string): MetadataFilter | undefined {
  const lower = question.toLowerCase();
  const rule = FILTER_RULES.find(candidate => containsAny(lower, candidate.triggers));
  return rule ? { ...rule.filter } : undefined;
}

export class Retriever implements IRetriever {
  private readonly logger: Logger;
  private readonly embedder: IEmbedder;
  private readonly vectorStore: IVectorStore;
  private readonly defaultTopK: number;
  private readonly applyMetadataFilter: boolean;

  constructor(dependencies: RetrieverDependencies) {
    this.logger = dependencies.logger;
    this.embedder = dependencies.embedder;
    this.vectorStore = dependencies.vectorStore;
    this.defaultTopK = dependencies.defaultTopK;
    this.applyMetadataFilter = dependencies.applyMetadataFilter ?? false;
  }

  buildQuery(question: string): Query {
    const query: Query = {
      rawText: question,
      expandedText: expandQuery(question),
    };
    if (this.applyMetadataFilter) {
      const filter = selectFilter(question);
      if (filter) {
        query.filter = filter;
      }
    }
    return query;
  }

  async retrieve(question: string, k: number = this.defaultTopK): Promise<RetrievalResult[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${k}`);
    }

    const query = this.buildQuery(question);

    this.logger.info(`Retrieving top ${k} documents for query: '${question}'`);
    if (query.expandedText !== question) {
      this.logger.info(`Expanded query: '${query.expandedText}'`);
    }

    const vector = await this.embedder.embed(query.expandedText);
    const results = await this.vectorStore.query(vector, k, query.filter);

    this.logger.info(`Retrieved ${results.length} documents`);
    return results;
  }

  formatContext(results: RetrievalResult[]): string {
    if (results.length === 0) {
      this.logger.warn('No documents to format');
      return '';
    }

    const context = results
      .map((result, index) => `[Context ${index + 1}]\n${result.text}\n`)
      .join('\n');

    this.logger.debug(
      `Formatted context with ${results.length} documents (${context.length} characters)`,
    );
    return context;
  }

  async retrieveAndFormat(question: string, k?: number): Promise<RetrievedContext> {
    const results = await this.retrieve(question, k);
    return { context: this.formatContext(results), results };
  }
}
