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
 * Keyword heuristic deciding whether a question is in scope
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IScopeGate, ScopeClassification } from '../interfaces';

export interface ScopeGateOptions {
  keywords: string[];
  threshold?: number;
  refusalMessage: string;
}

const WORD_TOKEN = /[\p{L}\p{N}_]+/gu;
const REASON_PREVIEW = 5;

/**
 * Deterministic scope classifier.
 *
 * A keyword counts when it occurs anywhere in the lower-cased question
 * (substring containment, so "programs" also matches "program"). The score
 * is matched keywords per question token; a question is accepted when the
 * score reaches the threshold or at least two keywords match.
 */
export class ScopeGate implements IScopeGate {
  readonly refusalMessage: string;
  readonly threshold: number;

  private readonly logger: Logger;
  private readonly keywordList: string[] = [];

  constructor(logger: Logger, options: ScopeGateOptions) {
    this.logger = logger;
    this.threshold = options.threshold ?? 0.15;
    this.refusalMessage = options.refusalMessage;
    this.addKeywords(options.keywords);

    this.logger.info(
      `Initialized ScopeGate with ${this.keywordList.length} keywords and threshold=${this.threshold}`,
    );
  }

  get keywords(): readonly string[] {
    return this.keywordList;
  }

  /**
   * Extend the keyword list in place (lower-cased, de-duplicated)
   */
  addKeywords(keywords: string[]): void {
    let added = 0;
    for (const keyword of keywords) {
      const normalized = keyword.trim().toLowerCase();
      if (normalized.length > 0 && !this.keywordList.includes(normalized)) {
        this.keywordList.push(normalized);
        added++;
      }
    }
    if (added > 0) {
      this.logger.debug(`Added ${added} keywords. Total: ${this.keywordList.length}`);
    }
  }

  classify(question: string): ScopeClassification {
    if (!question || question.trim().length === 0) {
      this.logger.warn('Empty question provided');
      return { accepted: false, score: 0, reason: 'Empty question', matchedKeywords: [] };
    }

    const lower = question.toLowerCase();
    const tokens = lower.match(WORD_TOKEN) ?? [];

    if (tokens.length === 0) {
      return { accepted: false, score: 0, reason: 'No valid words in question', matchedKeywords: [] };
    }

    const matchedKeywords = this.keywordList.filter(keyword => lower.includes(keyword));
    const score = matchedKeywords.length / tokens.length;
    const accepted = score >= this.threshold || matchedKeywords.length >= 2;

    const reason =
      matchedKeywords.length > 0
        ? `Matched ${matchedKeywords.length} keywords: ${matchedKeywords.slice(0, REASON_PREVIEW).join(', ')}`
        : 'No keyword matches';

    this.logger.info(
      `Question validation: accepted=${accepted}, score=${score.toFixed(3)}, reason=${reason}`,
    );

    return { accepted, score, reason, matchedKeywords };
  }

  /**
   * Classify and pair a rejection with the refusal message
   */
  validate(question: string): { accepted: boolean; refusal: string } {
    const { accepted } = this.classify(question);
    return { accepted, refusal: accepted ? '' : this.refusalMessage };
  }
}
