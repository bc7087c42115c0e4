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
 * RAG domain types
 *
 * @packageDocumentation
 */

import { Answer, RetrievalResult } from '../models';

/**
 * Per-request overrides for answering a question.
 */
export interface AnswerOptions {
  topK?: number;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Formatted context together with the results it was built from.
 */
export interface RetrievedContext {
  context: string;
  results: RetrievalResult[];
}

/**
 * Terminal state of one question's trip through the pipeline.
 */
export type AnswerStatus = 'refused' | 'no_context' | 'error' | 'success';

/**
 * Explicit outcome returned by the orchestrator; `answer` is always well-formed.
 */
export interface AnswerOutcome {
  status: AnswerStatus;
  answer: Answer;
  error?: Error;
}

/**
 * Contract implemented by the answer orchestrator.
 */
export interface IAnswerOrchestrator {
  /**
   * Run the pipeline and report which branch terminated it.
   */
  evaluate(question: string, options?: AnswerOptions): Promise<AnswerOutcome>;

  /**
   * Produce an answer; never throws for refusal, empty context or pipeline errors.
   */
  answer(question: string, options?: AnswerOptions): Promise<Answer>;

  answerBatch(questions: string[], options?: AnswerOptions): Promise<Answer[]>;
}
