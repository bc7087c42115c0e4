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
 * Question answering state machine: scope gate, retrieval, prompt,
 * generation and answer assembly
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { stringifyError } from '@backstage/errors';
import { IRetriever, IScopeGate, ITextGenerator } from '../interfaces';
import { Answer, AnswerSource, RetrievalResult } from '../models';
import { AnswerOptions, AnswerOutcome, IAnswerOrchestrator } from './types';

export const NO_CONTEXT_MESSAGE =
  "I couldn't find relevant information in the department documents to answer your question.";
export const ERROR_MESSAGE = 'An error occurred while processing your question. Please try again.';
export const MISSING_INFORMATION_REPLY = 'The provided context does not contain this information.';

export interface AnswerOrchestratorDependencies {
  logger: Logger;
  scopeGate: IScopeGate;
  retriever: IRetriever;
  generator: ITextGenerator;
  domainDescription: string;
  defaults: {
    topK: number;
    maxTokens: number;
    temperature: number;
  };
}

/**
 * Prompt conditioning the generator on the retrieved context only
 */
export function buildPrompt(domainDescription: string, context: string, question: string): string {
  return `You are a precise information assistant for ${domainDescription}.

CONTEXT:
${context}

QUESTION: ${question}

INSTRUCTIONS:
- Answer using ONLY the exact information from the CONTEXT above
- Quote specific details from the context when possible
- If the context doesn't contain the answer, say "${MISSING_INFORMATION_REPLY}"
- Do NOT make up names, numbers, or any other details
- Be concise and accurate

ANSWER:`;
}

/**
 * 1 - distance, clamped to [0, 1]; 0 when no distance is known
 */
export function relevanceScore(distance: number | undefined): number {
  if (distance === undefined || !Number.isFinite(distance)) {
    return 0;
  }
  return Math.min(1, Math.max(0, 1 - distance));
}

function toSource(result: RetrievalResult): AnswerSource {
  const { chunkId, source } = result.metadata;
  return {
    chunkId: typeof chunkId === 'number' ? chunkId : 0,
    source: typeof source === 'string' ? source : 'unknown',
    relevanceScore: relevanceScore(result.distance),
  };
}

export class AnswerOrchestrator implements IAnswerOrchestrator {
  private readonly logger: Logger;
  private readonly scopeGate: IScopeGate;
  private readonly retriever: IRetriever;
  private readonly generator: ITextGenerator;
  private readonly domainDescription: string;
  private readonly defaults: AnswerOrchestratorDependencies['defaults'];

  constructor(dependencies: AnswerOrchestratorDependencies) {
    this.logger = dependencies.logger;
    this.scopeGate = dependencies.scopeGate;
    this.retriever = dependencies.retriever;
    this.generator = dependencies.generator;
    this.domainDescription = dependencies.domainDescription;
    this.defaults = dependencies.defaults;
  }

  async evaluate(question: string, options: AnswerOptions = {}): Promise<AnswerOutcome> {
    const topK = options.topK ?? this.defaults.topK;
    const maxTokens = options.maxTokens ?? this.defaults.maxTokens;
    const temperature = options.temperature ?? this.defaults.temperature;

    this.logger.info(`Processing question: '${question}'`);

    const classification = this.scopeGate.classify(question);
    if (!classification.accepted) {
      this.logger.info(`Question rejected by scope gate (${classification.reason})`);
      return {
        status: 'refused',
        answer: {
          text: this.scopeGate.refusalMessage,
          citations: [],
          sources: [],
          metadata: { guardrailTriggered: true, retrievalCount: 0, question, topK },
        },
      };
    }

    try {
      const results = await this.retriever.retrieve(question, topK);

      if (results.length === 0) {
        this.logger.warn('No relevant context retrieved');
        return {
          status: 'no_context',
          answer: {
            text: NO_CONTEXT_MESSAGE,
            citations: [],
            sources: [],
            metadata: { guardrailTriggered: false, retrievalCount: 0, question, topK },
          },
        };
      }

      const prompt = buildPrompt(
        this.domainDescription,
        this.retriever.formatContext(results),
        question,
      );

      this.logger.info('Generating answer...');
      const text = await this.generator.generate(prompt, { maxTokens, temperature });

      const answer: Answer = {
        text,
        citations: results.map(result => result.text),
        sources: results.map(toSource),
        metadata: {
          guardrailTriggered: false,
          retrievalCount: results.length,
          question,
          topK,
        },
      };

      this.logger.info(`Answer generated successfully with ${answer.citations.length} citations`);
      return { status: 'success', answer };
    } catch (error) {
      this.logger.error(`Error generating answer: ${stringifyError(error)}`);
      const cause = error instanceof Error ? error : new Error(stringifyError(error));
      return {
        status: 'error',
        error: cause,
        answer: {
          text: ERROR_MESSAGE,
          citations: [],
          sources: [],
          metadata: {
            guardrailTriggered: false,
            retrievalCount: 0,
            question,
            topK,
            error: cause.message,
          },
        },
      };
    }
  }

  async answer(question: string, options?: AnswerOptions): Promise<Answer> {
    const outcome = await this.evaluate(question, options);
    return outcome.answer;
  }

  async answerBatch(questions: string[], options?: AnswerOptions): Promise<Answer[]> {
    this.logger.info(`Processing batch of ${questions.length} questions`);

    const answers: Answer[] = [];
    for (const [index, question] of questions.entries()) {
      this.logger.debug(`Processing question ${index + 1}/${questions.length}`);
      answers.push(await this.answer(question, options));
    }

    this.logger.info(`Batch processing complete: ${answers.length} answers generated`);
    return answers;
  }
}
