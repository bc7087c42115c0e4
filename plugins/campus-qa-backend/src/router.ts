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
 * Express router for the campus QA backend
 * Handles HTTP requests and delegates to the RAG service
 *
 * @packageDocumentation
 */

import express, { Request, Response, Router } from 'express';
import type { Logger } from 'winston';
import { stringifyError } from '@backstage/errors';
import { ServiceNotReadyError, ValidationError } from './errors';
import { AnswerOptions } from './rag/types';
import { RAGService } from './services/RAGService';

/**
 * Router environment interface
 */
export interface RouterOptions {
  service: RAGService;
  logger: Logger;
}

export interface ChatRequest {
  message: string;
  options: AnswerOptions;
}

export interface BatchChatRequest {
  questions: string[];
  options: AnswerOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPositiveInteger(body: Record<string, unknown>, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer`);
  }
  return value;
}

function parseAnswerOptions(body: Record<string, unknown>): AnswerOptions {
  const options: AnswerOptions = {};

  const topK = readPositiveInteger(body, 'topK');
  if (topK !== undefined) {
    options.topK = topK;
  }
  const maxTokens = readPositiveInteger(body, 'maxTokens');
  if (maxTokens !== undefined) {
    options.maxTokens = maxTokens;
  }

  const temperature = body.temperature;
  if (temperature !== undefined && temperature !== null) {
    if (typeof temperature !== 'number' || !Number.isFinite(temperature) || temperature < 0) {
      throw new ValidationError('temperature must be a non-negative number');
    }
    options.temperature = temperature;
  }

  return options;
}

/**
 * Validate a `POST /chat` body
 */
export function parseChatRequest(body: unknown): ChatRequest {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const { message } = body;
  if (typeof message !== 'string' || message.trim().length === 0) {
    throw new ValidationError('Message cannot be empty');
  }
  return { message, options: parseAnswerOptions(body) };
}

/**
 * Validate a `POST /chat/batch` body
 */
export function parseBatchChatRequest(body: unknown): BatchChatRequest {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const { questions } = body;
  if (!Array.isArray(questions) || questions.length === 0) {
    throw new ValidationError('questions must be a non-empty array');
  }

  const parsed: string[] = [];
  for (const [index, question] of questions.entries()) {
    if (typeof question !== 'string' || question.trim().length === 0) {
      throw new ValidationError(`questions[${index}] cannot be empty`);
    }
    parsed.push(question);
  }

  return { questions: parsed, options: parseAnswerOptions(body) };
}

function sendError(res: Response, logger: Logger, action: string, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  if (error instanceof ServiceNotReadyError) {
    res.status(503).json({ error: 'Service not initialized' });
    return;
  }
  logger.error(`Failed to ${action}: ${stringifyError(error)}`);
  res.status(500).json({
    error: `Failed to ${action}`,
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Create and configure the campus QA router
 * Follows Dependency Injection and Single Responsibility principles
 */
export function createRouter(options: RouterOptions): Router {
  const { service, logger } = options;

  const router = Router();
  router.use(express.json());

  /**
   * POST /chat
   * Answer a single question
   */
  router.post('/chat', async (req: Request, res: Response) => {
    try {
      const { message, options: answerOptions } = parseChatRequest(req.body);
      logger.info(`Received chat request: "${message.substring(0, 100)}"`);

      const answer = await service.answer(message, answerOptions);
      logger.info(`Responded with ${answer.citations.length} citations`);
      res.json(answer);
    } catch (error) {
      sendError(res, logger, 'process question', error);
    }
  });

  /**
   * POST /chat/batch
   * Answer several questions independently, in order
   */
  router.post('/chat/batch', async (req: Request, res: Response) => {
    try {
      const { questions, options: answerOptions } = parseBatchChatRequest(req.body);
      res.json(await service.answerBatch(questions, answerOptions));
    } catch (error) {
      sendError(res, logger, 'process batch', error);
    }
  });

  /**
   * GET /health
   * Health check endpoint
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      res.json(await service.healthCheck());
    } catch (error) {
      sendError(res, logger, 'check health', error);
    }
  });

  /**
   * GET /stats
   * Collection and model statistics
   */
  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      res.json(await service.getStats());
    } catch (error) {
      sendError(res, logger, 'get stats', error);
    }
  });

  return router;
}
