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
 * Campus QA backend: retrieval-augmented question answering over a
 * department document corpus
 *
 * @packageDocumentation
 */

export * from './errors';
export * from './models';
export * from './interfaces';
export * from './services';
export { Retriever, expandQuery, selectFilter } from './rag/Retriever';
export {
  AnswerOrchestrator,
  buildPrompt,
  relevanceScore,
  ERROR_MESSAGE,
  NO_CONTEXT_MESSAGE,
} from './rag/AnswerOrchestrator';
export type * from './rag/types';
export { createRouter, parseChatRequest, parseBatchChatRequest } from './router';
export { applyMigrations, loadMigrations, defaultMigrationsDirectory } from './database/migrations';
export { createLogger } from './logging';
