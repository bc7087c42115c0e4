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
 * In-process stand-ins shared by the unit tests
 *
 * @packageDocumentation
 */

import { ConfigReader } from '@backstage/config';
import type { Logger } from 'winston';
import { GenerationOptions, IConfigService, IEmbeddingBackend, ITextGenerator } from './interfaces';
import { CampusQaConfig } from './models';
import { createLogger } from './logging';
import { ConfigService } from './services/ConfigService';

/**
 * Silent winston logger; spy on its methods to assert log calls
 */
export function createTestLogger(): Logger {
  return createLogger({ level: 'debug', silent: true });
}

/**
 * Defaults as loaded from an empty configuration, with overrides applied
 */
export function createTestConfig(overrides: Partial<CampusQaConfig> = {}): IConfigService {
  const config: CampusQaConfig = {
    ...new ConfigService(new ConfigReader({})).getConfig(),
    ...overrides,
  };
  return { getConfig: () => config };
}

function hashToken(token: string): number {
  // FNV-1a
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words vector: one bucket per hashed lower-case alphanumeric token
 */
export function hashEmbed(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[hashToken(token) % dimension] += 1;
  }
  return vector;
}

/**
 * Deterministic embedding backend; texts sharing words get close vectors
 */
export class HashingEmbeddingBackend implements IEmbeddingBackend {
  readonly requests: string[][] = [];

  constructor(readonly dimension: number = 1024) {}

  async generateEmbeddings(inputs: string[], _model: string): Promise<number[][]> {
    this.requests.push([...inputs]);
    return inputs.map(input => hashEmbed(input, this.dimension));
  }
}

/**
 * Records prompts and replies with a fixed text
 */
export class StubGenerator implements ITextGenerator {
  readonly prompts: string[] = [];
  readonly options: GenerationOptions[] = [];

  constructor(private readonly reply: string = 'Stub answer.') {}

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    return this.reply;
  }
}
