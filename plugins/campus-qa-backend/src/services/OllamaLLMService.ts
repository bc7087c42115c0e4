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
 * LLM Service implementation for Ollama integration
 * Handles all interactions with the Ollama API
 *
 * @packageDocumentation
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import type { Logger } from 'winston';
import {
  GenerationOptions,
  IConfigService,
  IEmbeddingBackend,
  ITextGenerator,
  ServiceDependencies,
} from '../interfaces';
import { OllamaEmbedResponse, OllamaGenerateResponse } from '../models';
import { ExternalModelError } from '../errors';

export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

export interface OllamaLLMServiceDependencies extends ServiceDependencies {
  fetchImpl?: FetchFunction;
}

/**
 * Service for interacting with Ollama
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class OllamaLLMService implements ITextGenerator, IEmbeddingBackend {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchFunction;

  constructor(dependencies: OllamaLLMServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.baseUrl = this.configService.getConfig().ollamaBaseUrl.replace(/\/+$/, '');
    this.fetchImpl = dependencies.fetchImpl ?? fetch;
  }

  /**
   * Generate a completion for a fully built prompt
   */
  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    const modelName = this.configService.getConfig().generationModel;

    this.logger.info(`Generating completion with model: ${modelName}`);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: modelName,
          prompt,
          stream: false,
          options: {
            num_predict: options.maxTokens,
            temperature: options.temperature,
            top_p: 0.9,
          },
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const json: Partial<OllamaGenerateResponse> = await response.json();

      if (typeof json.response !== 'string') {
        throw new Error('Invalid response format from Ollama');
      }

      const text = json.response.trim();
      this.logger.info(`Generated ${text.length} characters`);
      return text;
    } catch (error) {
      this.logger.error(`Failed to generate completion: ${error}`);
      throw new ExternalModelError('Text generation failed', error);
    }
  }

  /**
   * Generate embeddings using Ollama
   */
  async generateEmbeddings(inputs: string[], model: string): Promise<number[][]> {
    this.logger.debug(`Generating embeddings for ${inputs.length} inputs with model: ${model}`);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          input: inputs,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const json: Partial<OllamaEmbedResponse> = await response.json();

      if (!json.embeddings || !Array.isArray(json.embeddings)) {
        throw new Error('Invalid embeddings response format from Ollama');
      }

      return json.embeddings;
    } catch (error) {
      this.logger.error(`Failed to generate embeddings: ${error}`);
      throw new ExternalModelError('Embedding generation failed', error);
    }
  }

  /**
   * Health check for Ollama service
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (error) {
      this.logger.error(`Ollama health check failed: ${error}`);
      return false;
    }
  }
}
