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
 * Configuration service implementation
 * Manages service configuration with type-safe access
 *
 * @packageDocumentation
 */

import { Config, ConfigReader } from '@backstage/config';
import type { JsonObject, JsonValue } from '@backstage/types';
import { IConfigService } from '../interfaces';
import { CampusQaConfig, ChunkingMode, PostgresConfig, VectorStoreConfig } from '../models';
import { ValidationError } from '../errors';
import defaultKeywords from '../../data/domain-keywords.json';

export const DEFAULT_REFUSAL_MESSAGE = 'I only answer department information.';

const CHUNKING_MODES: readonly ChunkingMode[] = ['words', 'sentences', 'sections'];

type EnvValueType = 'string' | 'number' | 'boolean' | 'list';

/**
 * Environment variable → config key under `campusQa`
 */
const ENV_MAPPINGS: ReadonlyArray<[string, string, EnvValueType]> = [
  ['CHUNK_SIZE', 'chunkSize', 'number'],
  ['CHUNK_OVERLAP', 'chunkOverlap', 'number'],
  ['CHUNKING_MODE', 'chunkingMode', 'string'],
  ['TOP_K_RETRIEVAL', 'defaultTopK', 'number'],
  ['APPLY_METADATA_FILTER', 'applyMetadataFilter', 'boolean'],
  ['EMBEDDING_MODEL', 'embeddingModel', 'string'],
  ['EMBEDDING_DIMENSION', 'embeddingDimension', 'number'],
  ['EMBEDDING_BATCH_SIZE', 'embeddingBatchSize', 'number'],
  ['LLM_MODEL', 'generationModel', 'string'],
  ['OLLAMA_BASE_URL', 'ollamaBaseUrl', 'string'],
  ['MAX_TOKENS', 'generation.maxTokens', 'number'],
  ['TEMPERATURE', 'generation.temperature', 'number'],
  ['SCOPE_THRESHOLD', 'scopeGate.threshold', 'number'],
  ['SCOPE_EXTRA_KEYWORDS', 'scopeGate.extraKeywords', 'list'],
  ['REFUSAL_MESSAGE', 'scopeGate.refusalMessage', 'string'],
  ['DOMAIN_DESCRIPTION', 'domainDescription', 'string'],
  ['CORPUS_PATH', 'corpus.path', 'string'],
  ['CORPUS_SOURCE', 'corpus.source', 'string'],
  ['CORPUS_SMOKE_QUESTION', 'corpus.smokeQuestion', 'string'],
  ['VECTOR_STORE_TYPE', 'vectorStore.type', 'string'],
  ['VECTOR_COLLECTION', 'vectorStore.collection', 'string'],
  ['VECTOR_AUTO_MIGRATE', 'vectorStore.autoMigrate', 'boolean'],
  ['POSTGRES_HOST', 'vectorStore.postgresql.host', 'string'],
  ['POSTGRES_PORT', 'vectorStore.postgresql.port', 'number'],
  ['POSTGRES_DB', 'vectorStore.postgresql.database', 'string'],
  ['POSTGRES_USER', 'vectorStore.postgresql.user', 'string'],
  ['POSTGRES_PASSWORD', 'vectorStore.postgresql.password', 'string'],
  ['POSTGRES_SSL', 'vectorStore.postgresql.ssl', 'boolean'],
  ['API_HOST', 'server.host', 'string'],
  ['API_PORT', 'server.port', 'number'],
  ['LOG_LEVEL', 'logLevel', 'string'],
];

function parseEnvValue(name: string, raw: string, type: EnvValueType): JsonValue {
  switch (type) {
    case 'number': {
      const value = Number(raw);
      if (Number.isNaN(value)) {
        throw new ValidationError(`${name} must be a number, got "${raw}"`);
      }
      return value;
    }
    case 'boolean':
      return ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
    case 'list':
      return raw
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0);
    case 'string':
    default:
      return raw.trim();
  }
}

function setPath(target: JsonObject, path: string[], value: JsonValue): void {
  let node = target;
  for (const segment of path.slice(0, -1)) {
    const next = node[segment];
    if (typeof next === 'object' && next !== null && !Array.isArray(next)) {
      node = next;
    } else {
      const created: JsonObject = {};
      node[segment] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

/**
 * Map process environment variables onto the `campusQa` config tree
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): JsonObject {
  const campusQa: JsonObject = {};
  for (const [name, key, type] of ENV_MAPPINGS) {
    const raw = env[name];
    if (raw === undefined || raw.trim().length === 0) {
      continue;
    }
    setPath(campusQa, key.split('.'), parseEnvValue(name, raw, type));
  }
  return { campusQa };
}

/**
 * Configuration service that wraps Backstage Config
 * Follows Single Responsibility Principle
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: CampusQaConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): ConfigService {
    return new ConfigService(new ConfigReader(readEnvConfig(env), 'env'));
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): CampusQaConfig {
    const config: CampusQaConfig = {
      generationModel: this.config.getOptionalString('campusQa.generationModel') ?? 'tinyllama',
      embeddingModel: this.config.getOptionalString('campusQa.embeddingModel') ?? 'nomic-embed-text',
      embeddingDimension: this.config.getOptionalNumber('campusQa.embeddingDimension'),
      embeddingBatchSize: this.config.getOptionalNumber('campusQa.embeddingBatchSize') ?? 64,
      ollamaBaseUrl: this.config.getOptionalString('campusQa.ollamaBaseUrl') ?? 'http://localhost:11434',
      chunkSize: this.config.getOptionalNumber('campusQa.chunkSize') ?? 250,
      chunkOverlap: this.config.getOptionalNumber('campusQa.chunkOverlap') ?? 50,
      chunkingMode: this.loadChunkingMode(),
      defaultTopK: this.config.getOptionalNumber('campusQa.defaultTopK') ?? 3,
      applyMetadataFilter: this.config.getOptionalBoolean('campusQa.applyMetadataFilter') ?? false,
      generation: {
        maxTokens: this.config.getOptionalNumber('campusQa.generation.maxTokens') ?? 512,
        temperature: this.config.getOptionalNumber('campusQa.generation.temperature') ?? 0.3,
      },
      scopeGate: {
        threshold: this.config.getOptionalNumber('campusQa.scopeGate.threshold') ?? 0.15,
        keywords: [
          ...(this.config.getOptionalStringArray('campusQa.scopeGate.keywords') ?? defaultKeywords),
          ...(this.config.getOptionalStringArray('campusQa.scopeGate.extraKeywords') ?? []),
        ],
        refusalMessage:
          this.config.getOptionalString('campusQa.scopeGate.refusalMessage') ?? DEFAULT_REFUSAL_MESSAGE,
      },
      domainDescription:
        this.config.getOptionalString('campusQa.domainDescription') ??
        'university department information (programs, admissions, faculty and fees)',
      corpus: {
        path: this.config.getOptionalString('campusQa.corpus.path'),
        source: this.config.getOptionalString('campusQa.corpus.source') ?? 'department_document',
        smokeQuestion: this.config.getOptionalString('campusQa.corpus.smokeQuestion'),
      },
      vectorStore: this.loadVectorStoreConfig(),
      server: {
        host: this.config.getOptionalString('campusQa.server.host') ?? '0.0.0.0',
        port: this.config.getOptionalNumber('campusQa.server.port') ?? 8000,
      },
      logLevel: (this.config.getOptionalString('campusQa.logLevel') ?? 'info').toLowerCase(),
    };

    this.validate(config);
    return config;
  }

  private loadChunkingMode(): ChunkingMode {
    const value = this.config.getOptionalString('campusQa.chunkingMode') ?? 'sections';
    const mode = CHUNKING_MODES.find(candidate => candidate === value);
    if (!mode) {
      throw new ValidationError(
        `Unknown chunking mode "${value}", expected one of ${CHUNKING_MODES.join(', ')}`,
      );
    }
    return mode;
  }

  /**
   * Load vector store configuration
   */
  private loadVectorStoreConfig(): VectorStoreConfig {
    const type = this.config.getOptionalString('campusQa.vectorStore.type') ?? 'memory';
    const collection =
      this.config.getOptionalString('campusQa.vectorStore.collection') ?? 'campus_documents';
    const autoMigrate = this.config.getOptionalBoolean('campusQa.vectorStore.autoMigrate') ?? false;

    if (type === 'postgresql') {
      return {
        type: 'postgresql',
        collection,
        autoMigrate,
        postgresql: this.loadPostgresConfig(),
      };
    }
    if (type !== 'memory') {
      throw new ValidationError(`Unknown vector store type "${type}"`);
    }

    return {
      type: 'memory',
      collection,
      autoMigrate,
    };
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): PostgresConfig {
    const prefix = 'campusQa.vectorStore.postgresql';
    const password = this.config.getOptionalString(`${prefix}.password`) ?? '';

    if (!password) {
      throw new ValidationError('PostgreSQL password is required when using postgresql vector store');
    }

    return {
      host: this.config.getOptionalString(`${prefix}.host`) ?? 'localhost',
      port: this.config.getOptionalNumber(`${prefix}.port`) ?? 5432,
      database: this.config.getOptionalString(`${prefix}.database`) ?? 'campus_vectors',
      user: this.config.getOptionalString(`${prefix}.user`) ?? 'campus',
      password,
      ssl: this.config.getOptionalBoolean(`${prefix}.ssl`) ?? false,
      maxConnections: this.config.getOptionalNumber(`${prefix}.maxConnections`) ?? 10,
      idleTimeoutMillis: this.config.getOptionalNumber(`${prefix}.idleTimeoutMillis`) ?? 30000,
      connectionTimeoutMillis: this.config.getOptionalNumber(`${prefix}.connectionTimeoutMillis`) ?? 5000,
    };
  }

  private validate(config: CampusQaConfig): void {
    const errors: string[] = [];

    if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
      errors.push('chunkSize must be a positive integer');
    }
    if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
      errors.push('chunkOverlap must be a non-negative integer');
    } else if (config.chunkOverlap >= config.chunkSize) {
      errors.push('chunkOverlap must be smaller than chunkSize');
    }
    if (!Number.isInteger(config.defaultTopK) || config.defaultTopK < 1) {
      errors.push('defaultTopK must be a positive integer');
    }
    if (!Number.isInteger(config.embeddingBatchSize) || config.embeddingBatchSize < 1) {
      errors.push('embeddingBatchSize must be a positive integer');
    }
    if (config.scopeGate.threshold < 0 || config.scopeGate.threshold > 1) {
      errors.push('scopeGate.threshold must be between 0 and 1');
    }
    if (config.vectorStore.postgresql) {
      const { port } = config.vectorStore.postgresql;
      if (port < 1 || port > 65535) {
        errors.push('PostgreSQL port must be between 1 and 65535');
      }
    }

    if (errors.length > 0) {
      throw new ValidationError(`Invalid configuration: ${errors.join('; ')}`);
    }
  }

  getConfig(): CampusQaConfig {
    return this.cachedConfig;
  }

  /**
   * Get vector store type
   */
  getVectorStoreType(): 'memory' | 'postgresql' {
    return this.cachedConfig.vectorStore.type;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    if (this.cachedConfig.vectorStore.type !== 'postgresql' || !this.cachedConfig.vectorStore.postgresql) {
      throw new ValidationError('PostgreSQL vector store is not configured');
    }
    return this.cachedConfig.vectorStore.postgresql;
  }
}
