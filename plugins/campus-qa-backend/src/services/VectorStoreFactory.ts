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
 * Factory for creating vector store implementations
 * Implements Factory Pattern for vector store selection
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';

/**
 * Factory class for creating vector store instances
 * Follows Factory Pattern and Open/Closed Principle
 *
 * Usage:
 * ```typescript
 * const vectorStore = await VectorStoreFactory.create(configService, logger);
 * ```
 */
export class VectorStoreFactory {
  /**
   * Create and initialize the configured vector store.
   * There is no silent fallback: a persistent store that cannot be opened is
   * an initialization failure and the error propagates.
   */
  static async create(config: ConfigService, logger: Logger): Promise<IVectorStore> {
    const { type, collection, autoMigrate } = config.getConfig().vectorStore;

    logger.info(`Creating vector store: ${type} (collection: ${collection})`);

    switch (type) {
      case 'postgresql': {
        const store = new PgVectorStore(logger, config.getPostgresConfig(), {
          collection,
          autoMigrate,
        });
        await store.initialize();
        return store;
      }

      case 'memory':
      default: {
        logger.warn('Using in-memory vector store; the index will not survive a restart');
        const store = new InMemoryVectorStore(logger);
        await store.initialize();
        return store;
      }
    }
  }
}
