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
 * HTTP entry point
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import express from 'express';
import { stringifyError } from '@backstage/errors';
import { createLogger } from '../logging';
import { createRouter } from '../router';
import { ConfigService } from '../services/ConfigService';
import { createRAGService } from '../services/RAGService';

async function main(): Promise<void> {
  const configService = ConfigService.fromEnv(process.env);
  const config = configService.getConfig();
  const logger = createLogger({ level: config.logLevel });

  logger.info('Starting campus QA API...');
  const service = await createRAGService(configService, logger);

  // An in-memory index starts empty; build it from the configured corpus
  if (config.corpus.path && (await service.vectorStore.count()) === 0) {
    logger.info(`Index is empty, ingesting corpus from ${config.corpus.path}`);
    const text = fs.readFileSync(config.corpus.path, 'utf8');
    await service.ingest(text, { clean: true });
  }

  const app = express();
  app.use(createRouter({ service, logger }));

  const { host, port } = config.server;
  const server = app.listen(port, host, () => {
    logger.info(`Campus QA API listening on http://${host}:${port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    server.close();
    service.close().then(
      () => process.exit(0),
      error => {
        logger.error(`Shutdown failed: ${stringifyError(error)}`);
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  createLogger().error(`Failed to start campus QA API: ${stringifyError(error)}`);
  process.exitCode = 1;
});
