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
 * Offline ingestion: rebuild the index from an extracted text corpus
 *
 * Usage: ingest [corpus.txt]   (defaults to CORPUS_PATH)
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import { stringifyError } from '@backstage/errors';
import { ValidationError } from '../errors';
import { createLogger } from '../logging';
import { ConfigService } from '../services/ConfigService';
import { createRAGService } from '../services/RAGService';

async function main(): Promise<void> {
  const configService = ConfigService.fromEnv(process.env);
  const config = configService.getConfig();
  const logger = createLogger({ level: config.logLevel });

  const corpusPath = process.argv[2] ?? config.corpus.path;
  if (!corpusPath) {
    throw new ValidationError('No corpus file given; pass a path or set CORPUS_PATH');
  }

  logger.info(`Reading corpus from ${corpusPath}`);
  const text = fs.readFileSync(corpusPath, 'utf8');

  const service = await createRAGService(configService, logger);
  try {
    const report = await service.ingest(text, { clean: true });
    logger.info(
      `Stored ${report.storedCount} chunks (dimension ${report.dimension ?? 'n/a'}) in ${report.durationMs}ms`,
    );
  } finally {
    await service.close();
  }
}

main().catch(error => {
  createLogger().error(`Ingestion failed: ${stringifyError(error)}`);
  process.exitCode = 1;
});
