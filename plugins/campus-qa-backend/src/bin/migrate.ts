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
 * Apply pending SQL migrations to the configured PostgreSQL database
 *
 * @packageDocumentation
 */

import { Pool } from 'pg';
import { stringifyError } from '@backstage/errors';
import { applyMigrations } from '../database/migrations';
import { createLogger } from '../logging';
import { ConfigService } from '../services/ConfigService';

async function main(): Promise<void> {
  const configService = ConfigService.fromEnv(process.env);
  const logger = createLogger({ level: configService.getConfig().logLevel });
  const pg = configService.getPostgresConfig();

  const pool = new Pool({
    host: pg.host,
    port: pg.port,
    database: pg.database,
    user: pg.user,
    password: pg.password,
    ssl: pg.ssl ? { rejectUnauthorized: false } : false,
  });

  try {
    const applied = await applyMigrations(pool, logger);
    logger.info(
      applied.length > 0 ? `Applied ${applied.join(', ')}` : 'Database schema is up to date',
    );
  } finally {
    await pool.end();
  }
}

main().catch(error => {
  createLogger().error(`Migration failed: ${stringifyError(error)}`);
  process.exitCode = 1;
});
