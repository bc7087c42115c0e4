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
 * SQL migration runner for the pgvector schema
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Pool } from 'pg';
import type { Logger } from 'winston';
import { StoreIOError } from '../errors';

export interface Migration {
  name: string;
  sql: string;
}

/**
 * The package's `migrations/` directory, resolved through the workspace
 * package so it is found from both sources and compiled output.
 */
export function defaultMigrationsDirectory(): string {
  return path.join(path.dirname(require.resolve('@campus-qa/backend/package.json')), 'migrations');
}

/**
 * Read `*.sql` files in lexical order
 */
export function loadMigrations(directory: string = defaultMigrationsDirectory()): Migration[] {
  return fs
    .readdirSync(directory)
    .filter(file => file.endsWith('.sql'))
    .sort()
    .map(name => ({
      name,
      sql: fs.readFileSync(path.join(directory, name), 'utf8'),
    }));
}

/**
 * Apply pending migrations, each in its own transaction.
 * Returns the names of the migrations applied by this call.
 */
export async function applyMigrations(
  pool: Pool,
  logger: Logger,
  migrations: Migration[] = loadMigrations(),
): Promise<string[]> {
  const client = await pool.connect();
  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS rag_schema_migrations (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )`,
    );

    const result = await client.query<{ name: string }>('SELECT name FROM rag_schema_migrations');
    const applied = new Set(result.rows.map(row => row.name));
    const newlyApplied: string[] = [];

    for (const migration of migrations) {
      if (applied.has(migration.name)) {
        logger.debug(`Migration ${migration.name} already applied`);
        continue;
      }

      await client.query('BEGIN');
      try {
        await client.query(migration.sql);
        await client.query('INSERT INTO rag_schema_migrations (name) VALUES ($1)', [migration.name]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        logger.error(`Migration ${migration.name} failed`, error);
        throw new StoreIOError(`Migration ${migration.name} failed`, error);
      }

      newlyApplied.push(migration.name);
      logger.info(`Applied migration ${migration.name}`);
    }

    return newlyApplied;
  } finally {
    client.release();
  }
}
