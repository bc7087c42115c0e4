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
 * Tests for the SQL migration runner
 */

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Pool } from 'pg';
import { applyMigrations, defaultMigrationsDirectory, loadMigrations } from './migrations';
import { StoreIOError } from '../errors';
import { createTestLogger } from '../testUtils';

const PACKAGE_MIGRATIONS = path.resolve(__dirname, '..', '..', 'migrations');

describe('loadMigrations', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'campus-qa-migrations-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should read only .sql files in lexical order', () => {
    fs.writeFileSync(path.join(tmpDir, '002_add_index.sql'), 'CREATE INDEX b;');
    fs.writeFileSync(path.join(tmpDir, '001_create.sql'), 'CREATE TABLE a;');
    fs.writeFileSync(path.join(tmpDir, 'README.md'), '# notes');

    expect(loadMigrations(tmpDir)).toEqual([
      { name: '001_create.sql', sql: 'CREATE TABLE a;' },
      { name: '002_add_index.sql', sql: 'CREATE INDEX b;' },
    ]);
  });

  it('should ship the initial schema with the package', () => {
    const [initial] = loadMigrations(PACKAGE_MIGRATIONS);

    expect(initial.name).toBe('001_initial_schema.sql');
    expect(initial.sql).toContain('CREATE TABLE IF NOT EXISTS rag_collections');
    expect(initial.sql).toContain('CREATE TABLE IF NOT EXISTS rag_chunks');
  });

  it('should resolve the default directory to the package migrations', () => {
    expect(defaultMigrationsDirectory()).toBe(PACKAGE_MIGRATIONS);
  });
});

describe('applyMigrations', () => {
  const migrations = [
    { name: '001_create.sql', sql: 'CREATE TABLE a;' },
    { name: '002_add_index.sql', sql: 'CREATE INDEX b;' },
  ];

  const client = {
    query: jest.fn<(text: string, values?: unknown[]) => Promise<{ rows: unknown[] }>>(),
    release: jest.fn(),
  };
  const pool = { connect: jest.fn(async () => client) } as unknown as Pool;

  const executed = (): string[] => client.query.mock.calls.map(([text]) => text);

  beforeEach(() => {
    jest.clearAllMocks();
    client.query.mockReset();
    client.query.mockImplementation(async () => ({ rows: [] }));
  });

  it('should apply only pending migrations, each in a transaction', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [] }) // bookkeeping table
      .mockResolvedValueOnce({ rows: [{ name: '001_create.sql' }] });

    const applied = await applyMigrations(pool, createTestLogger(), migrations);

    expect(applied).toEqual(['002_add_index.sql']);
    expect(executed().slice(2)).toEqual([
      'BEGIN',
      'CREATE INDEX b;',
      'INSERT INTO rag_schema_migrations (name) VALUES ($1)',
      'COMMIT',
    ]);
    expect(client.query).toHaveBeenCalledWith(
      'INSERT INTO rag_schema_migrations (name) VALUES ($1)',
      ['002_add_index.sql'],
    );
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('should do nothing when every migration is applied', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ name: '001_create.sql' }, { name: '002_add_index.sql' }] });

    await expect(applyMigrations(pool, createTestLogger(), migrations)).resolves.toEqual([]);
    expect(executed()).toHaveLength(2);
  });

  it('should roll back and stop at a failing migration', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [] }) // BEGIN
      .mockRejectedValueOnce(new Error('syntax error'));

    const result = applyMigrations(pool, createTestLogger(), migrations);

    await expect(result).rejects.toThrow(StoreIOError);
    await expect(result).rejects.toThrow('Migration 001_create.sql failed');
    expect(executed()).toContain('ROLLBACK');
    expect(executed()).not.toContain('CREATE INDEX b;');
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
