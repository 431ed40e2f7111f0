import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseDatabaseUrl } from '../database-tool.js';
import { ToolExecutor } from '../executor.js';
import type { DatabaseToolDescriptor } from '../types.js';

const sqlTool: DatabaseToolDescriptor = {
  name: 'sql',
  description: 'SQL',
  kind: 'database',
  parameterSchema: { type: 'object', required: ['query'] },
  config: {},
};

describe('Database Tool', () => {
  let dir: string;
  let executor: ToolExecutor;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'toolflow-db-'));
    executor = new ToolExecutor({
      databaseUrl: `sqlite:${join(dir, 'test.db')}`,
      functionToolsEnabled: false,
      functionTimeoutMs: 1000,
      functionMemoryMb: 32,
    });
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should run statements and return rows or affected counts', async () => {
    const created = await executor.execute(sqlTool, {
      query: 'CREATE TABLE parts (name TEXT NOT NULL, qty INTEGER NOT NULL, active INTEGER NOT NULL)',
    });
    expect(created).toMatchObject({ success: true, result: { affectedRows: 0 } });

    const inserted = await executor.execute(sqlTool, {
      query: 'INSERT INTO parts (name, qty, active) VALUES (?, ?, ?), (?, ?, ?)',
      params: ['valve', 3, true, 'gasket', 10, false],
    });
    expect(inserted).toMatchObject({ success: true, result: { affectedRows: 2 } });

    const selected = await executor.execute(sqlTool, {
      query: 'SELECT name, qty, active FROM parts WHERE qty > ? ORDER BY name',
      params: [1],
    });
    expect(selected).toMatchObject({
      success: true,
      result: {
        rows: [
          { name: 'gasket', qty: 10, active: 0 },
          { name: 'valve', qty: 3, active: 1 },
        ],
        rowCount: 2,
      },
    });
  });

  it('should report malformed SQL as a failure', async () => {
    const response = await executor.execute(sqlTool, { query: 'SELEC nonsense' });

    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.errorMessage).toMatch(/^Database execution failed: /);
    }
  });

  it('should prefer the descriptor database URL over the default', async () => {
    const response = await executor.execute(
      { ...sqlTool, config: { databaseUrl: 'mysql://db.test/app' } },
      { query: 'SELECT 1' },
    );

    expect(response).toMatchObject({ success: false, errorMessage: 'Unsupported database URL scheme: mysql:' });
  });

  it('should reject params that are not an array of scalars', async () => {
    const response = await executor.execute(sqlTool, { query: 'SELECT ?', params: { a: 1 } });

    expect(response).toMatchObject({
      success: false,
      errorMessage: 'params must be an array of strings, numbers, booleans or null',
    });
  });

  it('should check required parameters before touching the database', async () => {
    const response = await executor.execute(sqlTool, {});

    expect(response).toMatchObject({ success: false, errorMessage: 'Invalid parameters provided: missing query' });
  });
});

describe('parseDatabaseUrl', () => {
  it('should map URLs onto drivers', () => {
    expect(parseDatabaseUrl('sqlite::memory:')).toEqual({ driver: 'sqlite', filename: ':memory:' });
    expect(parseDatabaseUrl('sqlite:///var/data/app.db')).toEqual({ driver: 'sqlite', filename: '/var/data/app.db' });
    expect(parseDatabaseUrl('file:./dev.db')).toEqual({ driver: 'sqlite', filename: './dev.db' });
    expect(parseDatabaseUrl('postgresql://app@db.test/app')).toEqual({
      driver: 'postgres',
      connectionString: 'postgresql://app@db.test/app',
    });
  });
});
