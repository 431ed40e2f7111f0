// Database Tool
// Executes one parameterized SQL statement per call. The connection is opened for the call
// and closed before returning; nothing is pooled.

import Database from 'better-sqlite3';
import pg from 'pg';
import { z } from 'zod';
import type { DatabaseToolDescriptor, ToolHandler } from './types.js';

const ParamsSchema = z.array(z.union([z.string(), z.number(), z.boolean(), z.null()]));

type SqlParam = z.infer<typeof ParamsSchema>[number];

export type StatementResult =
  | { rows: Record<string, unknown>[]; rowCount: number }
  | { affectedRows: number };

export type DatabaseTarget =
  | { driver: 'sqlite'; filename: string }
  | { driver: 'postgres'; connectionString: string };

/**
 * Maps a connection URL onto a driver.
 * `sqlite::memory:`, `sqlite:///abs/path.db`, `sqlite:relative.db` and `file:./dev.db` open SQLite;
 * `postgres://` and `postgresql://` open PostgreSQL.
 */
export function parseDatabaseUrl(databaseUrl: string): DatabaseTarget {
  const url = databaseUrl.trim();
  const scheme = url.slice(0, url.indexOf(':') + 1).toLowerCase();

  if (scheme === 'postgres:' || scheme === 'postgresql:') {
    return { driver: 'postgres', connectionString: url };
  }

  if (scheme === 'sqlite:' || scheme === 'file:') {
    let filename = url.slice(scheme.length);
    if (filename.startsWith('//')) filename = filename.slice(2);
    if (!filename) {
      throw new Error(`Database URL has no file path: ${databaseUrl}`);
    }
    return { driver: 'sqlite', filename };
  }

  throw new Error(`Unsupported database URL scheme: ${scheme || databaseUrl}`);
}

function runSqlite(filename: string, query: string, params: SqlParam[]): StatementResult {
  const db = new Database(filename);
  try {
    const statement = db.prepare(query);
    const bound = params.map(p => (typeof p === 'boolean' ? (p ? 1 : 0) : p));
    if (statement.reader) {
      const rows = statement.all(...bound).filter(isRow);
      return { rows, rowCount: rows.length };
    }
    const info = statement.run(...bound);
    return { affectedRows: info.changes };
  } finally {
    db.close();
  }
}

async function runPostgres(connectionString: string, query: string, params: SqlParam[]): Promise<StatementResult> {
  const client = new pg.Client({ connectionString, connectionTimeoutMillis: 10000 });
  await client.connect();
  try {
    const result = await client.query(query, params);
    if (result.fields.length > 0) {
      return { rows: result.rows, rowCount: result.rows.length };
    }
    return { affectedRows: result.rowCount ?? 0 };
  } finally {
    await client.end();
  }
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function createDatabaseHandler(defaultDatabaseUrl: string): ToolHandler<DatabaseToolDescriptor> {
  return async (descriptor, parameters) => {
    const query = typeof parameters.query === 'string' ? parameters.query.trim() : '';
    if (!query) {
      throw new Error('SQL query not provided');
    }

    const paramsResult = ParamsSchema.safeParse(parameters.params ?? []);
    if (!paramsResult.success) {
      throw new Error('params must be an array of strings, numbers, booleans or null');
    }

    const databaseUrl =
      (typeof parameters.databaseUrl === 'string' && parameters.databaseUrl) ||
      descriptor.config.databaseUrl ||
      defaultDatabaseUrl;
    if (!databaseUrl) {
      throw new Error('Database URL not provided');
    }

    const target = parseDatabaseUrl(databaseUrl);
    try {
      if (target.driver === 'sqlite') {
        return runSqlite(target.filename, query, paramsResult.data);
      }
      return await runPostgres(target.connectionString, query, paramsResult.data);
    } catch (error) {
      throw new Error(`Database execution failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  };
}
