import Database from 'better-sqlite3';
import type { SQL } from 'drizzle-orm';
import { SQLiteSyncDialect } from 'drizzle-orm/sqlite-core';
import { StorageIOError, ThingsqlError } from './errors.js';
import { shapeRow, toSqlValue } from './rows.js';
import type { ResultRow, SqlValue } from './types/records.js';

export interface DbOptions {
  /** Log every statement (with its parameters) before running it */
  printSql?: boolean;
  /** Sink for printSql output; defaults to console.log */
  log?: (message: string) => void;
}

/**
 * Handle on a database file. Holds no connection: each execute call opens
 * its own read-only connection and closes it before returning, since the
 * host application may rewrite the file between calls.
 */
export interface ThingsDb {
  readonly filepath: string;
  readonly printSql: boolean;
  readonly log: (message: string) => void;
  /** Statements run through this handle, for printSql numbering */
  queryCount: number;
}

export function createDb(filepath: string, options: DbOptions = {}): ThingsDb {
  return {
    filepath,
    printSql: options.printSql ?? false,
    log: options.log ?? ((message: string) => console.log(message)),
    queryCount: 0,
  };
}

const dialect = new SQLiteSyncDialect();

export interface RenderedQuery {
  sql: string;
  params: unknown[];
}

/** Render a drizzle SQL object to text with `?` placeholders and its bound values */
export function renderQuery(query: SQL): RenderedQuery {
  const { sql, params } = dialect.sqlToQuery(query);
  return { sql, params };
}

/** Dedent, trim and drop blank lines so logged SQL reads well */
export function prettifySql(text: string): string {
  const lines = text.split('\n');
  const indents = lines
    .filter(l => l.trim().length > 0)
    .map(l => l.length - l.trimStart().length);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;
  return lines
    .map(l => l.slice(margin).trimEnd())
    .filter(l => l.length > 0)
    .join('\n');
}

function isSqliteError(err: unknown): boolean {
  return err instanceof Error
    && 'code' in err
    && typeof err.code === 'string'
    && err.code.startsWith('SQLITE_');
}

function logQuery(db: ThingsDb, query: RenderedQuery): void {
  db.queryCount++;
  const lines = [`/* Query ${db.queryCount} */`];
  if (query.params.length > 0) {
    lines.push(`/* Parameters: ${JSON.stringify(query.params)} */`);
  }
  lines.push('', prettifySql(query.sql), '');
  db.log(lines.join('\n'));
}

/**
 * Open a read-only connection, run `fn`, close the connection.
 * Open failures and SQLite errors surface as StorageIOError.
 */
export function withConnection<T>(db: ThingsDb, fn: (connection: Database.Database) => T): T {
  let connection: Database.Database;
  try {
    connection = new Database(db.filepath, { readonly: true, fileMustExist: true });
  } catch (err: unknown) {
    throw new StorageIOError(db.filepath, err);
  }

  try {
    return fn(connection);
  } catch (err: unknown) {
    if (isSqliteError(err)) throw new StorageIOError(db.filepath, err);
    throw err;
  } finally {
    connection.close();
  }
}

/** Run a multi-column query; rows come back shaped (see rows.ts) */
export function executeQuery(db: ThingsDb, query: SQL): ResultRow[] {
  const rendered = renderQuery(query);
  if (db.printSql) logQuery(db, rendered);

  return withConnection(db, (connection) => {
    const statement = connection.prepare(rendered.sql);
    const columns = statement.columns().map(c => c.name);
    const rows = statement.raw(true).all(...rendered.params);
    return rows.map((row) => {
      if (!Array.isArray(row)) throw new ThingsqlError('Expected a raw row array');
      return shapeRow(columns, row);
    });
  });
}

/** Run a single-column query; returns the column's values */
export function executeList(db: ThingsDb, query: SQL): SqlValue[] {
  const rendered = renderQuery(query);
  if (db.printSql) logQuery(db, rendered);

  return withConnection(db, (connection) => {
    const statement = connection.prepare(rendered.sql);
    return statement.pluck(true).all(...rendered.params).map(toSqlValue);
  });
}

/** Run a query returning one integer, e.g. a COUNT */
export function executeCount(db: ThingsDb, query: SQL): number {
  const [value] = executeList(db, query);
  if (typeof value !== 'number') {
    throw new ThingsqlError(`Expected a count, got ${String(value)}`);
  }
  return value;
}
