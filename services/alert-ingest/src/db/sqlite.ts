import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { isSqlRow, type AlertDatabase, type QueryResult, type SqlRow, type SqlValue } from './types';

// SQLITE_MAX_VARIABLE_NUMBER for the bundled library.
const SQLITE_MAX_PARAMETERS = 32_766;

type SqliteValue = string | number | null;

function bindValues(params: readonly SqlValue[]): SqliteValue[] {
  return params.map((value) => (typeof value === 'boolean' ? (value ? 1 : 0) : value));
}

function toRows(values: unknown[]): SqlRow[] {
  return values.map((value) => {
    if (!isSqlRow(value)) {
      throw new Error('Unexpected non-object row returned by sqlite');
    }
    return value;
  });
}

export class SqliteAlertDatabase implements AlertDatabase {
  readonly dialect = 'sqlite' as const;
  readonly maxParameters = SQLITE_MAX_PARAMETERS;
  private readonly db: SqliteDatabase;

  constructor(filename: string) {
    this.db = new Database(filename);
  }

  placeholder(): string {
    return '?';
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<void> {
    if (params.length === 0) {
      this.db.exec(sql);
      return;
    }
    this.db.prepare(sql).run(...bindValues(params));
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<QueryResult> {
    const statement = this.db.prepare(sql);
    const columns = statement.columns().map((column) => column.name);
    const rows = toRows(statement.all(...bindValues(params)));
    return { columns, rows };
  }

  async transaction<T>(fn: (db: AlertDatabase) => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await fn(this);
      this.db.exec('COMMIT');
      return result;
    } catch (err) {
      this.db.exec('ROLLBACK');
      throw err;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
