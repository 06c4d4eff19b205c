export type SqlDialect = 'postgres' | 'sqlite';

export type SqlValue = string | number | boolean | null;

export type SqlRow = Record<string, unknown>;

export interface QueryResult {
  columns: string[];
  rows: SqlRow[];
}

/**
 * The storage primitives the pipeline needs: run a statement, run a query and read its
 * rows, and group statements in a transaction. Placeholders are numbered from 1.
 */
export interface AlertDatabase {
  readonly dialect: SqlDialect;
  readonly maxParameters: number;
  placeholder(index: number): string;
  execute(sql: string, params?: readonly SqlValue[]): Promise<void>;
  query(sql: string, params?: readonly SqlValue[]): Promise<QueryResult>;
  transaction<T>(fn: (db: AlertDatabase) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function isSqlRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

