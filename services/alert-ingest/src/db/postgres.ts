import type { PoolClient } from 'pg';
import { createPostgresPool, type PostgresHelpers, type PostgresPoolOptions } from '@superevents/shared';
import type { AlertDatabase, QueryResult, SqlValue } from './types';

// Bind parameters are addressed with a 16-bit count in the wire protocol.
const POSTGRES_MAX_PARAMETERS = 65_535;

export class PostgresAlertDatabase implements AlertDatabase {
  readonly dialect = 'postgres' as const;
  readonly maxParameters = POSTGRES_MAX_PARAMETERS;

  constructor(
    private readonly helpers: PostgresHelpers,
    private readonly client: PoolClient | null = null
  ) {}

  static connect(options: PostgresPoolOptions): PostgresAlertDatabase {
    return new PostgresAlertDatabase(createPostgresPool(options));
  }

  placeholder(index: number): string {
    return `$${index}`;
  }

  private run<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    if (this.client) {
      return fn(this.client);
    }
    return this.helpers.withConnection(fn);
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<void> {
    await this.run(async (client) => {
      await client.query(sql, [...params]);
    });
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<QueryResult> {
    return this.run(async (client) => {
      const result = await client.query(sql, [...params]);
      return {
        columns: result.fields.map((field) => field.name),
        rows: result.rows
      };
    });
  }

  async transaction<T>(fn: (db: AlertDatabase) => Promise<T>): Promise<T> {
    if (this.client) {
      return fn(this);
    }
    return this.helpers.withTransaction((client) => fn(new PostgresAlertDatabase(this.helpers, client)));
  }

  async close(): Promise<void> {
    if (this.client) {
      return;
    }
    await this.helpers.closePool();
  }
}
