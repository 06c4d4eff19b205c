import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let parsersConfigured = false;

// Timestamps stay as the text Postgres returns so exports show the stored value.
function configureGlobalParsers(): void {
  if (parsersConfigured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  pg.types.setTypeParser(pg.types.builtins.TIMESTAMP, (value: string) => value);
  parsersConfigured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export interface PostgresPoolOptions extends PoolConfig {
  schema?: string;
}

export interface PostgresHelpers {
  withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  closePool(): Promise<void>;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, ...poolConfig } = options;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    console.error('[postgres] unexpected error on idle client', err);
  });

  async function getClient(): Promise<PoolClient> {
    const client = await pool.connect();
    if (!schema) {
      return client;
    }
    try {
      await client.query(`SET search_path TO ${quoteIdentifier(schema)}, public`);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await getClient();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          console.error('[postgres] failed to rollback transaction', rollbackErr);
        }
        throw err;
      }
    });
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  return {
    withConnection,
    withTransaction,
    closePool
  };
}
