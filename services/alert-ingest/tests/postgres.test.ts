import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { PoolClient } from 'pg';
import type { PostgresHelpers } from '@superevents/shared';
import { PostgresAlertDatabase } from '../src/db/postgres';
import { ensureAlertSchema } from '../src/db/schema';
import { upsertAlertRecords } from '../src/db/upsert';

type RecordedQuery = { text: string; values: unknown[] | undefined };

function createStubHelpers() {
  const queries: RecordedQuery[] = [];
  const state = { connections: 0, transactions: 0, closed: false };
  const client = {
    async query(text: string, values?: unknown[]) {
      queries.push({ text, values });
      return { fields: [{ name: 'superevent_id' }], rows: [{ superevent_id: 'S230511a' }] };
    }
  } as unknown as PoolClient;

  const helpers: PostgresHelpers = {
    async withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
      state.connections += 1;
      return fn(client);
    },
    async withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
      state.transactions += 1;
      return fn(client);
    },
    async closePool(): Promise<void> {
      state.closed = true;
    }
  };
  return { helpers, queries, state };
}

describe('PostgresAlertDatabase', () => {
  it('numbers placeholders from one', () => {
    const { helpers } = createStubHelpers();
    const db = new PostgresAlertDatabase(helpers);
    assert.equal(db.placeholder(1), '$1');
    assert.equal(db.placeholder(42), '$42');
  });

  it('returns column names alongside rows', async () => {
    const { helpers, queries } = createStubHelpers();
    const db = new PostgresAlertDatabase(helpers);

    const result = await db.query('SELECT superevent_id FROM "events" WHERE superevent_id LIKE $1', ['S%']);

    assert.deepEqual(result, { columns: ['superevent_id'], rows: [{ superevent_id: 'S230511a' }] });
    assert.deepEqual(queries, [
      { text: 'SELECT superevent_id FROM "events" WHERE superevent_id LIKE $1', values: ['S%'] }
    ]);
  });

  it('creates the schema one statement at a time', async () => {
    const { helpers, queries, state } = createStubHelpers();
    const db = new PostgresAlertDatabase(helpers);

    await ensureAlertSchema(db);

    assert.equal(queries.length, 4);
    assert.equal(state.connections, 4);
    assert.match(queries[0].text, /^CREATE TABLE IF NOT EXISTS "alerts"/);
    assert.match(queries[3].text, /^CREATE OR REPLACE VIEW "events" AS/);
  });

  it('writes upserts inside a single transaction', async () => {
    const { helpers, queries, state } = createStubHelpers();
    const db = new PostgresAlertDatabase(helpers);

    const summary = await upsertAlertRecords(db, [
      { superevent_id: 'S230511a', alert_type: 'PRELIMINARY', alert_time: '2023-05-11T10:00:00Z', far_years: 10 },
      { superevent_id: 'S230511a', alert_type: 'INITIAL', alert_time: '2023-05-11T11:00:00Z', far_years: 12 }
    ]);

    assert.deepEqual(summary, { records: 2, batches: 1, droppedKeys: [] });
    assert.equal(state.transactions, 1);
    assert.equal(state.connections, 0);
    assert.equal(queries.length, 1);
    assert.match(queries[0].text, /^INSERT INTO "alerts" \("superevent_id", "significant", "alert_type"/);
    assert.ok(queries[0].text.includes('($31, $32, $33'));
    assert.equal(queries[0].values?.length, 60);
    assert.deepEqual(queries[0].values?.slice(0, 4), ['S230511a', null, 'PRELIMINARY', '2023-05-11T10:00:00Z']);
  });

  it('closes the pool but not a transaction-scoped handle', async () => {
    const { helpers, state } = createStubHelpers();
    const db = new PostgresAlertDatabase(helpers);

    await db.transaction(async (tx) => tx.close());
    assert.equal(state.closed, false);

    await db.close();
    assert.equal(state.closed, true);
  });
});
