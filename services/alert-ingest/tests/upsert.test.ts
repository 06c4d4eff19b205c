import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ensureAlertSchema } from '../src/db/schema';
import { buildUpsertStatement, upsertAlertRecords } from '../src/db/upsert';
import type { FlatAlertRecord } from '../src/flatten/types';
import { openMemoryDatabase } from './helpers';

function alertRecord(overrides: Record<string, string | number | null> = {}): FlatAlertRecord {
  return {
    superevent_id: 'S230511a',
    alert_type: 'PRELIMINARY',
    alert_time: '2023-05-11T10:00:00Z',
    significant: 1,
    far_years: 10,
    distmean: 250.5,
    ...overrides
  };
}

describe('upsertAlertRecords', () => {
  it('replaces the stored row when the natural key repeats', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);

    await upsertAlertRecords(db, [alertRecord()]);
    await upsertAlertRecords(db, [alertRecord({ far_years: 12.5, distmean: null })]);

    const result = await db.query('SELECT superevent_id, far_years, distmean FROM alerts');
    assert.deepEqual(result.rows, [{ superevent_id: 'S230511a', far_years: 12.5, distmean: null }]);
  });

  it('clears columns the replacing record does not carry', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);

    await upsertAlertRecords(db, [alertRecord({ creator: 'BAYESTAR' })]);
    await upsertAlertRecords(db, [alertRecord()]);

    const result = await db.query('SELECT creator FROM alerts');
    assert.deepEqual(result.rows, [{ creator: null }]);
  });

  it('keeps alerts with different types or times as separate rows', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);

    await upsertAlertRecords(db, [
      alertRecord(),
      alertRecord({ alert_type: 'INITIAL' }),
      alertRecord({ alert_time: '2023-05-11T10:05:00Z' })
    ]);

    const result = await db.query('SELECT COUNT(*) AS total FROM alerts');
    assert.deepEqual(result.rows, [{ total: 3 }]);
  });

  it('populates the bookkeeping timestamps', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);
    await upsertAlertRecords(db, [alertRecord()]);

    const result = await db.query('SELECT "dateAdded", "dateLastModified" FROM alerts');
    const [row] = result.rows;
    assert.match(String(row.dateAdded), /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    assert.match(String(row.dateLastModified), /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('maps flattened keys onto column names and reports the rest', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);

    const summary = await upsertAlertRecords(db, [
      alertRecord({ 'date-obs': '2023-05-11T09:59:30.000', 'MJD-OBS': 60075.4163, time: 'x', urls: 'y' })
    ]);

    assert.deepEqual(summary, { records: 1, batches: 1, droppedKeys: ['time', 'urls'] });
    const result = await db.query('SELECT date_obs, mjd_obs FROM alerts');
    assert.deepEqual(result.rows, [{ date_obs: '2023-05-11T09:59:30.000', mjd_obs: 60075.4163 }]);
  });

  it('splits large writes into batches', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);

    const records = ['a', 'b', 'c', 'd', 'e'].map((suffix) => alertRecord({ superevent_id: `S230511${suffix}` }));
    const summary = await upsertAlertRecords(db, records, { batchSize: 2 });

    assert.deepEqual(summary, { records: 5, batches: 3, droppedKeys: [] });
    const result = await db.query('SELECT superevent_id FROM alerts ORDER BY superevent_id');
    assert.deepEqual(
      result.rows.map((row) => row.superevent_id),
      ['S230511a', 'S230511b', 'S230511c', 'S230511d', 'S230511e']
    );
  });

  it('keeps the last record when one call repeats a key', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);

    const summary = await upsertAlertRecords(db, [alertRecord({ far_years: 1 }), alertRecord({ far_years: 2 })]);

    assert.equal(summary.records, 1);
    const result = await db.query('SELECT far_years FROM alerts');
    assert.deepEqual(result.rows, [{ far_years: 2 }]);
  });

  it('does nothing for an empty list', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);
    assert.deepEqual(await upsertAlertRecords(db, []), { records: 0, batches: 0, droppedKeys: [] });
  });

  it('rolls back the whole call when a row is rejected', async (t) => {
    const db = openMemoryDatabase(t);
    await ensureAlertSchema(db);

    await assert.rejects(
      upsertAlertRecords(db, [alertRecord(), alertRecord({ superevent_id: null, alert_type: 'INITIAL' })], {
        batchSize: 1
      }),
      /NOT NULL constraint failed: alerts\.superevent_id/
    );
    const result = await db.query('SELECT COUNT(*) AS total FROM alerts');
    assert.deepEqual(result.rows, [{ total: 0 }]);
  });
});

describe('buildUpsertStatement', () => {
  it('numbers placeholders across rows', () => {
    const statement = buildUpsertStatement(
      { placeholder: (index) => `$${index}` },
      'alerts',
      ['superevent_id', 'alert_time', 'alert_type', 'far_years'],
      2
    );
    assert.equal(
      statement,
      [
        'INSERT INTO "alerts" ("superevent_id", "alert_time", "alert_type", "far_years")',
        'VALUES ($1, $2, $3, $4),',
        '       ($5, $6, $7, $8)',
        'ON CONFLICT ("superevent_id", "alert_time", "alert_type")',
        'DO UPDATE SET "far_years" = EXCLUDED."far_years"'
      ].join('\n')
    );
  });
});
