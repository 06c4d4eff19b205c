import { quoteIdentifier } from '@superevents/shared';
import type { FlatAlertRecord } from '../flatten/types';
import { ALERT_COLUMNS, ALERT_COLUMN_NAMES, DEFAULT_ALERTS_TABLE, NATURAL_KEY_COLUMNS, toColumnName } from './columns';
import type { AlertDatabase, SqlValue } from './types';

export const DEFAULT_BATCH_SIZE = 2500;

export interface UpsertOptions {
  tableName?: string;
  batchSize?: number;
}

export interface UpsertSummary {
  records: number;
  batches: number;
  droppedKeys: string[];
}

type ColumnRow = Map<string, SqlValue>;

function toColumnRow(record: FlatAlertRecord, knownColumns: ReadonlySet<string>, dropped: Set<string>): ColumnRow {
  const row: ColumnRow = new Map();
  for (const [key, value] of Object.entries(record)) {
    const column = toColumnName(key);
    if (!knownColumns.has(column)) {
      dropped.add(key);
      continue;
    }
    row.set(column, value);
  }
  return row;
}

function naturalKey(row: ColumnRow): string | null {
  const parts = NATURAL_KEY_COLUMNS.map((column) => row.get(column) ?? null);
  if (parts.some((part) => part === null)) {
    return null;
  }
  return JSON.stringify(parts);
}

// A multi-row upsert may not touch the same row twice, so the last record per key is kept.
function collapseDuplicateKeys(rows: ColumnRow[]): ColumnRow[] {
  const keyed = new Map<string, ColumnRow>();
  const result: ColumnRow[] = [];
  for (const row of rows) {
    const key = naturalKey(row);
    if (key === null) {
      result.push(row);
      continue;
    }
    keyed.delete(key);
    keyed.set(key, row);
  }
  return [...result, ...keyed.values()];
}

export function buildUpsertStatement(
  db: Pick<AlertDatabase, 'placeholder'>,
  tableName: string,
  columns: readonly string[],
  rowCount: number
): string {
  const conflictColumns: readonly string[] = NATURAL_KEY_COLUMNS;
  const valueGroups: string[] = [];
  let index = 1;
  for (let row = 0; row < rowCount; row += 1) {
    const placeholders = columns.map(() => db.placeholder(index++));
    valueGroups.push(`(${placeholders.join(', ')})`);
  }
  const assignments = columns
    .filter((column) => !conflictColumns.includes(column))
    .map((column) => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`);

  return [
    `INSERT INTO ${quoteIdentifier(tableName)} (${columns.map(quoteIdentifier).join(', ')})`,
    `VALUES ${valueGroups.join(',\n       ')}`,
    `ON CONFLICT (${conflictColumns.map(quoteIdentifier).join(', ')})`,
    `DO UPDATE SET ${assignments.join(', ')}`
  ].join('\n');
}

/**
 * Writes flattened alert records, replacing any stored row with the same
 * (superevent_id, alert_time, alert_type). Every column is written on each insert, so a
 * replaced row keeps nothing from its predecessor except `dateAdded`; the database sets
 * both bookkeeping timestamps. Errors are left to the caller.
 */
export async function upsertAlertRecords(
  db: AlertDatabase,
  records: readonly FlatAlertRecord[],
  options: UpsertOptions = {}
): Promise<UpsertSummary> {
  const tableName = options.tableName ?? DEFAULT_ALERTS_TABLE;
  const columns = ALERT_COLUMNS.map((column) => column.name);
  const dropped = new Set<string>();

  const rows = collapseDuplicateKeys(records.map((record) => toColumnRow(record, ALERT_COLUMN_NAMES, dropped)));
  if (rows.length === 0) {
    return { records: 0, batches: 0, droppedKeys: [...dropped].sort() };
  }

  const maxRowsPerStatement = Math.max(1, Math.floor(db.maxParameters / columns.length));
  const batchSize = Math.max(1, Math.min(options.batchSize ?? DEFAULT_BATCH_SIZE, maxRowsPerStatement));

  let batches = 0;
  await db.transaction(async (tx) => {
    for (let offset = 0; offset < rows.length; offset += batchSize) {
      const batch = rows.slice(offset, offset + batchSize);
      const params = batch.flatMap((row) => columns.map((column) => row.get(column) ?? null));
      await tx.execute(buildUpsertStatement(tx, tableName, columns, batch.length), params);
      batches += 1;
    }
  });

  return { records: rows.length, batches, droppedKeys: [...dropped].sort() };
}
