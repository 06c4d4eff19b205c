import { quoteIdentifier } from '@superevents/shared';
import {
  ALERT_COLUMNS,
  DEFAULT_ALERTS_TABLE,
  DEFAULT_EVENTS_VIEW,
  EVENT_VIEW_CONTENT_COLUMNS,
  NATURAL_KEY_COLUMNS,
  RETRACTION_ALERT_TYPE,
  columnType
} from './columns';
import type { AlertDatabase, SqlDialect } from './types';

export interface AlertSchemaOptions {
  tableName?: string;
  viewName?: string;
}

type SchemaNames = {
  table: string;
  view: string;
  uniqueKey: string;
  touchTrigger: string;
};

function resolveNames(options: AlertSchemaOptions): SchemaNames {
  const table = options.tableName ?? DEFAULT_ALERTS_TABLE;
  return {
    table,
    view: options.viewName ?? DEFAULT_EVENTS_VIEW,
    uniqueKey: `${table}_superevent_id_alert_time_alert_type`,
    touchTrigger: `${table}_touch_last_modified`
  };
}

function buildCreateTable(names: SchemaNames, dialect: SqlDialect): string {
  const now = dialect === 'postgres' ? 'NOW()' : 'CURRENT_TIMESTAMP';
  const timestamp = dialect === 'postgres' ? 'TIMESTAMP' : 'TEXT';
  const columns = ALERT_COLUMNS.map(
    (column) =>
      `  ${quoteIdentifier(column.name)} ${columnType(column.kind, dialect)}${column.notNull ? ' NOT NULL' : ' DEFAULT NULL'}`
  );
  columns.push(`  "dateAdded" ${timestamp} NOT NULL DEFAULT ${now}`);
  columns.push(`  "dateLastModified" ${timestamp} NOT NULL DEFAULT ${now}`);
  columns.push(
    `  CONSTRAINT ${quoteIdentifier(names.uniqueKey)} UNIQUE (${NATURAL_KEY_COLUMNS.map(quoteIdentifier).join(', ')})`
  );
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(names.table)} (\n${columns.join(',\n')}\n)`;
}

function buildTouchTrigger(names: SchemaNames, dialect: SqlDialect): string[] {
  const table = quoteIdentifier(names.table);
  const trigger = quoteIdentifier(names.touchTrigger);
  if (dialect === 'sqlite') {
    // recursive_triggers is off, so the inner UPDATE does not fire the trigger again.
    return [
      `CREATE TRIGGER IF NOT EXISTS ${trigger}
       AFTER UPDATE ON ${table} FOR EACH ROW
       BEGIN
         UPDATE ${table} SET "dateLastModified" = CURRENT_TIMESTAMP WHERE rowid = NEW.rowid;
       END`
    ];
  }
  return [
    `CREATE OR REPLACE FUNCTION ${trigger}() RETURNS trigger AS $$
     BEGIN
       NEW."dateLastModified" := NOW();
       RETURN NEW;
     END;
     $$ LANGUAGE plpgsql`,
    `DO $$
     BEGIN
       CREATE TRIGGER ${trigger}
         BEFORE UPDATE ON ${table}
         FOR EACH ROW EXECUTE FUNCTION ${trigger}();
     EXCEPTION
       WHEN duplicate_object THEN NULL;
     END
     $$`
  ];
}

function latestAlertSubquery(table: string, excludeRetractions: boolean): string {
  const filter = excludeRetractions ? `\n        WHERE alert_type <> '${RETRACTION_ALERT_TYPE}'` : '';
  return `SELECT ${table}.*
      FROM ${table}
      INNER JOIN (
        SELECT superevent_id, MAX(alert_time) AS alert_time
        FROM ${table}${filter}
        GROUP BY superevent_id
      ) latest
        ON ${table}.superevent_id = latest.superevent_id
       AND ${table}.alert_time = latest.alert_time`;
}

/**
 * One row per superevent: timing from its latest alert (`a`) and the science content
 * from its latest alert that is not a retraction (`b`). Superevents that only have
 * retractions have no `b` row and drop out of the join.
 */
export function buildEventsViewQuery(tableName: string = DEFAULT_ALERTS_TABLE): string {
  const table = quoteIdentifier(tableName);
  const selected = [
    'a.superevent_id',
    'b.significant',
    'a.alert_type AS latest_alert',
    'a.alert_time',
    'a.alert_delta_sec',
    ...EVENT_VIEW_CONTENT_COLUMNS.map((column) => `b.${column}`)
  ];
  return `SELECT
    ${selected.join(',\n    ')}
  FROM (
      ${latestAlertSubquery(table, false)}
    ) a
  INNER JOIN (
      ${latestAlertSubquery(table, true)}
    ) b
    ON a.superevent_id = b.superevent_id`;
}

function buildViewStatements(names: SchemaNames, dialect: SqlDialect): string[] {
  const view = quoteIdentifier(names.view);
  const query = buildEventsViewQuery(names.table);
  if (dialect === 'sqlite') {
    // No CREATE OR REPLACE VIEW here, and the view must never be absent while another handle reads it.
    return [`CREATE VIEW IF NOT EXISTS ${view} AS\n${query}`];
  }
  return [`CREATE OR REPLACE VIEW ${view} AS\n${query}`];
}

export function buildSchemaStatements(dialect: SqlDialect, options: AlertSchemaOptions = {}): string[] {
  const names = resolveNames(options);
  return [
    buildCreateTable(names, dialect),
    ...buildTouchTrigger(names, dialect),
    ...buildViewStatements(names, dialect)
  ];
}

/**
 * Creates the alerts table when missing and creates the events view (replaced on Postgres).
 * Every statement is idempotent, so concurrent ingestions can all run it.
 */
export async function ensureAlertSchema(db: AlertDatabase, options: AlertSchemaOptions = {}): Promise<void> {
  for (const statement of buildSchemaStatements(db.dialect, options)) {
    await db.execute(statement);
  }
}
