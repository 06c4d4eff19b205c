import type { PipelineContext } from './context';
import { DEFAULT_ALERTS_TABLE, DEFAULT_EVENTS_VIEW } from './db/columns';
import { ensureAlertSchema } from './db/schema';
import { upsertAlertRecords, type UpsertSummary } from './db/upsert';
import { exportSnapshots, type ExportSummary } from './export/exporter';
import { flattenAlert } from './flatten/flattener';
import type { AlertInput, FlatAlertRecord } from './flatten/types';

export interface IngestOptions {
  tableName?: string;
  viewName?: string;
}

export interface IngestResult {
  record: FlatAlertRecord;
  upsert: UpsertSummary;
  exports: ExportSummary;
}

/**
 * Flattens one alert, makes sure the table and view exist, upserts the record and
 * refreshes the export snapshots. Any failure stops the run; re-running the same alert
 * is safe because the write is keyed on the alert's natural key.
 */
export async function ingestAlert(
  context: PipelineContext,
  input: AlertInput,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const { logger, db } = context;
  const tableName = options.tableName ?? DEFAULT_ALERTS_TABLE;
  const viewName = options.viewName ?? DEFAULT_EVENTS_VIEW;

  const record = flattenAlert(input);
  logger.debug(
    { supereventId: record.superevent_id ?? null, alertType: record.alert_type ?? null, fields: Object.keys(record).length },
    'flattened alert metadata'
  );

  await ensureAlertSchema(db, { tableName, viewName });
  logger.debug({ tableName, viewName }, 'alert schema ready');

  const upsert = await upsertAlertRecords(db, [record], { tableName });
  if (upsert.droppedKeys.length > 0) {
    logger.debug({ droppedKeys: upsert.droppedKeys }, 'fields without a column were not stored');
  }
  logger.info(
    { supereventId: record.superevent_id ?? null, alertType: record.alert_type ?? null, alertTime: record.alert_time ?? null },
    'alert stored'
  );

  const exports = await exportSnapshots(context, { tableName, viewName });
  return { record, upsert, exports };
}
