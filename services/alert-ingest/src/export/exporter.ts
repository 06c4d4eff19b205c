import { stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { quoteIdentifier } from '@superevents/shared';
import type { PipelineContext } from '../context';
import { DEFAULT_ALERTS_TABLE, DEFAULT_EVENTS_VIEW } from '../db/columns';
import type { AlertDatabase, QueryResult, SqlValue } from '../db/types';
import { hasErrorCode } from '../fsErrors';
import {
  EVENT_KINDS,
  SIGNIFICANCE_PARTITIONS,
  type EventKind,
  type EventKindConfig,
  type SignificancePartition,
  type SignificancePartitionConfig
} from './partitions';
import { exportHeader, renderCsv, renderTable } from './render';

export interface ExportOptions {
  tableName?: string;
  viewName?: string;
}

export type PartitionExport =
  | {
      kind: EventKind;
      partition: SignificancePartition;
      directory: string;
      status: 'written';
      files: string[];
      alertRows: number;
      eventRows: number;
    }
  | {
      kind: EventKind;
      partition: SignificancePartition;
      directory: string;
      status: 'skipped';
    };

export interface ExportSummary {
  exportedAt: string;
  partitions: PartitionExport[];
}

type ExportContext = Pick<PipelineContext, 'db' | 'settings' | 'logger' | 'clock'>;

async function directoryExists(directory: string): Promise<boolean> {
  try {
    return (await stat(directory)).isDirectory();
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}

export function partitionDirectory(
  downloadDir: string,
  kind: EventKindConfig,
  partition: SignificancePartitionConfig
): string {
  const base = path.join(downloadDir, kind.directory);
  return partition.subdirectory ? path.join(base, partition.subdirectory) : base;
}

function buildFilter(
  db: AlertDatabase,
  kind: EventKindConfig,
  partition: SignificancePartitionConfig
): { where: string; params: SqlValue[] } {
  const params: SqlValue[] = [`${kind.idPrefix}%`];
  let where = `superevent_id LIKE ${db.placeholder(1)}`;
  if (partition.significant !== null) {
    params.push(partition.significant);
    where += ` AND significant = ${db.placeholder(2)}`;
  }
  return { where, params };
}

async function writeSnapshot(directory: string, name: string, header: string, result: QueryResult): Promise<string[]> {
  const csvPath = path.join(directory, `${name}.csv`);
  const textPath = path.join(directory, `${name}.txt`);
  await writeFile(csvPath, header + renderCsv(result), 'utf8');
  await writeFile(textPath, header + renderTable(result), 'utf8');
  return [csvPath, textPath];
}

/**
 * Rewrites `events.csv`/`events.txt` and `alerts.csv`/`alerts.txt` in every existing
 * partition directory of each enabled event kind. Missing directories are skipped and
 * never created.
 */
export async function exportSnapshots(context: ExportContext, options: ExportOptions = {}): Promise<ExportSummary> {
  const { db, settings, logger } = context;
  const table = quoteIdentifier(options.tableName ?? DEFAULT_ALERTS_TABLE);
  const view = quoteIdentifier(options.viewName ?? DEFAULT_EVENTS_VIEW);
  const exportedAt = context.clock();
  const header = exportHeader(exportedAt);
  const partitions: PartitionExport[] = [];

  logger.debug({ downloadDir: settings.lvk.downloadDir }, 'starting snapshot export');

  for (const kind of EVENT_KINDS) {
    if (!settings.lvk[kind.setting]) {
      continue;
    }
    for (const partition of SIGNIFICANCE_PARTITIONS) {
      const directory = partitionDirectory(settings.lvk.downloadDir, kind, partition);
      if (!(await directoryExists(directory))) {
        logger.debug({ directory, kind: kind.kind, partition: partition.partition }, 'export directory missing; skipping');
        partitions.push({ kind: kind.kind, partition: partition.partition, directory, status: 'skipped' });
        continue;
      }

      const { where, params } = buildFilter(db, kind, partition);
      const events = await db.query(`SELECT * FROM ${view} WHERE ${where}`, params);
      const eventFiles = await writeSnapshot(directory, 'events', header, events);

      const alerts = await db.query(`SELECT * FROM ${table} WHERE ${where} ORDER BY alert_time DESC`, params);
      const alertFiles = await writeSnapshot(directory, 'alerts', header, alerts);

      logger.debug(
        { directory, kind: kind.kind, partition: partition.partition, events: events.rows.length, alerts: alerts.rows.length },
        'exported partition snapshot'
      );
      partitions.push({
        kind: kind.kind,
        partition: partition.partition,
        directory,
        status: 'written',
        files: [...eventFiles, ...alertFiles],
        alertRows: alerts.rows.length,
        eventRows: events.rows.length
      });
    }
  }

  logger.debug('completed snapshot export');
  return { exportedAt: exportedAt.toISOString(), partitions };
}
