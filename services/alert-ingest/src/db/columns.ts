import type { SqlDialect } from './types';

type ColumnKind =
  | { type: 'varchar'; length: number }
  | { type: 'smallint' }
  | { type: 'integer' }
  | { type: 'double' }
  | { type: 'timestamp' };

export interface AlertColumn {
  name: string;
  kind: ColumnKind;
  notNull?: boolean;
}

const varchar = (length: number): ColumnKind => ({ type: 'varchar', length });
const SMALLINT: ColumnKind = { type: 'smallint' };
const INTEGER: ColumnKind = { type: 'integer' };
const DOUBLE: ColumnKind = { type: 'double' };
const TIMESTAMP: ColumnKind = { type: 'timestamp' };

export const DEFAULT_ALERTS_TABLE = 'alerts';
export const DEFAULT_EVENTS_VIEW = 'events';
export const RETRACTION_ALERT_TYPE = 'RETRACTION';

export const NATURAL_KEY_COLUMNS = ['superevent_id', 'alert_time', 'alert_type'] as const;

export const ALERT_COLUMNS: readonly AlertColumn[] = [
  { name: 'superevent_id', kind: varchar(20), notNull: true },
  { name: 'significant', kind: SMALLINT },
  { name: 'alert_type', kind: varchar(20) },
  { name: 'alert_time', kind: TIMESTAMP },
  { name: 'alert_delta_sec', kind: INTEGER },
  { name: 'date_obs', kind: TIMESTAMP },
  { name: 'mjd_obs', kind: DOUBLE },
  { name: 'far_hz', kind: DOUBLE },
  { name: 'far_years', kind: DOUBLE },
  { name: 'distmean', kind: DOUBLE },
  { name: 'diststd', kind: DOUBLE },
  { name: 'class_bbh', kind: DOUBLE },
  { name: 'class_bns', kind: DOUBLE },
  { name: 'class_nsbh', kind: DOUBLE },
  { name: 'class_terrestrial', kind: DOUBLE },
  { name: 'prop_hasns', kind: DOUBLE },
  { name: 'prop_hasremnant', kind: DOUBLE },
  { name: 'prop_hasmassgap', kind: DOUBLE },
  { name: 'area10', kind: DOUBLE },
  { name: 'area50', kind: DOUBLE },
  { name: 'area90', kind: DOUBLE },
  { name: 'creator', kind: varchar(30) },
  { name: 'ra_centre', kind: DOUBLE },
  { name: 'dec_centre', kind: DOUBLE },
  { name: 'group', kind: varchar(100) },
  { name: 'logbci', kind: DOUBLE },
  { name: 'logbsn', kind: DOUBLE },
  { name: 'pipeline', kind: varchar(100) },
  { name: 'search', kind: varchar(100) },
  { name: 'map', kind: varchar(400) }
];

export const ALERT_COLUMN_NAMES: ReadonlySet<string> = new Set(ALERT_COLUMNS.map((column) => column.name));

// Science columns the events view reads from the latest non-retraction alert.
export const EVENT_VIEW_CONTENT_COLUMNS = [
  'date_obs',
  'mjd_obs',
  'far_hz',
  'far_years',
  'distmean',
  'diststd',
  'class_bbh',
  'class_bns',
  'class_nsbh',
  'class_terrestrial',
  'prop_hasns',
  'prop_hasremnant',
  'prop_hasmassgap',
  'area10',
  'area50',
  'area90'
] as const;

export function columnType(kind: ColumnKind, dialect: SqlDialect): string {
  switch (kind.type) {
    case 'varchar':
      return dialect === 'postgres' ? `VARCHAR(${kind.length})` : 'TEXT';
    case 'smallint':
      return dialect === 'postgres' ? 'SMALLINT' : 'INTEGER';
    case 'integer':
      return 'INTEGER';
    case 'double':
      return dialect === 'postgres' ? 'DOUBLE PRECISION' : 'REAL';
    case 'timestamp':
      return dialect === 'postgres' ? 'TIMESTAMP' : 'TEXT';
  }
}

/**
 * Maps a flattened key to its column name: `DATE-OBS` and `date-obs` both become `date_obs`.
 */
export function toColumnName(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9_]/g, '_');
}
