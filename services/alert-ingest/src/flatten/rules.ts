import path from 'node:path';
import { AlertMetadataError } from '../errors';
import { secondsBetween } from './timestamps';
import {
  isMetadataSection,
  type CleaningRule,
  type DerivedSectionRule,
  type FileRule,
  type FlattenRules,
  type MetadataSection,
  type ScalarValue,
  type SectionRule
} from './types';

const SECONDS_PER_DAY = 60 * 60 * 24;

export const HEADER_ALLOW_LIST: ReadonlySet<string> = new Set([
  'creator',
  'date-obs',
  'distmean',
  'diststd',
  'logbci',
  'logbsn',
  'mjd-obs'
]);

export const SECTION_RULES: readonly SectionRule[] = [
  { name: 'alert', path: ['ALERT'] },
  { name: 'event', path: ['ALERT', 'event'] },
  { name: 'classification', path: ['ALERT', 'event', 'classification'], prefix: 'class_' },
  { name: 'properties', path: ['ALERT', 'event', 'properties'], prefix: 'prop_' },
  { name: 'extra', path: ['EXTRA'] },
  { name: 'header', path: ['HEADER'], allow: HEADER_ALLOW_LIST }
];

function splitCentralCoordinate(extra: MetadataSection): Record<string, ScalarValue> {
  const field = 'EXTRA.central coordinate.equatorial';
  const coordinate = extra['central coordinate'];
  if (!isMetadataSection(coordinate)) {
    throw new AlertMetadataError(field, 'central coordinate is missing');
  }
  const equatorial = coordinate.equatorial;
  if (typeof equatorial !== 'string') {
    throw new AlertMetadataError(field, 'expected an "<ra> <dec>" string');
  }
  const tokens = equatorial.trim().split(/\s+/);
  if (tokens.length !== 2 || tokens[0] === '') {
    throw new AlertMetadataError(field, `expected two whitespace-separated values, got "${equatorial}"`);
  }
  return { ra_centre: tokens[0], dec_centre: tokens[1] };
}

export const DERIVED_RULES: readonly DerivedSectionRule[] = [
  { name: 'central-coordinate', path: ['EXTRA'], derive: splitCentralCoordinate }
];

// toFixed resolves an exact half upwards; a tie goes to the even digit instead.
function roundHalfEven(value: number, digits: number): number {
  const rounded = Number(value.toFixed(digits));
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return rounded;
  }
  const exact = value.toFixed(100);
  const cut = exact.indexOf('.') + 1 + digits;
  if (!/^50*$/.test(exact.slice(cut))) {
    return rounded;
  }
  const truncated = exact.slice(0, cut);
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  return lastDigit % 2 === 0 ? Number(truncated) : rounded;
}

/**
 * Mean years between false alarms, to two decimals with ties rounded to even.
 */
export function farToYears(farHz: number): number {
  const years = 1 / (farHz * SECONDS_PER_DAY);
  return roundHalfEven(years, 2);
}

function toFarHz(value: ScalarValue): number {
  const farHz = typeof value === 'string' ? Number(value) : value;
  if (typeof farHz !== 'number' || !Number.isFinite(farHz) || farHz <= 0) {
    throw new AlertMetadataError('far', `expected a positive rate in Hz, got ${JSON.stringify(value)}`);
  }
  return farHz;
}

export const CLEANING_RULES: readonly CleaningRule[] = [
  {
    name: 'false-alarm-rate',
    source: 'far',
    rename: 'far_hz',
    transform: toFarHz,
    derive: (farHz) => ({ far_years: farToYears(toFarHz(farHz)) })
  },
  {
    name: 'alert-time',
    source: 'time_created',
    rename: 'alert_time',
    derive: (alertTime, record) => {
      if (!('time' in record)) {
        return {};
      }
      return { alert_delta_sec: secondsBetween(alertTime, record.time) ?? undefined };
    },
    drop: ['time']
  },
  {
    name: 'significance',
    source: 'significant',
    transform: (value) => (value ? 1 : 0)
  }
];

// Every matching file overwrites the previous one, so the last `.fits` in the list wins.
export const FILE_RULES: readonly FileRule[] = [
  { name: 'skymap', target: 'map', matches: (filePath) => path.extname(filePath) === '.fits' }
];

export const DEFAULT_FLATTEN_RULES: FlattenRules = {
  sections: SECTION_RULES,
  derived: DERIVED_RULES,
  cleaning: CLEANING_RULES,
  files: FILE_RULES
};
