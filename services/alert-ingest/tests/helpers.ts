import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { TestContext } from 'node:test';
import { createLogger } from '@superevents/shared';
import type { AlertIngestSettings } from '../src/config/settings';
import { createPipelineContext, type PipelineContext } from '../src/context';
import { SqliteAlertDatabase } from '../src/db/sqlite';
import type { AlertDatabase } from '../src/db/types';
import type { AlertMetadata } from '../src/flatten/types';

export const silentLogger = createLogger('silent');

// Built with the local-time constructor so the export header does not depend on TZ.
export const FIXED_NOW = new Date(2023, 4, 11, 12, 0, 0);

export async function makeTempDir(t: TestContext, prefix: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  t.after(async () => rm(dir, { recursive: true, force: true }));
  return dir;
}

export function openMemoryDatabase(t: TestContext): SqliteAlertDatabase {
  const db = new SqliteAlertDatabase(':memory:');
  t.after(async () => db.close());
  return db;
}

export function makeSettings(downloadDir: string, lvk: Partial<AlertIngestSettings['lvk']> = {}): AlertIngestSettings {
  return {
    logLevel: 'silent',
    database: { dialect: 'sqlite', path: ':memory:' },
    lvk: {
      parseMockEvents: false,
      parseRealEvents: true,
      downloadDir,
      ...lvk
    }
  };
}

export function makeContext(db: AlertDatabase, settings: AlertIngestSettings): PipelineContext {
  return createPipelineContext({ logger: silentLogger, settings, db, clock: () => FIXED_NOW });
}

export function sampleMetadata(): AlertMetadata {
  return {
    ALERT: {
      alert_type: 'PRELIMINARY',
      time_created: '2023-05-11T10:00:00Z',
      superevent_id: 'S230511a',
      urls: { gracedb: 'https://gracedb.example/superevents/S230511a' },
      event: {
        time: '2023-05-11T09:59:30.000000Z',
        far: 0.0000011574,
        significant: true,
        instruments: ['H1', 'L1'],
        group: 'CBC',
        pipeline: 'gstlal',
        search: 'AllSky',
        classification: { BNS: 0.9, BBH: 0.05, NSBH: 0.04, Terrestrial: 0.01 },
        properties: { HasNS: 1, HasRemnant: 0.8, HasMassGap: 0 }
      }
    },
    EXTRA: {
      area10: 12.5,
      area50: 100.25,
      area90: 450,
      'central coordinate': { equatorial: '150.1234 -20.5678', galactic: '250.1 30.2' }
    },
    HEADER: {
      CREATOR: 'BAYESTAR',
      'DATE-OBS': '2023-05-11T09:59:30.000',
      DISTMEAN: 250.5,
      DISTSTD: 60.1,
      'MJD-OBS': 60075.4163,
      LOGBCI: 1.2,
      LOGBSN: 3.4,
      ORDERING: 'NUNIQ'
    }
  };
}

export const SAMPLE_FILES = [
  '/alerts/S230511a/S230511a-1-Preliminary/a.fits',
  '/alerts/S230511a/S230511a-1-Preliminary/b.json',
  '/alerts/S230511a/S230511a-1-Preliminary/c.fits'
];
