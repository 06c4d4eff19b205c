import { Command } from 'commander';
import { createLogger, type LogLevel, type Logger } from '@superevents/shared';
import { readAlertDirectory } from '../alertDirectory';
import { loadSettings, type AlertIngestSettings, type DatabaseSettings } from '../config/settings';
import { createPipelineContext } from '../context';
import { openAlertDatabase } from '../db/connect';
import type { AlertDatabase } from '../db/types';
import { ingestAlert } from '../pipeline';
import { CLI_VERSION } from './version';

export type AlertsToDbDependencies = {
  loadSettings?: () => Promise<AlertIngestSettings>;
  openDatabase?: (settings: DatabaseSettings) => AlertDatabase;
  createLogger?: (level: LogLevel) => Logger;
  clock?: () => Date;
};

export function createAlertsToDbProgram(deps: AlertsToDbDependencies = {}): Command {
  const resolveSettings = deps.loadSettings ?? (() => loadSettings());
  const openDatabase = deps.openDatabase ?? openAlertDatabase;
  const makeLogger = deps.createLogger ?? ((level: LogLevel) => createLogger(level, 'alerts-to-db'));

  const program = new Command();
  program
    .name('alerts-to-db')
    .description('Store an alert in the alerts table, refresh the events view and re-export the CSV snapshots')
    .version(CLI_VERSION, '-v, --version', 'show version')
    .argument('<alertDir>', 'path to an alert directory')
    .action(async (alertDir: string) => {
      const settings = await resolveSettings();
      const logger = makeLogger(settings.logLevel);
      logger.debug({ alertDir }, 'starting alerts-to-db');

      const alert = await readAlertDirectory(alertDir);
      const db = openDatabase(settings.database);
      try {
        const context = createPipelineContext({ logger, settings, db, clock: deps.clock });
        await ingestAlert(context, alert);
      } finally {
        await db.close();
      }
      logger.debug({ alertDir }, 'completed alerts-to-db');
    });

  return program;
}
