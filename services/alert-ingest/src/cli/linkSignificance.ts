import { Command } from 'commander';
import { createLogger, type LogLevel, type Logger } from '@superevents/shared';
import { readAlertDirectory } from '../alertDirectory';
import { loadLogLevel } from '../config/settings';
import { linkEventBySignificance } from '../significance/linker';
import { CLI_VERSION } from './version';

export type LinkSignificanceDependencies = {
  logLevel?: () => LogLevel;
  createLogger?: (level: LogLevel) => Logger;
};

export function createLinkSignificanceProgram(deps: LinkSignificanceDependencies = {}): Command {
  const resolveLogLevel = deps.logLevel ?? (() => loadLogLevel());
  const makeLogger = deps.createLogger ?? ((level: LogLevel) => createLogger(level, 'link-significance'));

  const program = new Command();
  program
    .name('link-significance')
    .description('Create the low/high significance folders and link the alert\'s event directory into one of them')
    .version(CLI_VERSION, '-v, --version', 'show version')
    .argument('<alertDir>', 'path to an alert directory')
    .action(async (alertDir: string) => {
      const logger = makeLogger(resolveLogLevel());
      const alert = await readAlertDirectory(alertDir);
      await linkEventBySignificance(alert.alertDir, alert.metadata, logger);
    });

  return program;
}
