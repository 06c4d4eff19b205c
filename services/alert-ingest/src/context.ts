import type { Logger } from '@superevents/shared';
import type { AlertIngestSettings } from './config/settings';
import type { AlertDatabase } from './db/types';

/**
 * Everything one ingestion run needs, built once by the caller and passed down explicitly.
 */
export interface PipelineContext {
  logger: Logger;
  settings: AlertIngestSettings;
  db: AlertDatabase;
  clock: () => Date;
}

export type PipelineContextInput = Omit<PipelineContext, 'clock'> & {
  clock?: () => Date;
};

export function createPipelineContext(input: PipelineContextInput): PipelineContext {
  return {
    logger: input.logger,
    settings: input.settings,
    db: input.db,
    clock: input.clock ?? (() => new Date())
  };
}
