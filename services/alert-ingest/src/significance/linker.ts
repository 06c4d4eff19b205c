import { lstat, mkdir, symlink } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '@superevents/shared';
import { HIGH_SIGNIFICANCE_DIR, LOW_SIGNIFICANCE_DIR } from '../export/partitions';
import { hasErrorCode } from '../fsErrors';
import { isMetadataSection, type AlertMetadata } from '../flatten/types';

export type SignificanceLinkStatus = 'linked' | 'exists' | 'undetermined';

export interface SignificanceLinkResult {
  eventDir: string;
  destination: string | null;
  status: SignificanceLinkStatus;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await lstat(target);
    return true;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      return false;
    }
    throw err;
  }
}

function readSignificance(metadata: AlertMetadata): boolean | null {
  const alert = metadata.ALERT;
  if (!isMetadataSection(alert)) {
    return null;
  }
  const event = alert.event;
  if (!isMetadataSection(event) || Object.keys(event).length === 0 || !('significant' in event)) {
    return null;
  }
  return Boolean(event.significant);
}

/**
 * Alert directories live at `<parent>/<superevent>/<alert>`. This creates
 * `<parent>/_low_significance` and `<parent>/_high_significance` and links the
 * superevent directory into the one matching the alert's significance. An existing
 * entry is left alone.
 */
export async function linkEventBySignificance(
  alertDir: string,
  metadata: AlertMetadata,
  logger: Logger
): Promise<SignificanceLinkResult> {
  const eventDir = path.dirname(path.resolve(alertDir));
  const parentDir = path.dirname(eventDir);
  const lowDir = path.join(parentDir, LOW_SIGNIFICANCE_DIR);
  const highDir = path.join(parentDir, HIGH_SIGNIFICANCE_DIR);

  await mkdir(lowDir, { recursive: true });
  await mkdir(highDir, { recursive: true });

  const significant = readSignificance(metadata);
  if (significant === null) {
    logger.debug({ eventDir }, 'alert carries no significance flag; nothing to link');
    return { eventDir, destination: null, status: 'undetermined' };
  }

  const destination = path.join(significant ? highDir : lowDir, path.basename(eventDir));
  if (await pathExists(destination)) {
    logger.debug({ eventDir, destination }, 'significance link already present');
    return { eventDir, destination, status: 'exists' };
  }

  await symlink(eventDir, destination);
  logger.info({ eventDir, destination }, 'linked event into significance folder');
  return { eventDir, destination, status: 'linked' };
}
