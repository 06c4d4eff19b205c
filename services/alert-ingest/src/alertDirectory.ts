import { readFile, readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { AlertDirectoryError } from './errors';
import type { AlertInput, AlertMetadata } from './flatten/types';

export const METADATA_FILENAME = 'meta.yaml';

const sectionSchema = z.record(z.unknown()).nullable().optional();

const alertMetadataSchema = z
  .object({
    ALERT: sectionSchema,
    EXTRA: sectionSchema,
    HEADER: sectionSchema
  })
  .passthrough();

export interface AlertDirectory extends AlertInput {
  alertDir: string;
}

export function parseAlertMetadata(content: string, source: string): AlertMetadata {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new AlertDirectoryError(source, `failed to parse ${METADATA_FILENAME}: ${message}`);
  }
  const result = alertMetadataSchema.safeParse(document);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new AlertDirectoryError(source, `invalid ${METADATA_FILENAME}: ${details}`);
  }
  return result.data;
}

/**
 * Lists the regular files of an alert directory (hidden files excluded) as absolute
 * paths sorted by name, and parses its `meta.yaml`.
 */
export async function readAlertDirectory(alertDir: string): Promise<AlertDirectory> {
  const resolved = path.resolve(alertDir);
  const entries = (await readdir(resolved)).sort();

  const files: string[] = [];
  let metadataPath: string | null = null;
  for (const entry of entries) {
    const filePath = path.join(resolved, entry);
    if (entry.startsWith('.') || !(await stat(filePath)).isFile()) {
      continue;
    }
    files.push(filePath);
    if (entry === METADATA_FILENAME) {
      metadataPath = filePath;
    }
  }

  if (!metadataPath) {
    throw new AlertDirectoryError(resolved, `no ${METADATA_FILENAME} found`);
  }

  const metadata = parseAlertMetadata(await readFile(metadataPath, 'utf8'), resolved);
  return { alertDir: resolved, files, metadata };
}
