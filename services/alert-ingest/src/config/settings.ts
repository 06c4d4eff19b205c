import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  LOG_LEVELS,
  booleanVar,
  formatConfigIssues,
  loadEnvConfig,
  stringVar,
  type EnvSource,
  type LogLevel
} from '@superevents/shared';
import { SettingsError } from '../errors';
import { hasErrorCode } from '../fsErrors';

export type DatabaseSettings =
  | { dialect: 'sqlite'; path: string }
  | {
      dialect: 'postgres';
      connectionString?: string;
      host?: string;
      port?: number;
      database?: string;
      user?: string;
      password?: string;
      schema?: string;
    };

export interface LvkSettings {
  parseMockEvents: boolean;
  parseRealEvents: boolean;
  downloadDir: string;
}

export interface AlertIngestSettings {
  logLevel: LogLevel;
  database: DatabaseSettings;
  lvk: LvkSettings;
}

const CONTEXT = 'alert-ingest';

export function defaultSettingsPath(): string {
  return path.join(os.homedir(), '.config', 'superevents', 'settings.yaml');
}

const envSchema = z.object({
  ALERT_INGEST_SETTINGS: stringVar({ description: 'settings file path' }),
  ALERT_INGEST_LOG_LEVEL: stringVar({ defaultValue: 'warn', lowercase: true, allowed: LOG_LEVELS }),
  ALERT_INGEST_DATABASE_URL: stringVar(),
  ALERT_INGEST_DOWNLOAD_DIR: stringVar(),
  ALERT_INGEST_PARSE_MOCK_EVENTS: booleanVar(),
  ALERT_INGEST_PARSE_REAL_EVENTS: booleanVar()
});

const scalarText = z.union([z.string(), z.number()]).transform((value) => String(value));

const databaseSectionSchema = z
  .object({
    url: z.string().min(1).optional(),
    sqlite: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.coerce.number().int().positive().optional(),
    db: scalarText.optional(),
    user: scalarText.optional(),
    password: scalarText.optional(),
    schema: z.string().min(1).optional()
  })
  .passthrough();

const settingsFileSchema = z
  .object({
    'database settings': databaseSectionSchema.nullable().optional(),
    lvk: z
      .object({
        parse_mock_events: z.boolean().optional(),
        parse_real_events: z.boolean().optional(),
        download_dir: z.string().min(1).optional()
      })
      .passthrough()
      .nullable()
      .optional()
  })
  .passthrough();

type SettingsFile = z.infer<typeof settingsFileSchema>;
type DatabaseSection = z.infer<typeof databaseSectionSchema>;

export function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

function toLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'warn';
}

/**
 * Accepts `sqlite:<path>`, `file:<path>` and `postgres://` / `postgresql://` URLs.
 */
export function parseDatabaseUrl(url: string, settingsPath: string | null = null): DatabaseSettings {
  const sqliteMatch = /^(?:sqlite|file):(.+)$/i.exec(url);
  if (sqliteMatch) {
    return { dialect: 'sqlite', path: expandHome(sqliteMatch[1]) };
  }
  if (/^postgres(?:ql)?:\/\//i.test(url)) {
    return { dialect: 'postgres', connectionString: url };
  }
  throw new SettingsError(`[${CONTEXT}] Unsupported database url "${url}"`, settingsPath);
}

function resolveDatabase(
  section: DatabaseSection | null | undefined,
  urlOverride: string | undefined,
  settingsPath: string
): DatabaseSettings | null {
  if (urlOverride) {
    return parseDatabaseUrl(urlOverride, settingsPath);
  }
  if (!section) {
    return null;
  }
  if (section.sqlite) {
    return { dialect: 'sqlite', path: expandHome(section.sqlite) };
  }
  if (section.url) {
    return parseDatabaseUrl(section.url, settingsPath);
  }
  if (section.host) {
    return {
      dialect: 'postgres',
      host: section.host,
      port: section.port,
      database: section.db,
      user: section.user,
      password: section.password,
      schema: section.schema
    };
  }
  return null;
}

async function readSettingsFile(settingsPath: string): Promise<SettingsFile> {
  let content: string;
  try {
    content = await readFile(settingsPath, 'utf8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      return {};
    }
    throw err;
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SettingsError(`[${CONTEXT}] Failed to parse ${settingsPath}: ${message}`, settingsPath);
  }

  const result = settingsFileSchema.safeParse(document ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
    throw new SettingsError(formatConfigIssues(CONTEXT, `Invalid settings file ${settingsPath}`, issues), settingsPath);
  }
  return result.data;
}

export type LoadSettingsOptions = {
  env?: EnvSource;
  settingsPath?: string;
};

/**
 * Reads the YAML settings file and applies `ALERT_INGEST_*` overrides. A missing file
 * is allowed as long as the environment supplies the database and download directory.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<AlertIngestSettings> {
  const env = loadEnvConfig(envSchema, { env: options.env, context: CONTEXT });
  const settingsPath = expandHome(options.settingsPath ?? env.ALERT_INGEST_SETTINGS ?? defaultSettingsPath());
  const file = await readSettingsFile(settingsPath);

  const missing: string[] = [];
  const database = resolveDatabase(file['database settings'], env.ALERT_INGEST_DATABASE_URL, settingsPath);
  if (!database) {
    missing.push('database settings: set url, sqlite or host (or ALERT_INGEST_DATABASE_URL)');
  }
  const downloadDir = env.ALERT_INGEST_DOWNLOAD_DIR ?? file.lvk?.download_dir;
  if (!downloadDir) {
    missing.push('lvk.download_dir: Missing required download directory (or ALERT_INGEST_DOWNLOAD_DIR)');
  }
  if (!database || !downloadDir) {
    throw new SettingsError(
      `[${CONTEXT}] Incomplete settings in ${settingsPath}\n${missing.map((entry) => `  - ${entry}`).join('\n')}`,
      settingsPath
    );
  }

  return {
    logLevel: toLogLevel(env.ALERT_INGEST_LOG_LEVEL),
    database,
    lvk: {
      parseMockEvents: env.ALERT_INGEST_PARSE_MOCK_EVENTS ?? file.lvk?.parse_mock_events ?? false,
      parseRealEvents: env.ALERT_INGEST_PARSE_REAL_EVENTS ?? file.lvk?.parse_real_events ?? true,
      downloadDir: path.resolve(expandHome(downloadDir))
    }
  };
}

export function loadLogLevel(env?: EnvSource): LogLevel {
  return toLogLevel(loadEnvConfig(envSchema, { env, context: CONTEXT }).ALERT_INGEST_LOG_LEVEL);
}
