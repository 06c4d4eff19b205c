import type { DatabaseSettings } from '../config/settings';
import { PostgresAlertDatabase } from './postgres';
import { SqliteAlertDatabase } from './sqlite';
import type { AlertDatabase } from './types';

export function openAlertDatabase(settings: DatabaseSettings): AlertDatabase {
  if (settings.dialect === 'sqlite') {
    return new SqliteAlertDatabase(settings.path);
  }
  return PostgresAlertDatabase.connect({
    connectionString: settings.connectionString,
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password,
    schema: settings.schema,
    max: 1
  });
}
