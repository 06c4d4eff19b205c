export * from './columns';
export { openAlertDatabase } from './connect';
export { PostgresAlertDatabase } from './postgres';
export { buildEventsViewQuery, buildSchemaStatements, ensureAlertSchema, type AlertSchemaOptions } from './schema';
export { SqliteAlertDatabase } from './sqlite';
export * from './types';
export { DEFAULT_BATCH_SIZE, buildUpsertStatement, upsertAlertRecords, type UpsertOptions, type UpsertSummary } from './upsert';
