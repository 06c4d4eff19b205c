export { readAlertDirectory, parseAlertMetadata, METADATA_FILENAME, type AlertDirectory } from './alertDirectory';
export { createAlertsToDbProgram, type AlertsToDbDependencies } from './cli/alertsToDb';
export { createLinkSignificanceProgram, type LinkSignificanceDependencies } from './cli/linkSignificance';
export * from './config/settings';
export { createPipelineContext, type PipelineContext, type PipelineContextInput } from './context';
export * from './db';
export * from './errors';
export * from './export';
export * from './flatten';
export { ingestAlert, type IngestOptions, type IngestResult } from './pipeline';
export { linkEventBySignificance, type SignificanceLinkResult, type SignificanceLinkStatus } from './significance/linker';
