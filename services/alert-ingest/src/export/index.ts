export { exportSnapshots, partitionDirectory, type ExportOptions, type ExportSummary, type PartitionExport } from './exporter';
export * from './partitions';
export { exportHeader, formatExportTimestamp, renderCsv, renderTable } from './render';
