export { default as ReportWriter, EPOCH_CSV_COLUMNS, fileStamp, renderEpochCsv, renderJson } from './ReportWriter';
export type { WrittenReport } from './ReportWriter';
