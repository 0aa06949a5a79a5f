export {
  COLUMNS,
  CREDENTIAL_SEPARATOR,
  compareCodePoints,
  credentialId,
  readField,
  unitIdentifier,
  type AccessRecord,
} from './records';
export { loadRecords, parseRecords, type LoadOptions, type LoadResult } from './loader';
export {
  FOB_REPORT_HEADER,
  buildUnitFobSets,
  generateFobReport,
  renderFobReport,
  type UnitFobSets,
} from './reports/fobReport';
export {
  BUSY_HOUR_REPORT_HEADER,
  buildUnitHourHistograms,
  findBusiestHours,
  formatHour,
  generateBusyHourReport,
  renderBusyHourReport,
  type UnitHourHistograms,
} from './reports/busyHourReport';
export { emitReport, type EmitReportOptions, type ReportDestination } from './output';
export { findUnitIdConflicts, validateUnitConsistency, type UnitIdConflict } from './validation';
export { resolveConfig, DEFAULT_DATA_FILE, DEFAULT_REPORTS_DIR, type AnalyzerConfig } from './config';
export { runAnalysis, reportPaths, type AnalysisResult, type RunAnalysisOptions } from './analyzer';
export { formatRunTimestamp, parseAccessTimestamp, type AccessTime } from './utils/time';
