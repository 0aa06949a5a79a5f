/**
 * @fileoverview End-to-end analyzer run: loads the access log, checks unit
 * consistency, writes both reports into the reports directory under a
 * run-timestamped name and prints the fob report.
 *
 * @module analyzer
 */

import path from 'path';
import type { AnalyzerConfig } from './config';
import { loadRecords } from './loader';
import { emitReport } from './output';
import { generateBusyHourReport } from './reports/busyHourReport';
import { generateFobReport } from './reports/fobReport';
import { ensureDirExists } from './utils/files';
import { formatRunTimestamp } from './utils/time';
import { validateUnitConsistency, type UnitIdConflict } from './validation';

/**
 * Options for an analyzer run.
 */
export interface RunAnalysisOptions {
  /** Logger for status messages and the printed report */
  logger?: Pick<typeof console, 'log' | 'warn' | 'error'>;
  /** Clock used for the report filename stamp (default: current time) */
  now?: Date;
}

/**
 * Outcome of an analyzer run.
 */
export interface AnalysisResult {
  /** Number of records loaded; 0 when loading failed */
  recordCount: number;
  /** Why loading failed, when it did */
  loadError?: Error;
  fobReport: string;
  busyHourReport: string;
  fobReportPath: string;
  busyHourReportPath: string;
  unitIdConflicts: UnitIdConflict[];
}

/**
 * Builds the report file paths for a run.
 *
 * @param reportsDir - Directory the reports go into
 * @param now - Run time
 * @returns Paths of the fob and busy-hour reports
 *
 * @example
 * ```typescript
 * reportPaths('reports', new Date(2024, 0, 5, 7, 8, 9)).fob;
 * // 'reports/unit_fob_report_20240105_070809.csv'
 * ```
 */
export function reportPaths(reportsDir: string, now: Date): { fob: string; busyHour: string } {
  const stamp = formatRunTimestamp(now);
  return {
    fob: path.join(reportsDir, `unit_fob_report_${stamp}.csv`),
    busyHour: path.join(reportsDir, `busy_time_report_${stamp}.csv`),
  };
}

/**
 * Runs the full analysis for one access log.
 *
 * @param config - Data file and reports directory
 * @param options - Optional logger and clock
 * @returns Rendered reports, where they were written and load diagnostics
 * @throws Error if the reports directory or a report file cannot be written
 *
 * @remarks
 * A load failure does not stop the run: both reports are still written,
 * header only.
 */
export async function runAnalysis(
  config: AnalyzerConfig,
  options: RunAnalysisOptions = {}
): Promise<AnalysisResult> {
  const logger = options.logger ?? console;
  const now = options.now ?? new Date();

  const loaded = await loadRecords(config.dataFile, { logger });
  const { records } = loaded;
  const unitIdConflicts = validateUnitConsistency(records, { logger });

  await ensureDirExists(config.reportsDir);
  const paths = reportPaths(config.reportsDir, now);

  const fobReport = generateFobReport(records);
  const busyHourReport = generateBusyHourReport(records);

  await emitReport(fobReport, { outputFile: paths.fob, logger });
  await emitReport(busyHourReport, { outputFile: paths.busyHour, logger });
  await emitReport(fobReport, { title: 'Unit to Fob Report', logger });

  return {
    recordCount: records.length,
    loadError: loaded.ok ? undefined : loaded.error,
    fobReport,
    busyHourReport,
    fobReportPath: paths.fob,
    busyHourReportPath: paths.busyHour,
    unitIdConflicts,
  };
}
