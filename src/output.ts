/**
 * @fileoverview Report sink: writes a rendered report to a file or prints it
 * through the logger.
 *
 * @module output
 */

import { writeTextFile } from './utils/files';

/**
 * Where a report ended up.
 */
export type ReportDestination = { kind: 'file'; path: string } | { kind: 'console' };

/**
 * Configuration options for emitting a report.
 */
export interface EmitReportOptions {
  /** Destination path; parent directories are created. Omit to print instead. */
  outputFile?: string;
  /** Heading printed above the report on the console (default: 'Report') */
  title?: string;
  /** Optional logger for outputting the report and status messages */
  logger?: Pick<typeof console, 'log'>;
}

/**
 * Writes a report to `outputFile`, or prints it when no file is given.
 *
 * @param content - Rendered report text
 * @param options - Destination, console title and logger
 * @returns The destination the report was sent to
 * @throws Error if the file or its parent directories cannot be written
 */
export async function emitReport(
  content: string,
  options: EmitReportOptions = {}
): Promise<ReportDestination> {
  const logger = options.logger ?? console;

  if (options.outputFile) {
    await writeTextFile(options.outputFile, content);
    logger.log(`Report saved to ${options.outputFile}`);
    return { kind: 'file', path: options.outputFile };
  }

  logger.log(`\n${options.title ?? 'Report'}:`);
  logger.log(content);
  return { kind: 'console' };
}
