/**
 * @fileoverview Loads access control CSV logs into {@link AccessRecord}s.
 * Loading never throws: a missing, unreadable or structurally broken file is
 * reported through the logger and returned as a failed {@link LoadResult}.
 *
 * @module loader
 */

import Papa from 'papaparse';
import type { AccessRecord } from './records';
import { readTextFile } from './utils/files';

/** Key papaparse uses for values beyond the header's column count */
const PARSED_EXTRA_KEY = '__parsed_extra';
/** papaparse error type for unterminated or misplaced quotes */
const STRUCTURAL_ERROR_TYPE = 'Quotes';

/**
 * Outcome of loading an access log.
 */
export type LoadResult =
  | {
      ok: true;
      records: AccessRecord[];
      /** Per-row problems that did not stop the load */
      warnings: string[];
    }
  | {
      ok: false;
      /** Always empty */
      records: AccessRecord[];
      error: Error;
    };

/**
 * Configuration options for loading records.
 */
export interface LoadOptions {
  /** Optional logger for load status messages */
  logger?: Pick<typeof console, 'log' | 'warn' | 'error'>;
}

/**
 * Keeps only the string-valued columns of a parsed row.
 */
function toAccessRecord(row: Record<string, unknown>): AccessRecord {
  const record: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    if (column !== PARSED_EXTRA_KEY && typeof value === 'string') {
      record[column] = value;
    }
  }
  return record;
}

/**
 * Parses CSV text with a header row into access records.
 *
 * @param content - CSV text
 * @returns Parsed records and per-row warnings
 * @throws Error on a structural CSV error such as an unterminated quote
 */
export function parseRecords(content: string): { records: AccessRecord[]; warnings: string[] } {
  const { data, errors } = Papa.parse<Record<string, unknown>>(content.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const structural = errors.find((error) => error.type === STRUCTURAL_ERROR_TYPE);
  if (structural) {
    throw new Error(`Malformed CSV at row ${structural.row ?? '?'}: ${structural.message}`);
  }

  // papaparse reports rows zero-based without the header; count as a spreadsheet would.
  const warnings = errors.map(
    (error) => `Malformed row ${error.row === undefined ? '?' : error.row + 2}: ${error.message}`
  );

  return { records: data.map(toAccessRecord), warnings };
}

/**
 * Loads an access log CSV file.
 *
 * @param filepath - Path to the CSV file
 * @param options - Optional configuration including custom logger
 * @returns The loaded records, or a failure carrying the cause and no records
 *
 * @remarks
 * Rows with too few or too many fields are kept: missing columns are simply
 * absent from the record. They are logged as warnings. Only a missing file,
 * a read error or a quoting error fails the load.
 */
export async function loadRecords(filepath: string, options: LoadOptions = {}): Promise<LoadResult> {
  const logger = options.logger ?? console;

  try {
    const content = await readTextFile(filepath);
    const { records, warnings } = parseRecords(content);
    for (const warning of warnings) {
      logger.warn(warning);
    }
    logger.log(`Successfully loaded ${records.length} records from ${filepath}`);
    return { ok: true, records, warnings };
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logger.error(`Error loading data: ${cause.message}`);
    return { ok: false, records: [], error: cause };
  }
}
