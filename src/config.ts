/**
 * @fileoverview Runtime configuration for the report generator.
 * Values come from explicit overrides first, then environment variables,
 * then the built-in defaults.
 *
 * @module config
 */

/** Default access log read when no path is given */
export const DEFAULT_DATA_FILE = 'sampleData.csv';
/** Default directory reports are written to */
export const DEFAULT_REPORTS_DIR = 'reports';

/** Environment variable overriding the access log path */
export const DATA_FILE_ENV = 'ACCESS_DATA_FILE';
/** Environment variable overriding the reports directory */
export const REPORTS_DIR_ENV = 'ACCESS_REPORTS_DIR';

/**
 * Resolved settings for one analyzer run.
 */
export interface AnalyzerConfig {
  /** Path to the access log CSV */
  dataFile: string;
  /** Directory the timestamped reports are written to */
  reportsDir: string;
}

/**
 * Returns the trimmed value, or `undefined` when it is missing or blank.
 */
function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolves the analyzer configuration.
 *
 * @param overrides - Values taken from the command line
 * @param env - Environment to read (defaults to `process.env`)
 * @returns Fully populated configuration
 *
 * @example
 * ```typescript
 * resolveConfig({}, { ACCESS_REPORTS_DIR: 'out' });
 * // { dataFile: 'sampleData.csv', reportsDir: 'out' }
 * ```
 */
export function resolveConfig(
  overrides: Partial<AnalyzerConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): AnalyzerConfig {
  return {
    dataFile: nonBlank(overrides.dataFile) ?? nonBlank(env[DATA_FILE_ENV]) ?? DEFAULT_DATA_FILE,
    reportsDir: nonBlank(overrides.reportsDir) ?? nonBlank(env[REPORTS_DIR_ENV]) ?? DEFAULT_REPORTS_DIR,
  };
}
