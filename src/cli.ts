#!/usr/bin/env node
/**
 * @fileoverview Command line entry point.
 *
 * Usage: `access-reports [dataFile] [--reports-dir <dir>]`
 *
 * @module cli
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runAnalysis } from './analyzer';
import { resolveConfig, type AnalyzerConfig } from './config';

/**
 * Parses command line arguments into configuration overrides.
 *
 * @param argv - Arguments without the node binary and script path
 * @returns Only the values the user actually passed
 */
export async function parseArgs(argv: string[]): Promise<Partial<AnalyzerConfig>> {
  const args = await yargs(argv)
    .scriptName('access-reports')
    .usage('Usage: $0 [dataFile] [options]')
    .command('$0 [dataFile]', 'Generate unit fob and busiest-hour reports from an access log', (command) =>
      command.positional('dataFile', {
        type: 'string',
        description: 'Access log CSV (default: sampleData.csv)',
      })
    )
    .option('reports-dir', {
      alias: 'o',
      type: 'string',
      description: 'Directory the reports are written to (default: reports)',
    })
    .strict()
    .help()
    .parseAsync();

  // The positional is declared inside the command builder, so its type does not reach `args`.
  const dataFile = typeof args.dataFile === 'string' ? args.dataFile : undefined;
  return { dataFile, reportsDir: args.reportsDir };
}

/**
 * Runs the CLI. Load failures still produce header-only reports and exit 0;
 * anything else sets a non-zero exit code.
 */
export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  try {
    const config = resolveConfig(await parseArgs(argv));
    await runAnalysis(config, { logger: console });
  } catch (error) {
    console.error('Report generation failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
