/**
 * Command-line run of the footnote filter
 *
 * Kept apart from index.ts so the whole read-filter-write cycle can be driven
 * with in-memory streams.
 */

import { runFootnoteFilter } from './footnoteFilter';
import { ReportingService } from './services/reportingService';
import { loadUserOptions } from './userOptionsConfig';
import { logError, logInfo, logWarning } from './utils/commonUtils';
import { loadEnv } from './utils/loadEnv';

export interface CliIo {
  argv: string[]; // Arguments after the script path; pandoc passes the format first
  stdin: AsyncIterable<Buffer | string>;
  stdout: { write(chunk: string): unknown };
  env?: NodeJS.ProcessEnv;
  envFile?: string; // Defaults to .env in the working directory
  now?: Date;
}

async function readAll(input: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Read the AST, filter it and write it back.
 * Nothing reaches stdout unless the whole document was filtered.
 *
 * @returns The process exit code
 */
export async function runCli(io: CliIo): Promise<number> {
  const env = io.env ?? process.env;
  try {
    const envFile = loadEnv(io.envFile, env);
    const options = loadUserOptions(env);
    const verbose = options.logging.verbose;
    if (envFile) {
      logInfo(verbose, 'footnote-styler', `Loaded environment from ${envFile}`);
    }

    const format = io.argv[0];
    if (!format) {
      logError('footnote-styler', 'Missing output format argument. Usage: footnote-styler <format>');
      return 1;
    }

    const reportingService = options.reporting.enabled
      ? new ReportingService(options.reporting.reportsDir, verbose)
      : undefined;

    const input: unknown = JSON.parse(await readAll(io.stdin));
    const result = runFootnoteFilter(input, format, options, reportingService);
    io.stdout.write(JSON.stringify(result.document));

    logInfo(
      verbose,
      'footnote-styler',
      `Format '${format}': ${result.styled} footnote(s) styled, ${result.passedThrough} left unchanged`
    );

    if (reportingService) {
      const reportPath = await reportingService.writeReport(io.now);
      if (reportPath) {
        logInfo(verbose, 'footnote-styler', `Report: ${reportPath}`);
      } else {
        logWarning('footnote-styler', 'Reporting is enabled but the document has no footnotes; no report written');
      }
    }
    return 0;
  } catch (error) {
    logError('footnote-styler', 'Error running footnote filter:', error instanceof Error ? error.message : error);
    return 1;
  }
}
