#!/usr/bin/env node
/* eslint no-console: off */

/**
 * Command-line entry point. Resolves the configuration, runs one inspection
 * and maps its outcome onto the process exit code.
 */
import { UsageError, describeError } from '../common/errors';
import type { InspectionErrorKind, InspectionReport } from '../types/container';
import { createConsoleLogger, type InspectorLogger } from '../utils/inspectorLogger';
import { resolveInspectorConfig, USAGE, type InspectorConfig } from './config';
import { inspectContainer } from './inspector';

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  usage: 2,
  notFound: 3,
  unsupportedFormat: 4,
  corruptContainer: 5,
} as const;

const FATAL_EXIT_CODES: Record<InspectionErrorKind, number> = {
  NotFound: EXIT_CODES.notFound,
  UnsupportedFormat: EXIT_CODES.unsupportedFormat,
  CorruptContainer: EXIT_CODES.corruptContainer,
  OutputUnavailable: EXIT_CODES.failure,
  EntryIOError: EXIT_CODES.failure,
};

export const exitCodeFor = (report: InspectionReport): number => {
  if (report.ok) return EXIT_CODES.ok;
  return report.error ? FATAL_EXIT_CODES[report.error.kind] : EXIT_CODES.failure;
};

export interface CliIo {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  now?: () => Date;
}

export const runCli = async (argv: string[], io: CliIo = {}): Promise<number> => {
  const stdout = io.stdout ?? ((line: string) => console.log(line));
  const stderr = io.stderr ?? ((line: string) => console.error(line));

  let config: InspectorConfig;
  try {
    config = resolveInspectorConfig(argv, io.env ?? process.env, io.cwd ?? process.cwd());
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      stderr(`error: ${error.message}`);
      stderr(USAGE);
      return EXIT_CODES.usage;
    }
    throw error;
  }

  if (config.showHelp) {
    stdout(USAGE);
    return EXIT_CODES.ok;
  }

  const logger: InspectorLogger = createConsoleLogger({
    verbose: config.verbose,
    useColor: config.useColor,
    now: io.now,
    stdout,
    stderr,
  });
  logger.debug('Verbose mode enabled.');

  const report = await inspectContainer(config.filePath, {
    outputDir: config.outputDir,
    listOnly: config.listOnly,
    logger,
  });
  return exitCodeFor(report);
};

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`container-inspector: ${describeError(error)}`);
      process.exitCode = EXIT_CODES.failure;
    });
}
