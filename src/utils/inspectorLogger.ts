import { createColors, isColorSupported } from 'colorette';
import type { ExtractionResult, InspectionReport } from '../types/container';

type Colors = ReturnType<typeof createColors>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface InspectorLogger {
  debug(message: string, details?: string[]): void;
  info(message: string, details?: string[]): void;
  warn(message: string, details?: string[]): void;
  error(message: string, details?: string[]): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  useColor?: boolean;
  now?: () => Date;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

const numberFormatter = new Intl.NumberFormat('en-US');

export const formatNumber = (value: number) =>
  Number.isFinite(value) ? numberFormatter.format(value) : '—';

export const formatBytes = (size: number) =>
  `${formatNumber(size)} ${size === 1 ? 'byte' : 'bytes'}`;

const levelLabel = (colors: Colors, level: LogLevel) => {
  switch (level) {
    case 'debug':
      return colors.dim('DEBUG');
    case 'info':
      return colors.cyan('INFO');
    case 'warn':
      return colors.yellow('WARN');
    case 'error':
      return colors.red('ERROR');
    default: {
      const exhaustive: never = level;
      return String(exhaustive);
    }
  }
};

const indentBlock = (value: string, indent = '   ') =>
  value
    .split('\n')
    .map((line) => `${indent}${line}`)
    .join('\n');

export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): InspectorLogger => {
  const colors = createColors({ useColor: options.useColor ?? isColorSupported });
  const now = options.now ?? (() => new Date());
  // eslint-disable-next-line no-console
  const stdout = options.stdout ?? ((line: string) => console.log(line));
  // eslint-disable-next-line no-console
  const stderr = options.stderr ?? ((line: string) => console.error(line));

  const emit = (level: LogLevel, message: string, details: string[] = []) => {
    if (level === 'debug' && !options.verbose) return;
    const write = level === 'warn' || level === 'error' ? stderr : stdout;
    write(`${colors.dim(now().toISOString())} ${levelLabel(colors, level)} ${message}`);
    details.forEach((detail) => write(indentBlock(detail)));
  };

  return {
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
  };
};

/** Drops everything; for library callers that only want the report. */
export const silentLogger: InspectorLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const describeResult = (result: ExtractionResult): string => {
  switch (result.status) {
    case 'succeeded':
      return `Extracted ${result.name} to ${result.targetPath}`;
    case 'skipped':
      return `Skipped ${result.name}${result.message ? ` (${result.message})` : ''}`;
    case 'failed':
      return `Error extracting ${result.name}: ${result.error?.message ?? 'unknown error'}`;
    default: {
      const exhaustive: never = result.status;
      return String(exhaustive);
    }
  }
};

export const summariseReport = (report: InspectionReport): string => {
  const counts = { succeeded: 0, failed: 0, skipped: 0 };
  report.results.forEach((result) => {
    counts[result.status] += 1;
  });
  return [
    `${formatNumber(report.entries.length)} entries listed`,
    `${formatNumber(counts.succeeded)} extracted`,
    `${formatNumber(counts.failed)} failed`,
    `${formatNumber(counts.skipped)} skipped`,
  ].join(', ');
};
