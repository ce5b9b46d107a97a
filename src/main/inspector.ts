import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { describeError, InspectionError, toFailure } from '../common/errors';
import type {
  ContainerEntry,
  ContainerFormat,
  ExtractionResult,
  InspectionFailure,
  InspectionReport,
  OpenedContainer,
} from '../types/container';
import {
  describeResult,
  formatBytes,
  silentLogger,
  summariseReport,
  type InspectorLogger,
} from '../utils/inspectorLogger';
import { openContainer } from './containers';
import { extractEntry, resolveTargetPath } from './extractor';
import { detectFormatFromBytes } from './formatDetector';

export interface InspectOptions {
  outputDir: string;
  listOnly: boolean;
  logger?: InspectorLogger;
}

const FORMAT_LABELS: Record<ContainerFormat, string> = {
  zip: 'ZIP archive',
  ole: 'OLE compound file',
  unknown: 'unknown container',
};

const readInput = async (filePath: string): Promise<Buffer> => {
  let stats: Stats;
  try {
    stats = await fs.stat(filePath);
  } catch (error: unknown) {
    throw new InspectionError('NotFound', `File not found: ${filePath}`, { cause: error });
  }
  if (!stats.isFile()) {
    throw new InspectionError('NotFound', `Not a regular file: ${filePath}`);
  }
  try {
    return await fs.readFile(filePath);
  } catch (error: unknown) {
    throw new InspectionError('NotFound', `Cannot read ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
};

const openDetected = (
  data: Buffer,
  filePath: string,
  logger: InspectorLogger,
): OpenedContainer => {
  const detection = detectFormatFromBytes(data);
  logger.debug(`Format probe for ${filePath}: ${detection.format} (${detection.method})`);

  if (detection.format === 'unknown') {
    throw new InspectionError('UnsupportedFormat', `Could not identify file type for: ${filePath}`);
  }
  if (detection.method === 'local-header-probe') {
    logger.warn(`No ZIP central directory or OLE header in ${filePath}`, [
      'Detected a ZIP local file header; attempting ZIP extraction.',
    ]);
  }
  return openContainer(data, detection.format);
};

/**
 * Lists a container's entries in directory order. Each call reopens the
 * file, so iterating again starts from the first entry.
 */
export async function* listEntries(
  filePath: string,
  format: ContainerFormat,
): AsyncGenerator<ContainerEntry, void, undefined> {
  if (format === 'unknown') {
    throw new InspectionError('UnsupportedFormat', `Could not identify file type for: ${filePath}`);
  }
  const container = openContainer(await readInput(filePath), format);
  yield* container.entries();
}

const extractAll = async (
  container: OpenedContainer,
  entries: ContainerEntry[],
  outputDir: string,
  logger: InspectorLogger,
): Promise<ExtractionResult[]> => {
  const results: ExtractionResult[] = [];
  const claimedTargets = new Map<string, string>();

  for (const entry of entries) {
    const targetPath = resolveTargetPath(entry, outputDir);
    if (targetPath && !entry.isDirectory) {
      const previous = claimedTargets.get(targetPath);
      if (previous !== undefined) {
        logger.warn(`${entry.name} overwrites ${previous}`, [`Both map to ${targetPath}`]);
      }
      claimedTargets.set(targetPath, entry.name);
    }

    let result: ExtractionResult;
    try {
      const bytes = entry.isDirectory ? new Uint8Array(0) : container.read(entry);
      result = await extractEntry(entry, bytes, outputDir);
    } catch (error: unknown) {
      result = {
        name: entry.name,
        status: 'failed',
        targetPath: targetPath ?? '',
        error: { kind: 'EntryIOError', message: describeError(error) },
      };
    }

    if (result.status === 'failed') {
      logger.error(describeResult(result));
    } else if (result.status === 'skipped') {
      logger.debug(describeResult(result));
    } else {
      logger.info(describeResult(result));
    }
    results.push(result);
  }

  return results;
};

export const inspectContainer = async (
  filePath: string,
  options: InspectOptions,
): Promise<InspectionReport> => {
  const logger = options.logger ?? silentLogger;
  const report: InspectionReport = {
    ok: false,
    filePath,
    format: 'unknown',
    entries: [],
    results: [],
  };
  const fail = (failure: InspectionFailure): InspectionReport => {
    logger.error(failure.message);
    return { ...report, ok: false, error: failure };
  };

  let container: OpenedContainer;
  try {
    container = openDetected(await readInput(filePath), filePath, logger);
  } catch (error: unknown) {
    return fail(toFailure(error, 'CorruptContainer'));
  }

  report.format = container.format;
  logger.info(`Processing ${FORMAT_LABELS[container.format]}: ${filePath}`);

  for (const entry of container.entries()) {
    logger.info(
      `Found embedded ${entry.format === 'ole' ? 'stream' : 'file'}: ${entry.name}, Size: ${formatBytes(entry.size)}, Type: ${entry.mediaType}`,
    );
    report.entries.push(entry);
  }

  if (!options.listOnly) {
    const outputDir = path.resolve(options.outputDir);
    try {
      await fs.mkdir(outputDir, { recursive: true });
    } catch (error: unknown) {
      return fail({
        kind: 'OutputUnavailable',
        message: `Cannot create output directory ${outputDir}: ${describeError(error)}`,
      });
    }
    report.results = await extractAll(container, report.entries, outputDir, logger);
  }

  report.ok = true;
  logger.info(`Finished ${filePath}: ${summariseReport(report)}`);
  return report;
};

/** Boolean form of `inspectContainer`; per-entry failures still count as success. */
export const processContainer = async (
  filePath: string,
  outputDir: string,
  listOnly: boolean,
  logger: InspectorLogger = silentLogger,
): Promise<boolean> => (await inspectContainer(filePath, { outputDir, listOnly, logger })).ok;
