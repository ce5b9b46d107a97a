import fs from 'fs/promises';
import path from 'path';
import { toSafeFileName } from '../common/entryName';
import { describeError } from '../common/errors';
import type { ContainerEntry, ExtractionResult } from '../types/container';

export const resolveTargetPath = (entry: ContainerEntry, outputDir: string): string | null => {
  const safeName = toSafeFileName(entry.name, entry.format);
  return safeName ? path.join(outputDir, safeName) : null;
};

const failed = (entry: ContainerEntry, targetPath: string, message: string): ExtractionResult => ({
  name: entry.name,
  status: 'failed',
  targetPath,
  error: { kind: 'EntryIOError', message },
});

/**
 * Writes one entry into `outputDir` under its flattened name. An existing
 * file of the same name is replaced; the write is not atomic.
 */
export const extractEntry = async (
  entry: ContainerEntry,
  rawBytes: Uint8Array,
  outputDir: string,
): Promise<ExtractionResult> => {
  if (entry.isDirectory) {
    return {
      name: entry.name,
      status: 'skipped',
      targetPath: '',
      message: 'Directory record',
    };
  }

  const targetPath = resolveTargetPath(entry, outputDir);
  if (!targetPath) {
    return failed(entry, '', `Entry name ${JSON.stringify(entry.name)} has no usable file name`);
  }

  try {
    await fs.writeFile(targetPath, rawBytes);
  } catch (error: unknown) {
    return failed(entry, targetPath, describeError(error));
  }

  return {
    name: entry.name,
    status: 'succeeded',
    targetPath,
    bytesWritten: rawBytes.byteLength,
  };
};
