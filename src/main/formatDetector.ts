import fs from 'fs/promises';
import { toBuffer } from '../common/bytes';
import type { ContainerFormat, FormatDetection } from '../types/container';

const END_OF_CENTRAL_DIRECTORY = Buffer.from([0x50, 0x4b, 0x05, 0x06]);
const END_OF_CENTRAL_DIRECTORY_SIZE = 22;
const MAX_ARCHIVE_COMMENT = 0xffff;
const LOCAL_FILE_HEADER = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const COMPOUND_FILE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

/**
 * Offset of the end-of-central-directory record, or -1. The record must sit
 * whole within the archive comment window at the tail; empty archives
 * consist of nothing else.
 */
export const findZipEndRecord = (bytes: Uint8Array): number => {
  const data = toBuffer(bytes);
  if (data.length < END_OF_CENTRAL_DIRECTORY_SIZE) {
    return -1;
  }
  const windowStart = Math.max(
    0,
    data.length - (END_OF_CENTRAL_DIRECTORY_SIZE + MAX_ARCHIVE_COMMENT),
  );
  const recordOffset = data.lastIndexOf(
    END_OF_CENTRAL_DIRECTORY,
    data.length - END_OF_CENTRAL_DIRECTORY_SIZE,
  );
  return recordOffset >= windowStart ? recordOffset : -1;
};

export const hasZipEndRecord = (bytes: Uint8Array): boolean => findZipEndRecord(bytes) >= 0;

export const hasCompoundFileMagic = (bytes: Uint8Array): boolean =>
  bytes.length >= COMPOUND_FILE_MAGIC.length &&
  toBuffer(bytes).subarray(0, COMPOUND_FILE_MAGIC.length).equals(COMPOUND_FILE_MAGIC);

export const hasLocalFileHeader = (bytes: Uint8Array): boolean =>
  bytes.length >= LOCAL_FILE_HEADER.length &&
  toBuffer(bytes).subarray(0, LOCAL_FILE_HEADER.length).equals(LOCAL_FILE_HEADER);

export const detectFormatFromBytes = (bytes: Uint8Array): FormatDetection => {
  if (hasZipEndRecord(bytes)) {
    return { format: 'zip', method: 'central-directory' };
  }
  if (hasCompoundFileMagic(bytes)) {
    return { format: 'ole', method: 'compound-file-header' };
  }
  if (hasLocalFileHeader(bytes)) {
    return { format: 'zip', method: 'local-header-probe' };
  }
  return { format: 'unknown', method: 'none' };
};

export const detectFormat = async (filePath: string): Promise<ContainerFormat> => {
  const bytes = await fs.readFile(filePath);
  return detectFormatFromBytes(bytes).format;
};
