import { inflateSync, strFromU8 } from 'fflate';
import { toBuffer } from '../../common/bytes';
import { guessMediaType } from '../../common/entryName';
import { describeError, InspectionError } from '../../common/errors';
import type { ContainerEntry, OpenedContainer } from '../../types/container';
import { findZipEndRecord } from '../formatDetector';

const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const CENTRAL_HEADER_SIZE = 46;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const LOCAL_HEADER_SIZE = 30;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_END_SIGNATURE = 0x06064b50;
const ZIP64_END_SIZE = 56;
const ZIP64_EXTRA_FIELD = 0x0001;
const ENCRYPTED_FLAG = 0x0001;
const UTF8_NAME_FLAG = 0x0800;
const UINT32_MAX = 0xffffffff;

const STORED = 0;
const DEFLATED = 8;

interface CentralDirectoryLocation {
  /** Physical offset of the (ZIP64) end record. */
  endOffset: number;
  size: number;
  /** Offset as recorded in the archive, relative to the archive's own start. */
  offset: number;
}

interface RecordSizes {
  originalSize: number;
  compressedSize: number;
  localHeaderOffset: number;
}

interface ZipRecord extends RecordSizes {
  entry: ContainerEntry;
  flags: number;
  compression: number;
}

const locateZip64End = (data: Buffer, endOffset: number): number => {
  const locatorOffset = endOffset - ZIP64_LOCATOR_SIZE;
  if (locatorOffset < 0 || data.readUInt32LE(locatorOffset) !== ZIP64_LOCATOR_SIGNATURE) {
    throw new Error('ZIP64 end of central directory locator not found');
  }
  const recorded = Number(data.readBigUInt64LE(locatorOffset + 8));
  const zip64End = [locatorOffset - ZIP64_END_SIZE, recorded].find(
    (candidate) =>
      candidate >= 0 &&
      candidate + ZIP64_END_SIZE <= data.length &&
      data.readUInt32LE(candidate) === ZIP64_END_SIGNATURE,
  );
  if (zip64End === undefined) {
    throw new Error('ZIP64 end of central directory record not found');
  }
  return zip64End;
};

const locateCentralDirectory = (data: Buffer): CentralDirectoryLocation => {
  const endOffset = findZipEndRecord(data);
  if (endOffset < 0) {
    throw new Error('End of central directory record not found');
  }
  const size = data.readUInt32LE(endOffset + 12);
  const offset = data.readUInt32LE(endOffset + 16);
  if (size !== UINT32_MAX && offset !== UINT32_MAX) {
    return { endOffset, size, offset };
  }

  const zip64End = locateZip64End(data, endOffset);
  return {
    endOffset: zip64End,
    size: Number(data.readBigUInt64LE(zip64End + 40)),
    offset: Number(data.readBigUInt64LE(zip64End + 48)),
  };
};

/** Only the fields saturated in the fixed header appear in the ZIP64 extra, in this order. */
const applyZip64Extra = (extra: Buffer, sizes: RecordSizes): RecordSizes => {
  let cursor = 0;
  while (cursor + 4 <= extra.length) {
    const id = extra.readUInt16LE(cursor);
    const length = extra.readUInt16LE(cursor + 2);
    if (id === ZIP64_EXTRA_FIELD) {
      let field = cursor + 4;
      const next = (value: number) => {
        if (value !== UINT32_MAX) return value;
        const wide = Number(extra.readBigUInt64LE(field));
        field += 8;
        return wide;
      };
      return {
        originalSize: next(sizes.originalSize),
        compressedSize: next(sizes.compressedSize),
        localHeaderOffset: next(sizes.localHeaderOffset),
      };
    }
    cursor += 4 + length;
  }
  return sizes;
};

/**
 * Walks the central directory once, in stored order, without inflating
 * anything. Data prepended to the archive (a launcher script, a
 * self-extractor stub) shifts every recorded offset by the same amount,
 * which is worked out from where the end record actually sits.
 */
const readCentralDirectory = (data: Buffer): ZipRecord[] => {
  const location = locateCentralDirectory(data);
  const shift = location.endOffset - location.size - location.offset;
  if (shift < 0) {
    throw new Error('Central directory lies outside the file');
  }

  const records: ZipRecord[] = [];
  const end = location.offset + shift + location.size;
  let cursor = location.offset + shift;
  while (cursor < end) {
    if (
      cursor + CENTRAL_HEADER_SIZE > data.length ||
      data.readUInt32LE(cursor) !== CENTRAL_HEADER_SIGNATURE
    ) {
      throw new Error(`Invalid central directory header at offset ${cursor}`);
    }
    const flags = data.readUInt16LE(cursor + 8);
    const nameStart = cursor + CENTRAL_HEADER_SIZE;
    const nameEnd = nameStart + data.readUInt16LE(cursor + 28);
    const extraEnd = nameEnd + data.readUInt16LE(cursor + 30);
    const next = extraEnd + data.readUInt16LE(cursor + 32);
    if (next > data.length) {
      throw new Error(`Central directory header at offset ${cursor} is truncated`);
    }

    const name = strFromU8(data.subarray(nameStart, nameEnd), (flags & UTF8_NAME_FLAG) === 0);
    const sizes = applyZip64Extra(data.subarray(nameEnd, extraEnd), {
      compressedSize: data.readUInt32LE(cursor + 20),
      originalSize: data.readUInt32LE(cursor + 24),
      localHeaderOffset: data.readUInt32LE(cursor + 42),
    });
    records.push({
      ...sizes,
      localHeaderOffset: sizes.localHeaderOffset + shift,
      flags,
      compression: data.readUInt16LE(cursor + 10),
      entry: {
        name,
        size: sizes.originalSize,
        mediaType: guessMediaType(name),
        index: records.length,
        isDirectory: name.endsWith('/') && sizes.originalSize === 0,
        format: 'zip',
      },
    });
    cursor = next;
  }
  return records;
};

const inflateRecord = (data: Buffer, record: ZipRecord): Uint8Array => {
  const header = record.localHeaderOffset;
  if (
    header + LOCAL_HEADER_SIZE > data.length ||
    data.readUInt32LE(header) !== LOCAL_HEADER_SIGNATURE
  ) {
    throw new Error(`Invalid local file header at offset ${header}`);
  }
  if (record.flags & ENCRYPTED_FLAG) {
    throw new Error('Encrypted entries are not supported');
  }

  const start =
    header + LOCAL_HEADER_SIZE + data.readUInt16LE(header + 26) + data.readUInt16LE(header + 28);
  const end = start + record.compressedSize;
  if (end > data.length) {
    throw new Error('Entry data runs past the end of the file');
  }

  const compressed = data.subarray(start, end);
  switch (record.compression) {
    case STORED:
      return Uint8Array.from(compressed);
    case DEFLATED:
      return inflateSync(compressed);
    default:
      throw new Error(`Unsupported compression method ${record.compression}`);
  }
};

export const openZipContainer = (bytes: Uint8Array): OpenedContainer => {
  const data = toBuffer(bytes);
  let records: ZipRecord[];
  try {
    records = readCentralDirectory(data);
  } catch (error: unknown) {
    throw new InspectionError(
      'CorruptContainer',
      `Not a valid ZIP archive: ${describeError(error)}`,
      { cause: error },
    );
  }

  return {
    format: 'zip',
    *entries() {
      for (const record of records) {
        yield record.entry;
      }
    },
    read(entry) {
      const record = records[entry.index];
      if (!record || record.entry.name !== entry.name) {
        throw new Error(`Entry ${entry.name} is missing from the archive`);
      }
      return inflateRecord(data, record);
    },
  };
};
