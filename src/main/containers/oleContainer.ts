import * as CFB from 'cfb';
import { toBuffer } from '../../common/bytes';
import { guessMediaType } from '../../common/entryName';
import { describeError, InspectionError } from '../../common/errors';
import type { ContainerEntry, OpenedContainer } from '../../types/container';

export type CompoundFile = ReturnType<typeof CFB.read>;
type CompoundFileEntry = CompoundFile['FileIndex'][number];

interface StreamRecord {
  entry: ContainerEntry;
  file: CompoundFileEntry;
}

/** Storages (and the root) end in `/`; an empty component marks a nameless node. */
export const isExtractableStreamPath = (fullPath: string): boolean => {
  if (!fullPath || fullPath.endsWith('/')) {
    return false;
  }
  return fullPath.split('/').every((component) => component.length > 0);
};

const toStreamRecords = (container: CompoundFile): StreamRecord[] => {
  const records: StreamRecord[] = [];
  container.FullPaths.forEach((fullPath, position) => {
    const file = container.FileIndex[position];
    if (!file || !isExtractableStreamPath(fullPath)) {
      return;
    }
    records.push({
      file,
      entry: {
        name: fullPath,
        size: file.size,
        mediaType: guessMediaType(fullPath),
        index: records.length,
        isDirectory: false,
        format: 'ole',
      },
    });
  });
  return records;
};

/** Lists the streams of an already parsed compound file. */
export const openCompoundFile = (compoundFile: CompoundFile): OpenedContainer => {
  const records = toStreamRecords(compoundFile);

  return {
    format: 'ole',
    *entries() {
      for (const record of records) {
        yield record.entry;
      }
    },
    read(entry) {
      const record = records[entry.index];
      if (!record || record.entry.name !== entry.name) {
        throw new Error(`Stream ${entry.name} is missing from the compound file`);
      }
      // cfb leaves `content` unset for zero-length streams
      const content: CompoundFileEntry['content'] | undefined = record.file.content;
      return content ? Uint8Array.from(content) : new Uint8Array(0);
    },
  };
};

export const openOleContainer = (data: Uint8Array): OpenedContainer => {
  let compoundFile: CompoundFile;
  try {
    compoundFile = CFB.read(toBuffer(data), { type: 'buffer' });
  } catch (error: unknown) {
    throw new InspectionError(
      'CorruptContainer',
      `Not a readable OLE compound file: ${describeError(error)}`,
      { cause: error },
    );
  }
  return openCompoundFile(compoundFile);
};
