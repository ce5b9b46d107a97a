import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import * as CFB from 'cfb';
import { strToU8, zipSync } from 'fflate';
import type { Zippable } from 'fflate';

export const makeTempDir = async (prefix: string) =>
  fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));

export const cleanupTempDir = async (dirPath: string | null) => {
  if (dirPath) {
    await fs.rm(dirPath, { recursive: true, force: true });
  }
};

export const text = (value: string) => strToU8(value);

/** Entries are stored in key order; keys are used verbatim as entry names. */
export const buildZip = (files: Zippable): Uint8Array => zipSync(files, { level: 6 });

/** Stream paths are relative to the root storage, e.g. `Data` or `Storage/Stream`. */
export const createCompoundFile = (streams: Record<string, Uint8Array>) => {
  const container = CFB.utils.cfb_new();
  Object.entries(streams).forEach(([streamPath, data]) => {
    CFB.utils.cfb_add(container, streamPath, Buffer.from(data));
  });
  return container;
};

export const buildCompoundFile = (streams: Record<string, Uint8Array>): Uint8Array => {
  const written: Buffer = CFB.write(createCompoundFile(streams), { type: 'buffer' });
  return Buffer.from(written);
};

/** Offset of an entry's compressed data, read from its local file header. */
export const localDataOffset = (archive: Uint8Array, headerOffset: number) => {
  const view = Buffer.from(archive.buffer, archive.byteOffset, archive.byteLength);
  const nameLength = view.readUInt16LE(headerOffset + 26);
  const extraLength = view.readUInt16LE(headerOffset + 28);
  return headerOffset + 30 + nameLength + extraLength;
};

export const writeFixture = async (dir: string, name: string, data: Uint8Array) => {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, data);
  return filePath;
};

export const listFiles = async (dir: string) => (await fs.readdir(dir)).sort();
