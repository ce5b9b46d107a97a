import { openContainer, openOleContainer, openZipContainer } from '../main/containers';
import { isExtractableStreamPath, openCompoundFile } from '../main/containers/oleContainer';
import { InspectionError } from '../common/errors';
import {
  buildCompoundFile,
  buildZip,
  createCompoundFile,
  text,
} from '../../tests/support/fixtures';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('Expected function to throw');
};

const decode = (bytes: Uint8Array) => Buffer.from(bytes).toString('utf8');

describe('ZIP container', () => {
  it('lists central directory records with sizes and media types', () => {
    const container = openZipContainer(
      buildZip({
        'readme.txt': text('hello world'),
        'data/info.json': text('{"key":"value12345"}'),
      }),
    );

    expect([...container.entries()]).toEqual([
      {
        name: 'readme.txt',
        size: 11,
        mediaType: 'text/plain',
        index: 0,
        isDirectory: false,
        format: 'zip',
      },
      {
        name: 'data/info.json',
        size: 20,
        mediaType: 'application/json',
        index: 1,
        isDirectory: false,
        format: 'zip',
      },
    ]);
  });

  it('keeps the stored order instead of sorting', () => {
    const container = openZipContainer(
      buildZip({ 'zeta.txt': text('z'), 'alpha.txt': text('a'), 'mid.txt': text('m') }),
    );
    expect([...container.entries()].map((entry) => entry.name)).toEqual([
      'zeta.txt',
      'alpha.txt',
      'mid.txt',
    ]);
  });

  it('marks directory records', () => {
    const container = openZipContainer(buildZip({ docs: { 'guide.md': text('# Guide') } }));
    expect([...container.entries()].map((entry) => [entry.name, entry.isDirectory])).toEqual([
      ['docs/', true],
      ['docs/guide.md', false],
    ]);
  });

  it('reads the stored bytes of a single entry', () => {
    const container = openZipContainer(
      buildZip({ 'first.txt': text('first entry'), 'second.txt': text('second entry') }),
    );
    const [, second] = [...container.entries()];
    expect(decode(container.read(second))).toBe('second entry');
  });

  it('restarts iteration on every call', () => {
    const container = openZipContainer(buildZip({ 'a.txt': text('a'), 'b.txt': text('b') }));
    expect([...container.entries()]).toHaveLength(2);
    expect([...container.entries()]).toHaveLength(2);
  });

  it('reports unreadable archives as corrupt', () => {
    const junk = Buffer.concat([Buffer.from('PK\u0003\u0004', 'latin1'), Buffer.alloc(40, 7)]);
    const error = captureError(() => openZipContainer(junk));
    expect(error).toBeInstanceOf(InspectionError);
    expect(error).toMatchObject({ kind: 'CorruptContainer' });
  });

  it('reads archives with a launcher script prepended', () => {
    const launcher = text('#!/bin/sh\nexec java -jar "$0" "$@"\n');
    const container = openZipContainer(
      Buffer.concat([
        launcher,
        buildZip({ 'readme.txt': text('hello world'), 'b.txt': text('bee') }),
      ]),
    );
    const entries = [...container.entries()];

    expect(entries.map((entry) => [entry.name, entry.size])).toEqual([
      ['readme.txt', 11],
      ['b.txt', 3],
    ]);
    expect(entries.map((entry) => decode(container.read(entry)))).toEqual(['hello world', 'bee']);
  });

  it('reads stored entries', () => {
    const container = openZipContainer(buildZip({ 'raw.bin': [text('kept as is'), { level: 0 }] }));
    const [entry] = [...container.entries()];
    expect(decode(container.read(entry))).toBe('kept as is');
  });

  it('reads every entry of a large archive', () => {
    const files: Record<string, Uint8Array> = {};
    for (let position = 0; position < 5000; position += 1) {
      files[`entry-${position}.txt`] = text(String(position));
    }
    const container = openZipContainer(buildZip(files));

    const contents = [...container.entries()].map((entry) => decode(container.read(entry)));

    expect(contents).toHaveLength(5000);
    expect(contents[0]).toBe('0');
    expect(contents[4999]).toBe('4999');
  });

  it('reports a central directory outside the file as corrupt', () => {
    const archive = buildZip({ 'a.txt': text('a'), 'b.txt': text('b') });
    const error = captureError(() => openZipContainer(archive.subarray(10)));
    expect(error).toMatchObject({
      kind: 'CorruptContainer',
      message: 'Not a valid ZIP archive: Central directory lies outside the file',
    });
  });
});

describe('OLE container', () => {
  it('lists streams by their full storage path', () => {
    const container = openOleContainer(
      buildCompoundFile({ Data: text('payload'), 'Storage/Stream': text('nested') }),
    );
    const entries = [...container.entries()];
    const names = entries.map((entry) => entry.name).filter((name) => !name.includes('\u0001'));

    expect(names.sort()).toEqual(['Root Entry/Data', 'Root Entry/Storage/Stream']);
    expect(entries.every((entry) => entry.format === 'ole' && !entry.isDirectory)).toBe(true);
    expect(entries.map((entry) => entry.index)).toEqual(entries.map((_, position) => position));
    expect(entries.find((entry) => entry.name === 'Root Entry/Data')?.size).toBe(7);
  });

  it('never lists storages', () => {
    const container = openOleContainer(buildCompoundFile({ 'Storage/Stream': text('nested') }));
    const names = [...container.entries()].map((entry) => entry.name);
    expect(names).not.toContain('Root Entry/');
    expect(names).not.toContain('Root Entry/Storage/');
  });

  it('reads stream content', () => {
    const container = openOleContainer(buildCompoundFile({ 'Storage/Stream': text('nested') }));
    const stream = [...container.entries()].find(
      (entry) => entry.name === 'Root Entry/Storage/Stream',
    );
    if (!stream) throw new Error('stream not listed');
    expect(decode(container.read(stream))).toBe('nested');
  });

  it('reads empty streams as zero bytes', () => {
    const container = openOleContainer(buildCompoundFile({ Empty: new Uint8Array(0) }));
    const stream = [...container.entries()].find((entry) => entry.name === 'Root Entry/Empty');
    if (!stream) throw new Error('stream not listed');
    expect(stream.size).toBe(0);
    expect(container.read(stream).byteLength).toBe(0);
  });

  it('reports a truncated compound file as corrupt', () => {
    const magic = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);
    const error = captureError(() => openOleContainer(Buffer.concat([magic, Buffer.alloc(100)])));
    expect(error).toBeInstanceOf(InspectionError);
    expect(error).toMatchObject({ kind: 'CorruptContainer' });
  });

  it('skips streams whose path has an empty name component', () => {
    const compoundFile = createCompoundFile({ Data: text('payload'), Ghost: text('unnamed') });
    const ghost = compoundFile.FullPaths.indexOf('Root Entry/Ghost');
    expect(ghost).toBeGreaterThan(-1);
    compoundFile.FullPaths[ghost] = 'Root Entry//Ghost';

    const container = openCompoundFile(compoundFile);
    const entries = [...container.entries()].filter((entry) => !entry.name.includes('\u0001'));

    expect(entries.map((entry) => entry.name)).toEqual(['Root Entry/Data']);
    expect(decode(container.read(entries[0]))).toBe('payload');
  });
});

describe('isExtractableStreamPath', () => {
  it('accepts stream paths only', () => {
    expect(isExtractableStreamPath('Root Entry/Data')).toBe(true);
    expect(isExtractableStreamPath('Root Entry/')).toBe(false);
    expect(isExtractableStreamPath('Root Entry/Storage/')).toBe(false);
  });

  it('rejects paths with an empty name component', () => {
    expect(isExtractableStreamPath('Root Entry//Data')).toBe(false);
    expect(isExtractableStreamPath('/Data')).toBe(false);
    expect(isExtractableStreamPath('')).toBe(false);
  });
});

describe('openContainer', () => {
  it('dispatches on the detected format', () => {
    expect(openContainer(buildZip({ 'a.txt': text('a') }), 'zip').format).toBe('zip');
    expect(openContainer(buildCompoundFile({ Data: text('d') }), 'ole').format).toBe('ole');
  });
});
