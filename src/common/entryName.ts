import mime from 'mime-types';
import type { SupportedContainerFormat } from '../types/container';

export const DEFAULT_MEDIA_TYPE = 'application/octet-stream';

const controlCharacters = /[\u0000-\u001f\u007f]/g;
const reservedCharacters = /[<>:"|?*]/g;
const trailingDotsAndSpaces = /[. ]+$/;
const segmentSeparators = /[\\/]/;
const reservedNames = new Set(
  [
    'CON',
    'PRN',
    'AUX',
    'NUL',
    'COM1',
    'COM2',
    'COM3',
    'COM4',
    'COM5',
    'COM6',
    'COM7',
    'COM8',
    'COM9',
    'LPT1',
    'LPT2',
    'LPT3',
    'LPT4',
    'LPT5',
    'LPT6',
    'LPT7',
    'LPT8',
    'LPT9',
  ].map((name) => name.toLowerCase()),
);

export const isReservedName = (name: string) =>
  reservedNames.has(name.split('.')[0].trim().toLowerCase());

export const finalSegment = (name: string): string => {
  const segments = name.split(segmentSeparators);
  return segments[segments.length - 1] ?? '';
};

/**
 * Flat file name for an entry, or `null` when nothing usable is left.
 *
 * OLE stream paths have their separators folded into `_` first, so
 * `Root Entry/Data` becomes `Root Entry_Data`; everything else keeps only
 * the last path segment, which drops `..` components and absolute roots.
 */
export const toSafeFileName = (
  name: string,
  format: SupportedContainerFormat,
): string | null => {
  const flattened = format === 'ole' ? name.replace(/\//g, '_') : name;
  const cleaned = finalSegment(flattened)
    .replace(controlCharacters, '')
    .replace(reservedCharacters, '_')
    .replace(trailingDotsAndSpaces, '');

  if (!cleaned) {
    return null;
  }
  return isReservedName(cleaned) ? `_${cleaned}` : cleaned;
};

export const guessMediaType = (name: string): string =>
  mime.lookup(name) || DEFAULT_MEDIA_TYPE;
