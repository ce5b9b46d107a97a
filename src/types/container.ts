export type ContainerFormat = 'zip' | 'ole' | 'unknown';

export type SupportedContainerFormat = Exclude<ContainerFormat, 'unknown'>;

export type FormatDetectionMethod =
  | 'central-directory'
  | 'compound-file-header'
  | 'local-header-probe'
  | 'none';

export interface FormatDetection {
  format: ContainerFormat;
  method: FormatDetectionMethod;
}

export interface ContainerEntry {
  /** Path inside the container, as stored; may contain separators */
  name: string;
  /** Uncompressed length in bytes */
  size: number;
  /** MIME type guessed from the name */
  mediaType: string;
  /** Position in the container's directory listing */
  index: number;
  /** ZIP directory records carry no content */
  isDirectory: boolean;
  format: SupportedContainerFormat;
}

export interface OpenedContainer {
  format: SupportedContainerFormat;
  entries(): Generator<ContainerEntry, void, undefined>;
  read(entry: ContainerEntry): Uint8Array;
}

export type InspectionErrorKind =
  | 'NotFound'
  | 'UnsupportedFormat'
  | 'CorruptContainer'
  | 'EntryIOError'
  | 'OutputUnavailable';

export interface InspectionFailure {
  kind: InspectionErrorKind;
  message: string;
}

export type ExtractionStatus = 'succeeded' | 'failed' | 'skipped';

export interface ExtractionResult {
  name: string;
  status: ExtractionStatus;
  /** Destination on disk; empty when the entry has no usable file name */
  targetPath: string;
  bytesWritten?: number;
  error?: InspectionFailure;
  message?: string;
}

export interface InspectionReport {
  ok: boolean;
  filePath: string;
  format: ContainerFormat;
  entries: ContainerEntry[];
  results: ExtractionResult[];
  error?: InspectionFailure;
}
