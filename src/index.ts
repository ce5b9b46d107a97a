export { detectFormat, detectFormatFromBytes } from './main/formatDetector';
export { openContainer } from './main/containers';
export { extractEntry } from './main/extractor';
export { inspectContainer, listEntries, processContainer } from './main/inspector';
export type { InspectOptions } from './main/inspector';
export { guessMediaType, toSafeFileName } from './common/entryName';
export { InspectionError } from './common/errors';
export { createConsoleLogger, silentLogger } from './utils/inspectorLogger';
export type { InspectorLogger, ConsoleLoggerOptions, LogLevel } from './utils/inspectorLogger';
export type * from './types/container';
