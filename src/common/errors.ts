import type { InspectionErrorKind, InspectionFailure } from '../types/container';

export class InspectionError extends Error {
  readonly kind: InspectionErrorKind;

  constructor(kind: InspectionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InspectionError';
    this.kind = kind;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toFailure = (
  error: unknown,
  fallbackKind: InspectionErrorKind,
): InspectionFailure => {
  if (error instanceof InspectionError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: fallbackKind, message: describeError(error) };
};
