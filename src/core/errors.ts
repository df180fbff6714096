/**
 * Error and warning types shared across the build pipeline.
 *
 * Export errors are fatal and abort a run before anything is written.
 * Page errors fail one page only. Warnings are plain records carried in
 * conversion results and the build report.
 */

export type BuildErrorCode =
  | 'EXPORT_FORMAT'
  | 'EXPORT_IO'
  | 'PAGE_CONVERSION'
  | 'INVALID_SETTINGS';

export abstract class BuildError extends Error {
  abstract readonly code: BuildErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExportFormatError extends BuildError {
  readonly code = 'EXPORT_FORMAT';
}

export class ExportIOError extends BuildError {
  readonly code = 'EXPORT_IO';

  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class PageConversionError extends BuildError {
  readonly code = 'PAGE_CONVERSION';

  constructor(readonly pageId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SettingsError extends BuildError {
  readonly code = 'INVALID_SETTINGS';
}

export function isFatalExportError(error: unknown): error is ExportFormatError | ExportIOError {
  return error instanceof ExportFormatError || error instanceof ExportIOError;
}

// fs errors come from Node's own realm, so `instanceof Error` is not reliable for them
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export type WarningCode =
  | 'unresolved-reference'
  | 'cache-corruption'
  | 'table-shape'
  | 'attachment-copy';

export interface BuildWarning {
  code: WarningCode;
  message: string;
  pageId?: string;
}

export function unresolvedReference(message: string, pageId?: string): BuildWarning {
  return { code: 'unresolved-reference', message, pageId };
}

export function cacheCorruption(message: string): BuildWarning {
  return { code: 'cache-corruption', message };
}
