import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import type { DocumentFormat } from '../kernel/types.js';

export type DocumentFileErrorCode = 'FILE_FORMAT_UNSUPPORTED' | 'FILE_READ_FAILED';

export class DocumentFileError extends Error {
  readonly code: DocumentFileErrorCode;
  readonly filePath: string;

  constructor(code: DocumentFileErrorCode, filePath: string, message: string, cause?: unknown) {
    super(message);
    this.name = 'DocumentFileError';
    this.code = code;
    this.filePath = filePath;
    if (cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = cause;
    }
  }
}

export interface DocumentFile {
  readonly path: string;
  readonly format: DocumentFormat;
  readonly text: string;
}

export function documentFormatForPath(filePath: string): DocumentFormat {
  const extension = extname(filePath).toLowerCase();
  if (extension === '.json') {
    return 'json';
  }
  if (extension === '.yaml' || extension === '.yml') {
    return 'yaml';
  }
  throw new DocumentFileError(
    'FILE_FORMAT_UNSUPPORTED',
    filePath,
    `Unsupported zone config format "${extension || '(none)'}". Use .json, .yaml, or .yml files.`,
  );
}

export function readDocumentFile(filePath: string): DocumentFile {
  const format = documentFormatForPath(filePath);
  try {
    return { path: filePath, format, text: readFileSync(filePath, 'utf8') };
  } catch (error) {
    throw new DocumentFileError(
      'FILE_READ_FAILED',
      filePath,
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }
}

export function isDocumentFileError(error: unknown): error is DocumentFileError {
  return error instanceof DocumentFileError;
}
