/**
 * Error types raised by the library core
 */

import { AppError } from './logger.js';

export class LibraryIOError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(`${message}: ${path}${describeCause(cause)}`, 'IO_ERROR', { path });
    this.name = 'LibraryIOError';
    this.cause = cause;
  }
}

export class HashFormatError extends AppError {
  constructor(message: string) {
    super(message, 'HASH_FORMAT_ERROR');
    this.name = 'HashFormatError';
  }
}

export class CorruptIndexError extends AppError {
  constructor(
    message: string,
    public readonly indexPath?: string,
    public readonly line?: number
  ) {
    super(message, 'CORRUPT_INDEX', { indexPath, line });
    this.name = 'CorruptIndexError';
  }
}

export class UnsupportedVersionError extends AppError {
  constructor(
    public readonly version: number,
    public readonly supported: number
  ) {
    super(
      `Index version ${version} is newer than the supported version ${supported}`,
      'UNSUPPORTED_INDEX_VERSION',
      { version, supported }
    );
    this.name = 'UnsupportedVersionError';
  }
}

export class MetadataError extends AppError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`${message}: ${path}`, 'METADATA_ERROR', { path });
    this.name = 'MetadataError';
  }
}

export class DestinationExistsError extends AppError {
  constructor(
    public readonly source: string,
    public readonly destination: string
  ) {
    super(
      `Refusing to overwrite ${destination} with ${source}`,
      'DESTINATION_EXISTS',
      { source, destination }
    );
    this.name = 'DestinationExistsError';
  }
}

export class LibraryClosedError extends AppError {
  constructor(operation: string) {
    super(`Cannot ${operation}: library has already been persisted`, 'LIBRARY_CLOSED');
    this.name = 'LibraryClosedError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return ` (${cause.message})`;
  if (cause === undefined) return '';
  return ` (${String(cause)})`;
}
