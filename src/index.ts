/**
 * Public API of the photo library
 */

export { ContentHash } from './content-hash.js';
export { Library, META_DIR_NAME, moveFile } from './library.js';
export type { LibraryOptions } from './library.js';
export {
  CONTENT_SENTINEL,
  CURRENT_INDEX_VERSION,
  loadIndex,
  parseIndex,
  serializeIndex,
  writeIndex,
} from './library-index.js';
export {
  CorruptIndexError,
  DestinationExistsError,
  HashFormatError,
  LibraryClosedError,
  LibraryIOError,
  MetadataError,
  UnsupportedVersionError,
  ValidationError,
} from './library-errors.js';
export { destinationFor, parseSortPolicy, readCreationTime, SORT_POLICIES } from './sort-policy.js';
export type { SortPolicy } from './sort-policy.js';
export { formatEntry, queryEntries } from './library-query.js';
export { ensureDirectory, scanInput, scanInputs } from './input-scanner.js';
export { ConfigManager, DEFAULT_CONFIG } from './config.js';
export type { AppConfig, ConfigOverrides } from './config.js';
export { AppError, Logger, logger } from './logger.js';
export type { LogLevel } from './logger.js';
export type { CreationTimeReader, LibraryEntry, UnsortedFile } from './types.js';
