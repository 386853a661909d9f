/**
 * Core types for the photo library
 */

import type { ContentHash } from './content-hash.js';

/**
 * One file known to the library. `path` is relative to the output root and
 * always uses `/` separators.
 */
export interface LibraryEntry {
  readonly hash: ContentHash;
  readonly path: string;
}

/**
 * A candidate that passed the dedup check and is waiting to be placed
 */
export interface UnsortedFile {
  readonly path: string;
  readonly hash: ContentHash;
}

export type CreationTimeReader = (filePath: string) => Date;
