/**
 * Content-addressed photo library
 *
 * A library is an output root plus the index of every file that has been
 * moved into it. Files are identified by SHA-256 content hash, so a
 * candidate is new only when no indexed file has the same bytes.
 */

import { constants, copyFileSync, existsSync, mkdirSync, renameSync, unlinkSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { ContentHash } from './content-hash.js';
import { DestinationExistsError, LibraryClosedError, LibraryIOError } from './library-errors.js';
import { assertStorablePath, loadIndex, writeIndex } from './library-index.js';
import type { Logger } from './logger.js';
import { destinationFor, readCreationTime } from './sort-policy.js';
import type { SortPolicy } from './sort-policy.js';
import type { CreationTimeReader, LibraryEntry, UnsortedFile } from './types.js';

export const META_DIR_NAME = '_pometa';

export interface LibraryOptions {
  /**
   * Receives diagnostics; the library logs nothing without one
   */
  logger?: Logger;
  /**
   * Source of creation timestamps for the `date` policy
   */
  readCreationTime?: CreationTimeReader;
}

const LOG_CONTEXT = 'Library';

export class Library {
  readonly outputRoot: string;
  readonly metaRoot: string;
  private readonly items: LibraryEntry[];
  private readonly byHash = new Map<string, LibraryEntry>();
  private readonly log?: Logger;
  private readonly creationTime: CreationTimeReader;
  private closed = false;

  private constructor(
    outputRoot: string,
    entries: LibraryEntry[],
    options: LibraryOptions
  ) {
    this.outputRoot = outputRoot;
    this.metaRoot = join(outputRoot, META_DIR_NAME);
    this.items = entries;
    for (const entry of entries) {
      this.byHash.set(entry.hash.encode(), entry);
    }
    this.log = options.logger;
    this.creationTime = options.readCreationTime ?? readCreationTime;
  }

  /**
   * Load the library rooted at `outputRoot`, bootstrapping an empty index
   * when there is none yet.
   */
  static load(outputRoot: string, options: LibraryOptions = {}): Library {
    const root = resolve(outputRoot);
    const entries = loadIndex(join(root, META_DIR_NAME));
    options.logger?.debug(
      `Loaded library with ${entries.length} entries`,
      { outputRoot: root },
      LOG_CONTEXT
    );
    return new Library(root, entries, options);
  }

  get size(): number {
    return this.items.length;
  }

  entries(): readonly LibraryEntry[] {
    return this.items;
  }

  has(hash: ContentHash): boolean {
    return this.byHash.has(hash.encode());
  }

  /**
   * Hash every candidate and return the ones whose content is not yet in the
   * library. A content seen twice in `paths` is returned once.
   */
  checkNew(paths: readonly string[]): UnsortedFile[] {
    const newFiles: UnsortedFile[] = [];
    const batch = new Set<string>();

    for (const path of paths) {
      const hash = ContentHash.fromFile(path);
      const key = hash.encode();

      if (this.byHash.has(key)) {
        this.log?.debug(`File already in library: ${path} (${key})`, undefined, LOG_CONTEXT);
        continue;
      }
      if (batch.has(key)) {
        this.log?.debug(`Duplicate of another new file: ${path} (${key})`, undefined, LOG_CONTEXT);
        continue;
      }

      this.log?.debug(`Found new file: ${path} (${key})`, undefined, LOG_CONTEXT);
      batch.add(key);
      newFiles.push({ path, hash });
    }

    return newFiles;
  }

  /**
   * Move each file into the output root and record it. Stops at the first
   * failure; files before it stay moved and recorded.
   */
  place(files: readonly UnsortedFile[], policy: SortPolicy): LibraryEntry[] {
    this.assertOpen('place files');
    this.log?.info(`Sorting ${files.length} files`, { policy }, LOG_CONTEXT);

    const placed: LibraryEntry[] = [];
    for (const file of files) {
      if (this.has(file.hash)) {
        this.log?.debug(`Skipping already indexed file: ${file.path}`, undefined, LOG_CONTEXT);
        continue;
      }

      const relativePath = destinationFor(policy, file.path, this.creationTime);
      assertStorablePath(relativePath);
      const destination = join(this.outputRoot, ...relativePath.split('/'));

      if (existsSync(destination)) {
        throw new DestinationExistsError(file.path, destination);
      }

      const parent = dirname(destination);
      if (parent !== this.outputRoot) {
        try {
          mkdirSync(parent, { recursive: true });
        } catch (error) {
          throw new LibraryIOError('Failed to create directory', parent, error);
        }
      }

      this.log?.info(`Sorting ${file.path} into ${destination}`, undefined, LOG_CONTEXT);
      moveFile(file.path, destination);

      const entry: LibraryEntry = { hash: file.hash, path: relativePath };
      this.items.push(entry);
      this.byHash.set(file.hash.encode(), entry);
      placed.push(entry);
    }

    return placed;
  }

  /**
   * Write the full entry set to disk. The library cannot be changed afterwards.
   */
  persist(): void {
    this.assertOpen('persist');
    writeIndex(this.metaRoot, this.items);
    this.closed = true;
    this.log?.debug(`Persisted ${this.items.length} entries`, { metaRoot: this.metaRoot }, LOG_CONTEXT);
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new LibraryClosedError(operation);
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface MoveOperations {
  renameSync(source: string, destination: string): void;
  copyFileSync(source: string, destination: string, mode: number): void;
  unlinkSync(path: string): void;
}

const fsMoveOperations: MoveOperations = { renameSync, copyFileSync, unlinkSync };

/**
 * Rename `source` to `destination`, copying across filesystems when a
 * rename is not possible. A failed copy leaves nothing at `destination`.
 */
export function moveFile(
  source: string,
  destination: string,
  ops: MoveOperations = fsMoveOperations
): void {
  try {
    ops.renameSync(source, destination);
    return;
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') {
      throw new LibraryIOError(`Failed to move file to ${destination}`, source, error);
    }
  }

  try {
    ops.copyFileSync(source, destination, constants.COPYFILE_EXCL);
  } catch (error) {
    throw new LibraryIOError(`Failed to copy file to ${destination}`, source, error);
  }

  try {
    ops.unlinkSync(source);
  } catch (error) {
    try {
      ops.unlinkSync(destination);
    } catch (cleanupError) {
      throw new LibraryIOError(
        'Failed to remove the source after copying, and the copy could not be removed',
        destination,
        cleanupError
      );
    }
    throw new LibraryIOError(`Failed to remove the source after copying to ${destination}`, source, error);
  }
}
