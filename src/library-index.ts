/**
 * On-disk index of the library: `<output>/_pometa/hashes`
 *
 * Layout:
 *   <version>
 *   --START-CONTENT--
 *   <64 hex chars> <relative path>
 *
 * The path may contain spaces, so each entry line is split at the fixed hash
 * length rather than at the first whitespace.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ContentHash } from './content-hash.js';
import {
  CorruptIndexError,
  HashFormatError,
  LibraryIOError,
  UnsupportedVersionError,
} from './library-errors.js';
import type { LibraryEntry } from './types.js';

export const CURRENT_INDEX_VERSION = 1;
export const CONTENT_SENTINEL = '--START-CONTENT--';
export const INDEX_FILE_NAME = 'hashes';

const VERSION_PATTERN = /^\d+$/;

export function indexPath(metaRoot: string): string {
  return join(metaRoot, INDEX_FILE_NAME);
}

export function parseIndex(text: string, source?: string): LibraryEntry[] {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const versionLine = lines[0];
  if (versionLine === undefined || !VERSION_PATTERN.test(versionLine)) {
    throw new CorruptIndexError(
      `Index version line is missing or not an unsigned integer`,
      source,
      1
    );
  }

  const version = Number(versionLine);
  if (version > CURRENT_INDEX_VERSION) {
    throw new UnsupportedVersionError(version, CURRENT_INDEX_VERSION);
  }

  if (lines[1] !== CONTENT_SENTINEL) {
    throw new CorruptIndexError(`Index is missing the ${CONTENT_SENTINEL} line`, source, 2);
  }

  const entries: LibraryEntry[] = [];
  const seen = new Set<string>();

  for (let i = 2; i < lines.length; i += 1) {
    const entry = parseEntryLine(lines[i], source, i + 1);
    const key = entry.hash.encode();
    if (seen.has(key)) {
      throw new CorruptIndexError(`Duplicate hash ${key} in index`, source, i + 1);
    }
    seen.add(key);
    entries.push(entry);
  }

  return entries;
}

function parseEntryLine(line: string, source: string | undefined, lineNumber: number): LibraryEntry {
  const hashText = line.slice(0, ContentHash.HEX_LENGTH);
  let hash: ContentHash;
  try {
    hash = ContentHash.decode(hashText);
  } catch (error) {
    if (error instanceof HashFormatError) {
      throw new CorruptIndexError(`Malformed entry hash: ${error.message}`, source, lineNumber);
    }
    throw error;
  }

  if (line.charAt(ContentHash.HEX_LENGTH) !== ' ') {
    throw new CorruptIndexError('Entry hash is not followed by a space', source, lineNumber);
  }

  const path = line.slice(ContentHash.HEX_LENGTH + 1);
  if (path.length === 0) {
    throw new CorruptIndexError('Entry has an empty path', source, lineNumber);
  }

  return { hash, path };
}

/**
 * Check the invariants a serialized index must satisfy before it may replace
 * the file on disk.
 */
export function validateEntries(entries: readonly LibraryEntry[]): void {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    const key = entry.hash.encode();
    if (seen.has(key)) {
      throw new CorruptIndexError(`Refusing to write duplicate hash ${key} (entry ${index + 1})`);
    }
    seen.add(key);

    if (entry.path.length === 0) {
      throw new CorruptIndexError(`Refusing to write an empty path (entry ${index + 1})`);
    }
    assertStorablePath(entry.path);
  });
}

/**
 * Throw unless `path` fits on a single index line.
 */
export function assertStorablePath(path: string): void {
  if (/[\r\n]/.test(path)) {
    throw new CorruptIndexError(`Refusing to write a path containing a line break: ${JSON.stringify(path)}`);
  }
}

export function serializeIndex(entries: readonly LibraryEntry[]): string {
  validateEntries(entries);
  const lines = [String(CURRENT_INDEX_VERSION), CONTENT_SENTINEL];
  for (const entry of entries) {
    lines.push(`${entry.hash.encode()} ${entry.path}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Load the index below `metaRoot`. A missing index is created empty.
 */
export function loadIndex(metaRoot: string): LibraryEntry[] {
  const filePath = indexPath(metaRoot);

  if (!existsSync(filePath)) {
    try {
      mkdirSync(metaRoot, { recursive: true });
      writeFileSync(filePath, serializeIndex([]), 'utf-8');
    } catch (error) {
      throw new LibraryIOError('Failed to create library index', filePath, error);
    }
    return [];
  }

  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new LibraryIOError('Failed to read library index', filePath, error);
  }

  return parseIndex(text, filePath);
}

/**
 * Replace the index below `metaRoot` with `entries`. The content is written
 * to `hashes.tmp` first and renamed over the index.
 */
export function writeIndex(metaRoot: string, entries: readonly LibraryEntry[]): void {
  const content = serializeIndex(entries);
  const filePath = indexPath(metaRoot);

  if (!existsSync(metaRoot)) {
    throw new LibraryIOError('Library metadata directory does not exist', metaRoot);
  }

  const tempPath = `${filePath}.tmp`;
  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, filePath);
  } catch (error) {
    throw new LibraryIOError('Failed to write library index', filePath, error);
  }
}
