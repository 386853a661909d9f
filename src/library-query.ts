/**
 * Glob lookups over loaded library entries
 */

import micromatch from 'micromatch';
import type { LibraryEntry } from './types.js';

export function queryEntries(entries: readonly LibraryEntry[], pattern: string): LibraryEntry[] {
  const isMatch = micromatch.matcher(pattern, { dot: true });
  return entries.filter((entry) => isMatch(entry.path));
}

export function formatEntry(entry: LibraryEntry): string {
  return `${entry.hash.encode()} ${entry.path}`;
}
