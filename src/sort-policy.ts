/**
 * Sort policies decide where an accepted file lands below the output root
 */

import { statSync } from 'fs';
import type { Stats } from 'fs';
import { basename, posix } from 'path';
import { LibraryIOError, MetadataError, ValidationError } from './library-errors.js';
import type { CreationTimeReader } from './types.js';

export type SortPolicy = 'move-to-root' | 'date';

export const SORT_POLICIES: readonly SortPolicy[] = ['move-to-root', 'date'];

const POLICY_ALIASES = new Map<string, SortPolicy>([
  ['move-to-root', 'move-to-root'],
  ['movetoroot', 'move-to-root'],
  ['root', 'move-to-root'],
  ['none', 'move-to-root'],
  ['date', 'date'],
]);

export function parseSortPolicy(value: string): SortPolicy {
  const policy = POLICY_ALIASES.get(value.trim().toLowerCase());
  if (!policy) {
    throw new ValidationError(
      `Unknown sort policy "${value}" (expected one of: ${SORT_POLICIES.join(', ')})`
    );
  }
  return policy;
}

export function creationTimeFromStats(
  stats: Pick<Stats, 'birthtime' | 'birthtimeMs'>,
  filePath: string
): Date {
  // Filesystems without birth time support report the epoch.
  if (!Number.isFinite(stats.birthtimeMs) || stats.birthtimeMs <= 0) {
    throw new MetadataError('Creation time is not available', filePath);
  }
  return stats.birthtime;
}

export const readCreationTime: CreationTimeReader = (filePath) => {
  let stats: Stats;
  try {
    stats = statSync(filePath);
  } catch (error) {
    throw new LibraryIOError('Failed to read file metadata', filePath, error);
  }
  return creationTimeFromStats(stats, filePath);
};

/**
 * Relative destination of `sourcePath` under `policy`, using `/` separators.
 * Date components are local time and not zero padded.
 */
export function destinationFor(
  policy: SortPolicy,
  sourcePath: string,
  creationTime: CreationTimeReader = readCreationTime
): string {
  const name = basename(sourcePath);

  switch (policy) {
    case 'move-to-root':
      return name;
    case 'date': {
      const created = creationTime(sourcePath);
      return posix.join(
        String(created.getFullYear()),
        String(created.getMonth() + 1),
        String(created.getDate()),
        name
      );
    }
  }
}
