/**
 * Discovers candidate files in the configured input directories
 */

import { existsSync, mkdirSync } from 'fs';
import { extname } from 'path';
import glob from 'fast-glob';
import { LibraryIOError } from './library-errors.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';

const LOG_CONTEXT = 'InputScanner';

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, '').toLowerCase();
}

/**
 * Create `dirPath` (and its parents) when it does not exist yet
 */
export function ensureDirectory(dirPath: string, log: Logger = defaultLogger): void {
  log.debug(`Ensuring path ${dirPath}`, undefined, LOG_CONTEXT);
  if (existsSync(dirPath)) return;

  log.debug(`Path did not exist, creating it: ${dirPath}`, undefined, LOG_CONTEXT);
  try {
    mkdirSync(dirPath, { recursive: true });
  } catch (error) {
    throw new LibraryIOError('Failed to create directory', dirPath, error);
  }
}

/**
 * List the files directly inside `input` whose extension is one of
 * `extensions`. Subdirectories are not searched.
 */
export function scanInput(
  input: string,
  extensions: readonly string[],
  log: Logger = defaultLogger
): string[] {
  log.info(`Searching input ${input}`, undefined, LOG_CONTEXT);
  const wanted = new Set(extensions.map(normalizeExtension).filter(Boolean));

  let files: string[];
  try {
    files = glob.sync('*', {
      cwd: input,
      absolute: true,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: false,
    });
  } catch (error) {
    throw new LibraryIOError('Failed to list input directory', input, error);
  }

  const captured: string[] = [];
  for (const file of files.sort()) {
    const ext = normalizeExtension(extname(file));
    if (!ext) {
      log.debug(`No extension for file ${file}`, undefined, LOG_CONTEXT);
    } else if (wanted.has(ext)) {
      log.debug(`Capturing file ${file}`, undefined, LOG_CONTEXT);
      captured.push(file);
    } else {
      log.debug(`Ignoring file ${file}`, undefined, LOG_CONTEXT);
    }
  }

  log.debug(`Captured ${captured.length} files`, { input }, LOG_CONTEXT);
  return captured;
}

export function scanInputs(
  inputs: readonly string[],
  extensions: readonly string[],
  log: Logger = defaultLogger
): string[] {
  const captured = inputs.flatMap((input) => scanInput(input, extensions, log));
  log.info(`Captured ${captured.length} files from ${inputs.length} inputs`, undefined, LOG_CONTEXT);
  return captured;
}
