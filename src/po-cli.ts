#!/usr/bin/env node
/**
 * po — move new photos into a content-addressed library
 *
 * Usage:
 *   po [import] [options]        - Hash inputs, move new files, update the index
 *   po query <glob> [options]    - Print indexed entries whose path matches
 */

import { existsSync, realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { config } from 'dotenv';
import { ConfigManager, DEFAULT_CONFIG_PATH } from './config.js';
import type { AppConfig, ConfigOverrides } from './config.js';
import { ensureDirectory, scanInputs } from './input-scanner.js';
import { Library } from './library.js';
import { ValidationError } from './library-errors.js';
import { formatEntry, queryEntries } from './library-query.js';
import { AppError, handleError, isLogLevel, logger } from './logger.js';
import type { Logger } from './logger.js';
import { parseSortPolicy } from './sort-policy.js';
import type { LibraryEntry } from './types.js';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export interface CliArgs {
  command: 'import' | 'query' | 'help';
  pattern?: string;
  configPath: string;
  overrides: ConfigOverrides;
}

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliArgs {
  const result: CliArgs = {
    command: 'import',
    configPath: env.PO_CONFIG || DEFAULT_CONFIG_PATH,
    overrides: {},
  };
  const inputs: string[] = [];
  const extensions: string[] = [];
  let commandSeen = false;

  const args = [...argv];
  while (args.length > 0) {
    const arg = args.shift() as string;
    switch (arg) {
      case '--config':
        result.configPath = takeValue(args, arg);
        break;
      case '--input':
        inputs.push(resolve(takeValue(args, arg)));
        break;
      case '--output':
        result.overrides.output = resolve(takeValue(args, arg));
        break;
      case '--extension':
        extensions.push(takeValue(args, arg));
        break;
      case '--sort-policy':
        result.overrides.sortPolicy = parseSortPolicy(takeValue(args, arg));
        break;
      case '--log-level': {
        const level = takeValue(args, arg);
        if (!isLogLevel(level)) {
          throw new ValidationError(`Invalid log level: ${level}`);
        }
        result.overrides.logLevel = level;
        break;
      }
      case '-h':
      case '--help':
        result.command = 'help';
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ValidationError(`Unknown option: ${arg}`);
        }
        if (!commandSeen && (arg === 'import' || arg === 'query')) {
          commandSeen = true;
          if (result.command !== 'help') result.command = arg;
        } else if (result.command === 'query' && result.pattern === undefined) {
          result.pattern = arg;
        } else {
          throw new ValidationError(`Unexpected argument: ${arg}`);
        }
        break;
    }
  }

  if (inputs.length > 0) result.overrides.inputs = inputs;
  if (extensions.length > 0) result.overrides.extensions = extensions;

  if (result.command === 'query' && result.pattern === undefined) {
    throw new ValidationError('query needs a glob pattern, e.g. po query "2024/**"');
  }

  return result;
}

function printUsage(): void {
  console.log(`
Usage:
  po [import] [options]
  po query <glob> [options]

Options:
  --config PATH          Config file, YAML or JSON (default: ${DEFAULT_CONFIG_PATH} or $PO_CONFIG)
  --input DIR            Input directory, repeatable; not searched recursively
  --output DIR           Library output root
  --extension EXT        Extension to capture, repeatable (e.g. jpg)
  --sort-policy POLICY   move-to-root | date
  --log-level LEVEL      debug | info | warn | error
`);
}

// ============================================================================
// Commands
// ============================================================================

export interface ImportSummary {
  captured: number;
  newFiles: number;
  placed: LibraryEntry[];
}

function requireOutput(appConfig: AppConfig): string {
  if (!appConfig.output) {
    throw new AppError('An output root is required', 'CONFIG_ERROR');
  }
  return appConfig.output;
}

export function runImport(appConfig: AppConfig, log: Logger = logger): ImportSummary {
  const output = requireOutput(appConfig);

  for (const input of appConfig.inputs) {
    ensureDirectory(input, log);
  }
  ensureDirectory(output, log);

  log.info('Searching inputs for files', undefined, 'import');
  const captured = scanInputs(appConfig.inputs, appConfig.extensions, log);

  const library = Library.load(output, { logger: log });
  const newFiles = library.checkNew(captured);
  log.info(`Got ${newFiles.length} new files`, undefined, 'import');

  let placed: LibraryEntry[];
  try {
    placed = library.place(newFiles, appConfig.sortPolicy);
  } catch (error) {
    log.warn('Sorting stopped early, recording the files already moved', undefined, 'import');
    try {
      library.persist();
    } catch (persistError) {
      log.error(
        'Failed to record the files already moved',
        persistError instanceof Error ? persistError : undefined,
        'import'
      );
    }
    throw error;
  }

  library.persist();
  log.info(`Imported ${placed.length} files into ${output}`, undefined, 'import');

  return { captured: captured.length, newFiles: newFiles.length, placed };
}

export function runQuery(
  appConfig: AppConfig,
  pattern: string,
  write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
  log: Logger = logger
): LibraryEntry[] {
  const library = Library.load(requireOutput(appConfig), { logger: log });
  const matches = queryEntries(library.entries(), pattern);
  for (const entry of matches) {
    write(formatEntry(entry));
  }
  log.debug(`${matches.length} of ${library.size} entries match ${pattern}`, undefined, 'query');
  return matches;
}

export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    const args = parseArgs(argv);
    if (args.command === 'help') {
      printUsage();
      return 0;
    }

    if (args.overrides.logLevel) {
      logger.setMinLevel(args.overrides.logLevel);
    }

    const manager = new ConfigManager(args.configPath, args.overrides);
    const { valid, errors } = manager.validate({ requireInputs: args.command === 'import' });
    if (!valid) {
      for (const message of errors) {
        logger.error(message, undefined, 'po');
      }
      return 1;
    }

    const logLevel = manager.get('logLevel');
    if (logLevel) {
      logger.setMinLevel(logLevel);
    }
    const appConfig = manager.getAll();
    logger.debug('Config loaded', { config: appConfig }, 'po');

    if (args.command === 'query' && args.pattern !== undefined) {
      runQuery(appConfig, args.pattern);
    } else {
      runImport(appConfig);
    }
    return 0;
  } catch (error) {
    handleError(error, 'po');
    return 1;
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedArg = process.argv[1];
const invokedScriptPath = invokedArg && existsSync(invokedArg) ? realpathSync(resolve(invokedArg)) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  config();
  if (isLogLevel(process.env.LOG_LEVEL)) {
    logger.setMinLevel(process.env.LOG_LEVEL);
  }
  process.exitCode = main();
}
