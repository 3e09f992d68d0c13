/**
 * args.ts - Command line parsing shared by the wordtrie and scrabble commands
 */

import type { Compression } from '../wordlist.js';

/** Where a command writes: stdout-like `log`, stderr-like `error` */
export interface Output {
  log(message?: string): void;
  error(message?: string): void;
}

export interface ParsedArgs {
  positionals: string[];
  help: boolean;
  verbose: boolean;
  /** Unset means detect from the file extension */
  compression?: Compression;
}

export class UsageError extends Error {
  override readonly name = 'UsageError';
}

const COMPRESSION_FLAGS = new Map<string, Compression>([
  ['--plain', 'none'],
  ['--gzip', 'gzip'],
  ['--brotli', 'brotli'],
]);

/**
 * Split flags from positional arguments.
 *
 * @throws UsageError for an unknown flag or conflicting compression flags
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], help: false, verbose: false };

  for (const arg of args) {
    const compression = COMPRESSION_FLAGS.get(arg);
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--verbose' || arg === '-v') {
      parsed.verbose = true;
    } else if (compression !== undefined) {
      if (parsed.compression !== undefined && parsed.compression !== compression) {
        throw new UsageError(`Conflicting compression flags: ${arg}`);
      }
      parsed.compression = compression;
    } else if (arg.startsWith('-') && arg.length > 1) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      parsed.positionals.push(arg);
    }
  }

  return parsed;
}
