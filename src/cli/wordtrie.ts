/**
 * wordtrie.ts - Print every word in a word list matching a pattern
 *
 * Usage:
 *   wordtrie <pattern> <trie_file>[.gz|.br] [--gzip|--brotli|--plain] [--verbose]
 *
 * Example:
 *   wordtrie W..D words.txt.gz
 */

import { isPattern } from '../trie/index.js';
import { type Output, type ParsedArgs, UsageError, parseArgs } from './args.js';
import { loadForCommand } from './load.js';

export const USAGE = [
  'Usage: wordtrie <pattern> <trie_file>[.gz]',
  'Example: wordtrie W..D words.txt.gz',
];

export const PATTERN_ERROR = 'Error: Pattern must be capitalized A-Z and . only.';

function printHelp(io: Output): void {
  io.log(`
wordtrie - Find words matching a pattern

Usage:
  wordtrie <pattern> <trie_file> [options]

Arguments:
  pattern     Letters A-Z, with '.' matching any single letter
              Matches have exactly the pattern's length
  trie_file   Word list, one word per line (.gz and .br are decompressed)

Options:
  --gzip      Read the word list as gzip regardless of extension
  --brotli    Read the word list as brotli regardless of extension
  --plain     Read the word list as plain text regardless of extension
  --verbose   Print load time and trie statistics to stderr
  --help      Show this help

Examples:
  wordtrie W..D words.txt.gz
  wordtrie C.T. words.txt --verbose
`);
}

/**
 * Run the command.
 *
 * @returns Process exit code
 */
export async function run(args: string[], io: Output = console): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (err) {
    if (err instanceof UsageError) {
      io.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (parsed.help) {
    printHelp(io);
    return 0;
  }

  if (parsed.positionals.length !== 2) {
    for (const line of USAGE) io.log(line);
    return 0;
  }

  const [pattern, trieFile] = parsed.positionals;
  if (pattern.length === 0 || !isPattern(pattern)) {
    io.error(PATTERN_ERROR);
    return 1;
  }

  try {
    const trie = await loadForCommand(trieFile, parsed, io);
    for (const word of trie.traverse(pattern)) {
      io.log(word);
    }
  } catch (err) {
    if (err instanceof Error) {
      io.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  return 0;
}
