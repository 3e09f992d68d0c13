/**
 * scrabble.ts - Best and random plays for a hand of Scrabble tiles
 *
 * Lists the words of a word list that match a pattern and can be spelled
 * from the available tiles: the top scorers first, then a random sample.
 * Without a tile argument the standard bag (98 letter tiles) is used.
 *
 * Usage:
 *   scrabble <pattern> <trie_file>[.gz|.br] [<tiles>] [--verbose]
 *
 * Example:
 *   scrabble W..D words.txt.gz
 *   scrabble ..... words.txt HELLOWORLD
 */

import { isPattern, isWord } from '../trie/index.js';
import { N_SHOW_BEST, N_SHOW_RANDOM, type ScoredWord, playableMatches, samplePlays, topPlays } from '../scrabble/plays.js';
import { TileCounts } from '../scrabble/tiles.js';
import { type Output, type ParsedArgs, UsageError, parseArgs } from './args.js';
import { loadForCommand } from './load.js';
import { PATTERN_ERROR } from './wordtrie.js';

export const USAGE = [
  'Usage: scrabble <pattern> <trie_file>[.gz] [<tiles>]',
  'Example: scrabble W..D words.txt.gz',
];

export const TILES_ERROR = 'Error: Tiles must be capitalized A-Z only.';

const RULE = '-'.repeat(100);

export interface RunOptions {
  /** Source of numbers in [0, 1) for the random sample */
  random?: () => number;
}

function printHelp(io: Output): void {
  io.log(`
scrabble - Find the Scrabble plays matching a pattern

Usage:
  scrabble <pattern> <trie_file> [<tiles>] [options]

Arguments:
  pattern     Letters A-Z, with '.' matching any single letter
  trie_file   Word list, one word per line (.gz and .br are decompressed)
  tiles       Available tiles as capital letters, e.g. HELLOWORLD
              Default: the standard bag without blanks (98 tiles)

Options:
  --gzip      Read the word list as gzip regardless of extension
  --brotli    Read the word list as brotli regardless of extension
  --plain     Read the word list as plain text regardless of extension
  --verbose   Print load time and trie statistics to stderr
  --help      Show this help

Examples:
  scrabble W..D words.txt.gz
  scrabble ..... words.txt HELLOWORLD
`);
}

function printPlays(io: Output, plays: ScoredWord[]): void {
  if (plays.length === 0) {
    io.log('(none)');
    return;
  }
  const width = Math.max(...plays.map(p => p.word.length));
  for (const { word, score } of plays) {
    io.log(`${word.padEnd(width)}  ${score}`);
  }
}

/**
 * Run the command.
 *
 * @returns Process exit code
 */
export async function run(args: string[], io: Output = console, options: RunOptions = {}): Promise<number> {
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

  if (parsed.positionals.length !== 2 && parsed.positionals.length !== 3) {
    for (const line of USAGE) io.log(line);
    return 1;
  }

  const [pattern, trieFile, tiles] = parsed.positionals;

  let hand: TileCounts;
  if (tiles) {
    if (!isWord(tiles)) {
      io.error(TILES_ERROR);
      return 1;
    }
    hand = TileCounts.fromLetters(tiles);
    io.log(`Using custom tiles: ${tiles}`);
  } else {
    hand = TileCounts.defaults();
    io.log('Using default Scrabble tiles (excluding 2 blanks):');
  }
  io.log(`Total tiles: ${hand.total()}`);

  if (pattern.length === 0 || !isPattern(pattern)) {
    io.error(PATTERN_ERROR);
    return 1;
  }

  let words: string[];
  try {
    const trie = await loadForCommand(trieFile, parsed, io);
    words = Array.from(playableMatches(trie, pattern, hand));
  } catch (err) {
    if (err instanceof Error) {
      io.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const best = topPlays(words, N_SHOW_BEST);
  io.log();
  io.log(`Top ${best.length} words I can play with my tiles matching '${pattern}':`);
  io.log(RULE);
  printPlays(io, best);

  const sampled = samplePlays(words, N_SHOW_RANDOM, options.random);
  io.log();
  io.log(`${sampled.length} random words I can play with my tiles matching '${pattern}':`);
  io.log(RULE);
  printPlays(io, sampled);

  return 0;
}
