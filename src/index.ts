/**
 * index.ts - wordtrie public API
 *
 * Usage:
 *   import { loadTrie, playableMatches, TileCounts } from 'wordtrie';
 *   const trie = await loadTrie('words.txt.gz');
 *   [...trie.traverse('W..D')];
 *   [...playableMatches(trie, '.....', TileCounts.fromLetters('HELLOWORLD'))];
 */

export * from './trie/index.js';

export { detectCompression, splitLines, readWordList, loadTrie } from './wordlist.js';
export type { Compression, ReadOptions } from './wordlist.js';

export { letterValue, score, TileCounts } from './scrabble/tiles.js';
export { N_SHOW_BEST, N_SHOW_RANDOM, playableMatches, rankByScore, topPlays, samplePlays } from './scrabble/plays.js';
export type { ScoredWord } from './scrabble/plays.js';
