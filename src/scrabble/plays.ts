/**
 * plays.ts - Find, rank and sample the words a hand of tiles can play
 */

import { ALPHABET_SIZE, Trie, WILDCARD, assertPattern, letterAt, letterIndex } from '../trie/index.js';
import type { ReadonlyTrieNode } from '../trie/index.js';
import { TileCounts, score } from './tiles.js';

/** Number of top scoring words to show */
export const N_SHOW_BEST = 20;

/** Number of random words to show */
export const N_SHOW_RANDOM = 10;

export interface ScoredWord {
  word: string;
  score: number;
}

/**
 * Lazily yield the words matching `pattern` that `hand` can spell, in
 * ascending order.
 *
 * Same output as filtering trie.traverse(pattern) with hand.canPlay(), but
 * branches whose letters the hand cannot cover are never entered. Tiles are
 * spent from a copy, so `hand` is not modified.
 *
 * @throws InvalidPatternError if the pattern has characters outside A-Z
 *   and '.'
 */
export function playableMatches(trie: Trie, pattern: string, hand: TileCounts): IterableIterator<string> {
  assertPattern(pattern);
  return walkPlayable(trie.root, pattern, 0, '', hand.clone());
}

function* walkPlayable(
  node: ReadonlyTrieNode,
  pattern: string,
  offset: number,
  prefix: string,
  tiles: TileCounts
): IterableIterator<string> {
  if (offset === pattern.length) {
    if (node.isTerminal) yield prefix;
    return;
  }

  if (!node.hasChildren()) return;

  const char = pattern[offset];
  const first = char === WILDCARD ? 0 : letterIndex(char);
  const last = char === WILDCARD ? ALPHABET_SIZE - 1 : first;

  for (let i = first; i <= last; i++) {
    const letter = letterAt(i);
    const child = node.child(letter);
    if (child === null) continue;
    if (!tiles.take(letter)) continue;
    try {
      yield* walkPlayable(child, pattern, offset + 1, prefix + letter, tiles);
    } finally {
      tiles.put(letter);
    }
  }
}

/**
 * Score each word and sort by descending score.
 * The sort is stable: words with equal scores keep their input order.
 */
export function rankByScore(words: Iterable<string>): ScoredWord[] {
  return Array.from(words, word => ({ word, score: score(word) }))
    .sort((a, b) => b.score - a.score);
}

/**
 * The `n` highest scoring words.
 */
export function topPlays(words: Iterable<string>, n: number = N_SHOW_BEST): ScoredWord[] {
  return rankByScore(words).slice(0, n);
}

/**
 * Pick min(n, words.length) distinct words uniformly at random and score
 * them, in the order drawn.
 *
 * @param random Source of numbers in [0, 1)
 */
export function samplePlays(
  words: readonly string[],
  n: number = N_SHOW_RANDOM,
  random: () => number = Math.random
): ScoredWord[] {
  const pool = words.slice();
  const count = Math.max(0, Math.min(n, pool.length));

  // Partial Fisher-Yates: the first `count` slots end up as the sample
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const picked = pool[j];
    pool[j] = pool[i];
    pool[i] = picked;
  }

  return pool.slice(0, count).map(word => ({ word, score: score(word) }));
}
