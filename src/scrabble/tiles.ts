/**
 * tiles.ts - Scrabble letter values and tile multisets
 *
 * Values and the default bag follow the standard English Scrabble set.
 * The two blank tiles are not modelled, so the default bag holds 98 tiles.
 */

import {
  ALPHABET_SIZE,
  InvalidCharacterError,
  assertWord,
  letterAt,
  letterIndex,
} from '../trie/index.js';

// Build a per-letter table from groups of letters sharing a value
function letterTable(groups: Array<[string, number]>): Uint8Array {
  const table = new Uint8Array(ALPHABET_SIZE);
  for (const [letters, value] of groups) {
    for (const letter of letters) {
      table[letterIndex(letter)] = value;
    }
  }
  return table;
}

// Points per letter, indexed A=0 ... Z=25
const LETTER_VALUES = letterTable([
  ['LSUNRTOAIE', 1],
  ['GD', 2],
  ['BCMP', 3],
  ['FHVWY', 4],
  ['K', 5],
  ['JX', 8],
  ['QZ', 10],
]);

// Tiles per letter in a standard bag; TileCounts.defaults() hands out copies
const DEFAULT_TILE_COUNTS = letterTable([
  ['E', 12],
  ['AI', 9],
  ['O', 8],
  ['NRT', 6],
  ['LSDU', 4],
  ['G', 3],
  ['BCMPFHVWY', 2],
  ['KJXQZ', 1],
]);

function indexOf(letter: string, word: string, position: number): number {
  const index = letterIndex(letter);
  if (index === -1) {
    throw new InvalidCharacterError(word, letter, position);
  }
  return index;
}

/**
 * Points for a single letter tile.
 *
 * @throws InvalidCharacterError unless `letter` is one of A-Z
 */
export function letterValue(letter: string): number {
  return LETTER_VALUES[indexOf(letter, letter, 0)];
}

/**
 * Scrabble score of a word: the sum of its letter values.
 *
 * @throws InvalidCharacterError for anything but A-Z
 */
export function score(word: string): number {
  let total = 0;
  for (let i = 0; i < word.length; i++) {
    total += LETTER_VALUES[indexOf(word[i], word, i)];
  }
  return total;
}

// Letter counts of a word
function countLetters(word: string): Int32Array {
  const counts = new Int32Array(ALPHABET_SIZE);
  for (let i = 0; i < word.length; i++) {
    counts[indexOf(word[i], word, i)]++;
  }
  return counts;
}

/**
 * A multiset of letter tiles: a hand, a bag, or a hand plus the board tiles
 * a word may cross.
 */
export class TileCounts {
  private readonly counts: Int32Array;

  constructor(counts?: ArrayLike<number>) {
    this.counts = new Int32Array(ALPHABET_SIZE);
    if (counts !== undefined) {
      if (counts.length !== ALPHABET_SIZE) {
        throw new RangeError(`Expected ${ALPHABET_SIZE} letter counts, got ${counts.length}`);
      }
      this.counts.set(Array.from(counts));
    }
  }

  /**
   * Count the letters of a tile string such as "HELLO".
   *
   * @throws InvalidCharacterError unless `tiles` matches [A-Z]*
   */
  static fromLetters(tiles: string): TileCounts {
    assertWord(tiles);
    return new TileCounts(countLetters(tiles));
  }

  /** A fresh copy of the standard bag */
  static defaults(): TileCounts {
    return new TileCounts(DEFAULT_TILE_COUNTS);
  }

  get(letter: string): number {
    const index = letterIndex(letter);
    return index === -1 ? 0 : this.counts[index];
  }

  total(): number {
    return this.counts.reduce((sum, n) => sum + n, 0);
  }

  clone(): TileCounts {
    return new TileCounts(this.counts);
  }

  equals(other: TileCounts): boolean {
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      if (this.counts[i] !== other.counts[i]) return false;
    }
    return true;
  }

  /** [letter, count] for letters with at least one tile, A to Z */
  *entries(): IterableIterator<[string, number]> {
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      if (this.counts[i] > 0) {
        yield [letterAt(i), this.counts[i]];
      }
    }
  }

  /**
   * Can the word be spelled from these tiles, each tile used at most once?
   */
  canPlay(word: string): boolean {
    const needed = countLetters(word);
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      if (needed[i] > this.counts[i]) return false;
    }
    return true;
  }

  /**
   * Remove the word's tiles if it can be played.
   *
   * @returns true if played; false leaves the counts unchanged
   */
  play(word: string): boolean {
    if (!this.canPlay(word)) return false;
    const needed = countLetters(word);
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      this.counts[i] -= needed[i];
    }
    return true;
  }

  /** Return a played word's tiles. */
  unplay(word: string): void {
    const returned = countLetters(word);
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      this.counts[i] += returned[i];
    }
  }

  /**
   * Take one tile of a letter.
   *
   * @returns false if none is left
   */
  take(letter: string): boolean {
    const index = letterIndex(letter);
    if (index === -1 || this.counts[index] === 0) return false;
    this.counts[index]--;
    return true;
  }

  /** Put one tile of a letter back. */
  put(letter: string): void {
    this.counts[indexOf(letter, letter, 0)]++;
  }

  toString(): string {
    const parts = Array.from(this.entries(), ([letter, count]) => `${letter}:${count}`);
    return `TileCounts(${parts.join(', ')})`;
  }
}
