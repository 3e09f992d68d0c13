/**
 * alphabet.ts - The fixed A-Z alphabet shared by the trie and its callers
 *
 * Letters map to child slots A=0 ... Z=25. Patterns add a single-letter
 * wildcard '.'.
 */

import { InvalidCharacterError, InvalidPatternError } from './errors.js';

export const ALPHABET_SIZE = 26;

/** Matches exactly one letter at its position in a pattern */
export const WILDCARD = '.';

const CODE_A = 'A'.charCodeAt(0);

/**
 * Child slot index for a letter, or -1 if `char` is not a single A-Z letter.
 */
export function letterIndex(char: string): number {
  if (char.length !== 1) return -1;
  const index = char.charCodeAt(0) - CODE_A;
  return index >= 0 && index < ALPHABET_SIZE ? index : -1;
}

export function letterAt(index: number): string {
  if (!Number.isInteger(index) || index < 0 || index >= ALPHABET_SIZE) {
    throw new RangeError(`Letter index out of range: ${index}`);
  }
  return String.fromCharCode(CODE_A + index);
}

// Position of the first character outside A-Z (and '.', if allowed), or -1
function firstInvalid(text: string, allowWildcard: boolean): number {
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (letterIndex(char) === -1 && !(allowWildcard && char === WILDCARD)) {
      return i;
    }
  }
  return -1;
}

/** True if `text` matches [A-Z]* (the empty string included). */
export function isWord(text: string): boolean {
  return firstInvalid(text, false) === -1;
}

/** True if `text` matches [A-Z.]* */
export function isPattern(text: string): boolean {
  return firstInvalid(text, true) === -1;
}

/**
 * @throws InvalidCharacterError on the first character outside A-Z
 */
export function assertWord(word: string): void {
  const position = firstInvalid(word, false);
  if (position !== -1) {
    throw new InvalidCharacterError(word, word[position], position);
  }
}

/**
 * @throws InvalidPatternError on the first character outside A-Z and '.'
 */
export function assertPattern(pattern: string): void {
  const position = firstInvalid(pattern, true);
  if (position !== -1) {
    throw new InvalidPatternError(pattern, pattern[position], position);
  }
}

/**
 * Normalize a raw line of a word list: trim surrounding whitespace and
 * uppercase. Does not validate.
 */
export function normalizeWord(raw: string): string {
  return raw.trim().toUpperCase();
}
