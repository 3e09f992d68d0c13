/**
 * trie/index.ts - Prefix tree over A-Z with wildcard pattern traversal
 *
 * Usage:
 *   import { Trie } from './trie/index.js';
 *   const trie = Trie.fromWords(['word', 'ward', 'wind']);
 *   trie.contains('WORD');       // true
 *   [...trie.traverse('W..D')]; // ['WARD', 'WIND', 'WORD']
 */

export { Trie } from './trie.js';
export type { ReadonlyTrieNode, TrieStats } from './trie.js';

export {
  ALPHABET_SIZE,
  WILDCARD,
  letterIndex,
  letterAt,
  isWord,
  isPattern,
  assertWord,
  assertPattern,
  normalizeWord,
} from './alphabet.js';

export { AlphabetError, InvalidCharacterError, InvalidPatternError } from './errors.js';
