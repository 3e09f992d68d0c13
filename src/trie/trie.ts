/**
 * trie.ts - Prefix tree over the uppercase A-Z alphabet
 *
 * Each node owns an optional fixed array of 26 child slots (A=0 ... Z=25),
 * allocated on the first insertion through that node. Leaves carry no array.
 * Nodes are created lazily and never removed.
 *
 * Supports:
 * - O(m) insertion and membership for a word of length m
 * - Prefix lookup returning the subtree node
 * - Lazy wildcard traversal: every stored word matching a fixed-length
 *   pattern over [A-Z.], yielded in ascending lexicographic order
 *
 * Example:
 *   const trie = Trie.fromWords(['cat', 'car', 'card', 'dog']);
 *   trie.contains('CAR');      // true
 *   [...trie.traverse('C..')]; // ['CAR', 'CAT']
 */

import {
  ALPHABET_SIZE,
  WILDCARD,
  assertPattern,
  assertWord,
  letterAt,
  letterIndex,
  normalizeWord,
} from './alphabet.js';

/**
 * Read-only view of a trie node, as handed to callers by Trie.root and
 * Trie.lookupPrefix().
 */
export interface ReadonlyTrieNode {
  /** Does the path from the root to this node spell a stored word? */
  readonly isTerminal: boolean;

  /** null for a leaf, otherwise a frozen copy of the ALPHABET_SIZE slots */
  readonly children: readonly (ReadonlyTrieNode | null)[] | null;

  /**
   * Number of insert operations that continued from this node into one of
   * its children. Duplicate inserts count again.
   */
  readonly descendantCount: number;

  /**
   * Get the child for a letter, or null if there is none.
   * Characters outside A-Z never have a child.
   */
  child(letter: string): ReadonlyTrieNode | null;

  hasChildren(): boolean;

  /** Yield [letter, child] for each populated slot, A to Z. */
  entries(): IterableIterator<[string, ReadonlyTrieNode]>;

  toString(): string;
}

// Only the owning Trie mutates nodes; everything outside this module sees
// them through ReadonlyTrieNode.
class TrieNode implements ReadonlyTrieNode {
  private terminal: boolean = false;
  private slots: (TrieNode | null)[] | null = null;
  private passes: number = 0;

  get isTerminal(): boolean {
    return this.terminal;
  }

  get children(): readonly (TrieNode | null)[] | null {
    return this.slots === null ? null : Object.freeze(this.slots.slice());
  }

  get descendantCount(): number {
    return this.passes;
  }

  child(letter: string): TrieNode | null {
    const index = letterIndex(letter);
    return index === -1 ? null : this.childAt(index);
  }

  childAt(index: number): TrieNode | null {
    return this.slots === null ? null : this.slots[index];
  }

  hasChildren(): boolean {
    return this.slots !== null;
  }

  *entries(): IterableIterator<[string, TrieNode]> {
    if (this.slots === null) return;
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      const child = this.slots[i];
      if (child !== null) {
        yield [letterAt(i), child];
      }
    }
  }

  /**
   * Step into the child at `index`, creating it (and the slot array) if
   * needed, and count the pass.
   */
  descend(index: number): TrieNode {
    if (this.slots === null) {
      this.slots = new Array<TrieNode | null>(ALPHABET_SIZE).fill(null);
    }
    let child = this.slots[index];
    if (child === null) {
      child = new TrieNode();
      this.slots[index] = child;
    }
    this.passes++;
    return child;
  }

  /** @returns true if the node was not terminal before */
  markTerminal(): boolean {
    if (this.terminal) return false;
    this.terminal = true;
    return true;
  }

  toString(): string {
    return `TrieNode(isTerminal=${this.terminal}, descendantCount=${this.passes})`;
  }
}

export interface TrieStats {
  /** Distinct stored words */
  words: number;
  /** Nodes including the root */
  nodes: number;
  /** Nodes without a child array */
  leaves: number;
  /** Length of the longest path from the root */
  maxDepth: number;
}

export class Trie {
  private readonly rootNode: TrieNode = new TrieNode();

  private wordCount: number = 0;

  /**
   * Build a trie from words, uppercasing each one.
   *
   * @throws InvalidCharacterError on the first word with a character outside
   *   A-Z after uppercasing; the partially built trie is discarded
   */
  static fromWords(words: Iterable<string>): Trie {
    const trie = new Trie();
    for (const word of words) {
      trie.insert(word.toUpperCase());
    }
    return trie;
  }

  /**
   * Build a trie from raw word-list lines. Each line is trimmed and
   * uppercased. Blank lines insert the empty string.
   *
   * @throws InvalidCharacterError as for fromWords
   */
  static fromLines(lines: Iterable<string>): Trie {
    const trie = new Trie();
    for (const line of lines) {
      trie.insert(normalizeWord(line));
    }
    return trie;
  }

  /** The node for the empty prefix */
  get root(): ReadonlyTrieNode {
    return this.rootNode;
  }

  /** Number of distinct words stored */
  get size(): number {
    return this.wordCount;
  }

  /**
   * Insert a word. The word is not uppercased here.
   * Validation happens before any node is created, so a rejected word leaves
   * the trie untouched.
   *
   * @throws InvalidCharacterError if the word contains anything but A-Z
   */
  insert(word: string): void {
    assertWord(word);

    let node = this.rootNode;
    for (let i = 0; i < word.length; i++) {
      node = node.descend(letterIndex(word[i]));
    }

    if (node.markTerminal()) {
      this.wordCount++;
    }
  }

  /**
   * Check if a word is stored. Never creates nodes.
   */
  contains(word: string): boolean {
    const node = this.lookupPrefix(word);
    return node !== null && node.isTerminal;
  }

  /** Alias of contains() */
  has(word: string): boolean {
    return this.contains(word);
  }

  /**
   * Follow `prefix` from the root.
   *
   * @returns The node spelling `prefix` (the root for ""), or null if the
   *   path breaks
   */
  lookupPrefix(prefix: string): ReadonlyTrieNode | null {
    return this.findNode(prefix);
  }

  private findNode(prefix: string): TrieNode | null {
    let node: TrieNode | null = this.rootNode;
    for (const char of prefix) {
      node = node.child(char);
      if (node === null) return null;
    }
    return node;
  }

  /**
   * Count the distinct stored words starting with `prefix`, the prefix
   * itself included when it is a word.
   */
  countWithPrefix(prefix: string): number {
    const start = this.findNode(prefix);
    if (start === null) return 0;

    let count = 0;
    const stack: TrieNode[] = [start];
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined) break;
      if (node.isTerminal) count++;
      for (const [, child] of node.entries()) {
        stack.push(child);
      }
    }
    return count;
  }

  /**
   * Lazily yield every stored word matching `pattern`, in ascending order.
   *
   * The pattern fixes the length of every match; '.' matches any single
   * letter. The pattern is validated when traverse() is called, before any
   * result is pulled.
   *
   * @throws InvalidPatternError if the pattern has characters outside A-Z
   *   and '.'
   */
  traverse(pattern: string): IterableIterator<string> {
    assertPattern(pattern);
    return walk(this.rootNode, pattern, 0, '');
  }

  /**
   * Walk the whole tree and collect size statistics.
   */
  stats(): TrieStats {
    let nodes = 0;
    let leaves = 0;
    let maxDepth = 0;

    const stack: Array<[TrieNode, number]> = [[this.rootNode, 0]];
    while (stack.length > 0) {
      const top = stack.pop();
      if (top === undefined) break;
      const [node, depth] = top;
      nodes++;
      if (depth > maxDepth) maxDepth = depth;
      if (!node.hasChildren()) {
        leaves++;
        continue;
      }
      for (const [, child] of node.entries()) {
        stack.push([child, depth + 1]);
      }
    }

    return { words: this.wordCount, nodes, leaves, maxDepth };
  }

  toString(): string {
    return `Trie(size=${this.wordCount}, root=${this.rootNode.toString()})`;
  }
}

// Lock-step descent over pattern[offset..] and the subtree at `node`.
// Children are visited A to Z, so the output is sorted by construction.
function* walk(
  node: TrieNode,
  pattern: string,
  offset: number,
  prefix: string
): IterableIterator<string> {
  if (offset === pattern.length) {
    if (node.isTerminal) yield prefix;
    return;
  }

  if (!node.hasChildren()) return;

  const char = pattern[offset];
  if (char === WILDCARD) {
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      const child = node.childAt(i);
      if (child !== null) {
        yield* walk(child, pattern, offset + 1, prefix + letterAt(i));
      }
    }
  } else {
    const child = node.childAt(letterIndex(char));
    if (child !== null) {
      yield* walk(child, pattern, offset + 1, prefix + char);
    }
  }
}
