/**
 * plays.test.ts - Tests for playable-word search, ranking and sampling
 */

import { describe, test } from 'node:test';
import * as assert from 'node:assert';
import { playableMatches, rankByScore, samplePlays, topPlays } from './plays.js';
import { TileCounts } from './tiles.js';
import { InvalidPatternError, Trie } from '../trie/index.js';

const WORDS = ['HELLO', 'HOLLY', 'JELLY', 'LOLLY', 'HOLE', 'HELL', 'HEEL', 'OLE', 'ZOO'];

describe('playableMatches', () => {
  test('keeps only words the hand can spell', () => {
    const trie = Trie.fromWords(WORDS);
    const hand = TileCounts.fromLetters('HELLO');
    assert.deepStrictEqual([...playableMatches(trie, '.....', hand)], ['HELLO']);
    assert.deepStrictEqual([...playableMatches(trie, '....', hand)], ['HELL', 'HOLE']);
    assert.deepStrictEqual([...playableMatches(trie, 'H...', hand)], ['HELL', 'HOLE']);
  });

  test('same result as filtering the full traversal', () => {
    const trie = Trie.fromWords(WORDS);
    const hands = ['HELLOY', 'JELLYOH', 'ZOOLE', 'EEHL', 'A'];
    for (const tiles of hands) {
      const hand = TileCounts.fromLetters(tiles);
      for (const pattern of ['...', '....', '.....', 'H....', '.O...', '..L..']) {
        const expected = [...trie.traverse(pattern)].filter(w => hand.canPlay(w));
        assert.deepStrictEqual([...playableMatches(trie, pattern, hand)], expected, `${tiles} ${pattern}`);
      }
    }
  });

  test('does not modify the hand', () => {
    const trie = Trie.fromWords(WORDS);
    const hand = TileCounts.fromLetters('HELLOY');
    const before = hand.clone();

    const iterator = playableMatches(trie, '.....', hand);
    assert.strictEqual(iterator.next().value, 'HELLO');
    assert.strictEqual(hand.equals(before), true);
    iterator.return?.();
    assert.strictEqual(hand.equals(before), true);
  });

  test('validates the pattern at call time', () => {
    const trie = Trie.fromWords(WORDS);
    assert.throws(() => playableMatches(trie, 'h....', TileCounts.defaults()), InvalidPatternError);
  });

  test('empty pattern', () => {
    const trie = Trie.fromLines(['', 'A']);
    assert.deepStrictEqual([...playableMatches(trie, '', new TileCounts())], ['']);
  });
});

describe('Ranking', () => {
  test('sorts by descending score, ties keep input order', () => {
    const ranked = rankByScore(['HELL', 'HOLE', 'JELLY', 'ZOO', 'OLE']);
    assert.deepStrictEqual(ranked, [
      { word: 'JELLY', score: 15 },
      { word: 'ZOO', score: 12 },
      { word: 'HELL', score: 7 },
      { word: 'HOLE', score: 7 },
      { word: 'OLE', score: 3 },
    ]);
  });

  test('topPlays takes the first n', () => {
    const top = topPlays(['OLE', 'ZOO', 'HELL'], 2);
    assert.deepStrictEqual(top.map(p => p.word), ['ZOO', 'HELL']);
    assert.deepStrictEqual(topPlays([], 20), []);
  });
});

describe('Sampling', () => {
  const words = ['AA', 'BB', 'CC', 'DD', 'EE'];

  test('random() of 0 keeps the input order', () => {
    const picked = samplePlays(words, 3, () => 0);
    assert.deepStrictEqual(picked.map(p => p.word), ['AA', 'BB', 'CC']);
  });

  test('random() near 1 takes from the end', () => {
    const picked = samplePlays(words, 2, () => 0.999);
    // i=0 swaps with index 4, i=1 swaps with index 4 again
    assert.deepStrictEqual(picked.map(p => p.word), ['EE', 'AA']);
  });

  test('never more than the available words, all distinct', () => {
    const picked = samplePlays(words, 10);
    assert.strictEqual(picked.length, 5);
    assert.deepStrictEqual(picked.map(p => p.word).sort(), words);
  });

  test('scores the sample and leaves the input alone', () => {
    const input = ['QI', 'ZA'];
    const picked = samplePlays(input, 1, () => 0);
    assert.deepStrictEqual(picked, [{ word: 'QI', score: 11 }]);
    assert.deepStrictEqual(input, ['QI', 'ZA']);
    assert.deepStrictEqual(samplePlays([], 10), []);
  });
});
