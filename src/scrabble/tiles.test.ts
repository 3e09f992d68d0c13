/**
 * tiles.test.ts - Tests for letter values, scoring and tile multisets
 */

import { describe, test } from 'node:test';
import * as assert from 'node:assert';
import { TileCounts, letterValue, score } from './tiles.js';
import { ALPHABET_SIZE, InvalidCharacterError, letterAt } from '../trie/index.js';

describe('Letter values', () => {
  test('standard values', () => {
    assert.strictEqual(letterValue('E'), 1);
    assert.strictEqual(letterValue('D'), 2);
    assert.strictEqual(letterValue('M'), 3);
    assert.strictEqual(letterValue('H'), 4);
    assert.strictEqual(letterValue('K'), 5);
    assert.strictEqual(letterValue('X'), 8);
    assert.strictEqual(letterValue('Q'), 10);
  });

  test('every letter has a value', () => {
    for (let i = 0; i < ALPHABET_SIZE; i++) {
      assert.ok(letterValue(letterAt(i)) > 0, letterAt(i));
    }
  });

  test('letterValue rejects anything but a single A-Z letter', () => {
    assert.throws(() => letterValue('e'), InvalidCharacterError);
    assert.throws(() => letterValue(''), InvalidCharacterError);
    assert.throws(() => letterValue('AB'), InvalidCharacterError);
  });

  test('score sums letter values', () => {
    assert.strictEqual(score('HELLO'), 8); // 4 + 1 + 1 + 1 + 1
    assert.strictEqual(score('LOLLY'), 8); // 1 + 1 + 1 + 1 + 4
    assert.strictEqual(score('QUIZ'), 22); // 10 + 1 + 1 + 10
    assert.strictEqual(score(''), 0);
  });

  test('score rejects non-letters', () => {
    assert.throws(() => score('hello'), InvalidCharacterError);
  });
});

describe('Default bag', () => {
  test('holds 98 letter tiles', () => {
    assert.strictEqual(TileCounts.defaults().total(), 98);
  });

  test('standard distribution', () => {
    const bag = TileCounts.defaults();
    assert.strictEqual(bag.get('E'), 12);
    assert.strictEqual(bag.get('A'), 9);
    assert.strictEqual(bag.get('I'), 9);
    assert.strictEqual(bag.get('O'), 8);
    assert.strictEqual(bag.get('T'), 6);
    assert.strictEqual(bag.get('L'), 4);
    assert.strictEqual(bag.get('G'), 3);
    assert.strictEqual(bag.get('Y'), 2);
    assert.strictEqual(bag.get('Z'), 1);
  });

  test('defaults() returns independent copies', () => {
    const bag = TileCounts.defaults();
    bag.play('ZEBRA');
    while (bag.take('E'));
    assert.strictEqual(bag.get('E'), 0);

    const fresh = TileCounts.defaults();
    assert.strictEqual(fresh.get('Z'), 1);
    assert.strictEqual(fresh.get('E'), 12);
    assert.strictEqual(fresh.total(), 98);
  });

  test('scores do not depend on earlier tile play', () => {
    const bag = TileCounts.defaults();
    bag.play('QUIZ');
    assert.strictEqual(letterValue('Q'), 10);
    assert.strictEqual(score('QUIZ'), 22);
  });
});

describe('TileCounts', () => {
  test('fromLetters counts letters', () => {
    const hand = TileCounts.fromLetters('HELLO');
    assert.deepStrictEqual([...hand.entries()], [['E', 1], ['H', 1], ['L', 2], ['O', 1]]);
    assert.strictEqual(hand.total(), 5);
    assert.strictEqual(hand.get('Z'), 0);
    assert.strictEqual(hand.get('?'), 0);
  });

  test('fromLetters rejects non-letters', () => {
    assert.throws(() => TileCounts.fromLetters('AB1'), InvalidCharacterError);
  });

  test('exact tile match is playable', () => {
    const hand = TileCounts.fromLetters('HELLO');
    assert.strictEqual(hand.canPlay('HELLO'), true);
    assert.strictEqual(hand.canPlay('HOLE'), true);
  });

  test('missing or too few tiles are not playable', () => {
    const hand = TileCounts.fromLetters('HELLO');
    assert.strictEqual(hand.canPlay('LOLLY'), false); // needs 3 Ls and a Y
    assert.strictEqual(hand.canPlay('HELLOS'), false);
    assert.strictEqual(hand.canPlay('HEEL'), false);
  });

  test('play, refuse, unplay', () => {
    const hand = TileCounts.defaults();
    assert.strictEqual(hand.play('HELLO'), true);
    assert.strictEqual(hand.get('L'), 2);
    assert.strictEqual(hand.total(), 93);

    // LOLLY needs 3 Ls but only 2 are left
    assert.strictEqual(hand.play('LOLLY'), false);
    assert.strictEqual(hand.get('L'), 2);
    assert.strictEqual(hand.get('Y'), 2);

    hand.unplay('HELLO');
    assert.strictEqual(hand.get('L'), 4);
    assert.strictEqual(hand.equals(TileCounts.defaults()), true);
  });

  test('take and put move single tiles', () => {
    const hand = TileCounts.fromLetters('AAB');
    assert.strictEqual(hand.take('A'), true);
    assert.strictEqual(hand.take('A'), true);
    assert.strictEqual(hand.take('A'), false);
    assert.strictEqual(hand.take('c'), false);
    hand.put('A');
    assert.strictEqual(hand.get('A'), 1);
    assert.throws(() => hand.put('?'), InvalidCharacterError);
  });

  test('clone and equals', () => {
    const hand = TileCounts.fromLetters('QUIZ');
    const copy = hand.clone();
    assert.strictEqual(copy.equals(hand), true);
    copy.take('Q');
    assert.strictEqual(copy.equals(hand), false);
    assert.strictEqual(hand.get('Q'), 1);
  });

  test('constructor checks the table size', () => {
    assert.throws(() => new TileCounts([1, 2, 3]), RangeError);
    assert.strictEqual(new TileCounts().total(), 0);
  });

  test('toString', () => {
    assert.strictEqual(TileCounts.fromLetters('BAA').toString(), 'TileCounts(A:2, B:1)');
  });
});
