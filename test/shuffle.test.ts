import test from 'node:test';
import assert from 'node:assert/strict';
import { drawSeed, shuffleWithSeed } from '../src/index.js';
import { XorShift32 } from '../src/extract/shuffle.js';

const ITEMS = ['a.csv', 'b.csv', 'c.csv', 'd.csv', 'e.csv', 'f.csv', 'g.csv', 'h.csv'];

test('same seed gives the same permutation', () => {
  assert.deepEqual(shuffleWithSeed(ITEMS, 123), shuffleWithSeed(ITEMS, 123));
  assert.deepEqual(shuffleWithSeed(ITEMS, 2 ** 40 + 7), shuffleWithSeed(ITEMS, 2 ** 40 + 7));
});

test('shuffle is a permutation and leaves its input alone', () => {
  const input = [...ITEMS];
  const out = shuffleWithSeed(input, 99);
  assert.deepEqual(input, ITEMS);
  assert.deepEqual([...out].sort(), ITEMS);
});

test('empty and single-item lists pass through', () => {
  assert.deepEqual(shuffleWithSeed([], 5), []);
  assert.deepEqual(shuffleWithSeed(['only'], 5), ['only']);
});

test('a zero seed still drives the generator', () => {
  const rng = new XorShift32(0);
  const first = rng.nextU32();
  assert.notEqual(first, 0);
  assert.notEqual(rng.nextU32(), first);
  assert.equal(rng.nextInt(0), 0);
});

test('drawSeed returns a safe integer in [1, 2^48)', () => {
  for (let i = 0; i < 32; i += 1) {
    const seed = drawSeed();
    assert.equal(Number.isSafeInteger(seed), true);
    assert.ok(seed >= 1 && seed < 2 ** 48);
  }
});
