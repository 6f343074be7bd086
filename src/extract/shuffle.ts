import { randomInt } from 'node:crypto';

const SEED_CEILING = 2 ** 48;
const ZERO_STATE_FALLBACK = 0x6d2b79f5;

/** 32-bit xorshift generator; the whole permutation depends on nothing but its seed. */
export class XorShift32 {
  private state: number;

  constructor(seed: number) {
    this.state = foldSeed(seed);
  }

  nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x >>>= 0;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextInt(max: number): number {
    if (max <= 0) return 0;
    return this.nextU32() % max;
  }
}

// Fold a safe integer into a non-zero 32-bit state; xorshift never leaves zero.
function foldSeed(seed: number): number {
  const low = seed >>> 0;
  const high = Math.floor(seed / 0x1_0000_0000) >>> 0;
  const folded = (low ^ Math.imul(high, 0x9e3779b1)) >>> 0;
  return folded === 0 ? ZERO_STATE_FALLBACK : folded;
}

/** Fisher–Yates shuffle of a copy of `items`, fully determined by `seed`. */
export function shuffleWithSeed<T>(items: readonly T[], seed: number): T[] {
  const out = [...items];
  const rng = new XorShift32(seed);
  for (let i = out.length - 1; i > 0; i -= 1) {
    const j = rng.nextInt(i + 1);
    const current = out[i];
    const swap = out[j];
    if (current === undefined || swap === undefined) continue;
    out[i] = swap;
    out[j] = current;
  }
  return out;
}

/** A fresh seed in `[1, 2^48)`. */
export function drawSeed(): number {
  return randomInt(1, SEED_CEILING);
}
