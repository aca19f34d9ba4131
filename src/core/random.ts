import { randomInt } from 'crypto';

/**
 * Anything that yields doubles in [0, 1)
 */
export interface RandomSource {
  next(): number;
}

/**
 * SplitMix32, used to spread a single seed over the generator state
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

type RngState = [number, number, number, number];

export const MAX_SEED = 0xffffffff;

/**
 * Seeds outside the 32-bit range are rejected, not wrapped
 */
export function assertSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new Error(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
}

/**
 * Deterministic xoshiro128++ generator. One instance drives a whole
 * experiment; every draw advances the same stream.
 */
export class SeededRandom implements RandomSource {
  private s: RngState;

  constructor(seed: number) {
    assertSeed(seed);
    const mix = splitmix32(seed);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  next(): number {
    return this.next32() / 0x100000000;
  }
}

/**
 * Pick one element uniformly. Consumes exactly one draw from the source.
 */
export function choice<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('choice expects at least one item');
  }
  const index = Math.floor(random.next() * items.length);
  return items[index];
}

export function randomSeed(): number {
  return randomInt(0x100000000);
}

/**
 * Seeded generator for reproducible runs, otherwise one seeded from the OS
 */
export function createRandom(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? randomSeed());
}
