import { randomBytes } from 'crypto';

/** Uniform generator over [0, 1). */
export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function entropySeed(): number {
  return randomBytes(4).readUInt32LE(0);
}

export function createRandomSource(seed?: number): RandomSource {
  return mulberry32(seed ?? entropySeed());
}

/** Fisher-Yates, in place. */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Draws up to `count` distinct positions of `items`, uniformly without
 * replacement. The input array is not touched.
 */
export function drawWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource
): T[] {
  const pool = [...items];
  const take = Math.max(0, Math.min(count, pool.length));

  // Partial Fisher-Yates from the front
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }

  return pool.slice(0, take);
}
