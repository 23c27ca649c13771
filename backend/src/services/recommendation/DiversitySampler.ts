import { DiversityPool, ScoredItem } from '../../types/recommendation';
import { createRandomSource, drawWithoutReplacement, RandomSource, shuffleInPlace } from './random';

export interface SampleOptions {
  /** Fixes the generator for reproducible output. */
  seed?: number;
  /** Overrides `seed` with a caller-owned generator. */
  random?: RandomSource;
  pool?: DiversityPool;
}

/**
 * Builds the final list from the fused ranking: a guaranteed slice of the
 * best-ranked works plus a randomly drawn share, shuffled together.
 *
 * With the default `top` pool the random share is drawn from the same
 * top slice, so a work can appear twice. The `tail` pool draws from the
 * works ranked below the slice instead.
 */
export class DiversitySampler {
  constructor(private defaultPool: DiversityPool = 'top') {}

  sample(
    fused: readonly ScoredItem[],
    count: number,
    randomFactor: number,
    options: SampleOptions = {}
  ): ScoredItem[] {
    const total = Math.floor(count);
    if (!(total > 0)) return [];

    // Math.max/min propagate NaN, which means no random share
    const clamped = Math.min(Math.max(Math.floor(total * randomFactor), 0), total);
    const numRandom = Number.isNaN(clamped) ? 0 : clamped;
    const numTop = total - numRandom;

    const random = options.random ?? createRandomSource(options.seed);
    const pool = options.pool ?? this.defaultPool;

    const topSlice = fused.slice(0, numTop);
    const candidates = pool === 'tail' ? fused.slice(numTop) : fused.slice(0, numTop);
    const drawn = drawWithoutReplacement(candidates, numRandom, random);

    const selected = [...topSlice, ...drawn].map(item => ({ ...item }));
    return shuffleInPlace(selected, random);
  }
}
