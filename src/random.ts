/**
 * Source of uniformly distributed integers for dice draws.
 * The evaluator calls `nextInt` once per die, in roll order.
 */
export interface RandomSource {
  /** Returns an integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
}

const UINT32_RANGE = 4294967296;

/** mulberry32: returns the next float in [0, 1) on each call. */
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded random source. Two instances built from the same seed produce the
 * same sequence, which is how evaluations are made reproducible.
 */
export class SeededRandom implements RandomSource {
  private readonly rng: () => number;

  constructor(public readonly seed: number) {
    this.rng = mulberry32(seed);
  }

  /** Returns the next float in [0, 1). */
  next(): number {
    return this.rng();
  }

  /**
   * @throws {RangeError} if min > max or either bound is not a safe integer.
   */
  nextInt(min: number, max: number): number {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
      throw new RangeError("min and max must be safe integers");
    }
    if (min > max) {
      throw new RangeError(`min (${min}) must not exceed max (${max})`);
    }
    const size = max - min + 1;
    if (size <= UINT32_RANGE) return min + Math.floor(this.rng() * size);
    if (!Number.isSafeInteger(size)) {
      throw new RangeError(`Range ${min}..${max} is too wide to draw from`);
    }

    // Two 32-bit outputs give 53 bits; redraw above the last full multiple.
    const limit = Math.floor(2 ** 53 / size) * size;
    let x: number;
    do {
      x = this.uint32() * 2 ** 21 + (this.uint32() >>> 11);
    } while (x >= limit);
    return min + (x % size);
  }

  private uint32(): number {
    return Math.floor(this.rng() * UINT32_RANGE);
  }
}

/** A 32-bit seed drawn from the platform's non-deterministic generator. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}

export function createRandom(seed: number = randomSeed()): SeededRandom {
  return new SeededRandom(seed);
}
