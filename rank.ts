import MersenneTwister from "mersenne-twister";

/**
 * Source of uniform random numbers in [0, 1). A `MersenneTwister` from the
 * mersenne-twister package satisfies it; tests pass a seeded one.
 */
export interface RandomSource {
  random(): number;
}

/** Ranks keep the tie-breaker in the low 16 bits. */
export const SECONDARY_BITS = 16;
const SECONDARY_SPAN = 1 << SECONDARY_BITS;

/** Largest primary rank that still packs; reaching it takes ~2^-65535 luck. */
export const MAX_PRIMARY = 0xffff;

/** Packs `(r1, r2)` as `r1 << 16 | (1 + r2)`, so an unset tie-breaker (0) never collides with r2 = 0. */
export function packRank(r1: number, r2: number): number {
  return r1 * SECONDARY_SPAN + (1 + r2);
}

/** The coarse, geometric component of a packed rank. */
export function primaryRank(rank: number): number {
  return Math.floor(rank / SECONDARY_SPAN);
}

/** The stored tie-breaker of a packed rank, i.e. `1 + r2`. */
export function secondaryRank(rank: number): number {
  return rank % SECONDARY_SPAN;
}

/**
 * Exclusive bound of the tie-breaker draw for a tree holding `size` nodes:
 * `floor(log2(size + 1))^3`, or 0 for an empty tree.
 */
export function tieBreakLimit(size: number): number {
  if (size <= 0) return 0;
  const log = 31 - Math.clz32(size + 1);
  return log * log * log;
}

/**
 * Draws Zip-Zip ranks. The primary component is Geometric(1/2), which alone
 * gives a zip tree its expected logarithmic depth; the secondary component
 * only orders nodes whose primary components collide.
 */
export class RankGenerator {
  readonly random: RandomSource;

  /** @param random Owned by the generator from now on; an unseeded MersenneTwister if omitted. */
  constructor(random?: RandomSource) {
    this.random = random ?? new MersenneTwister();
  }

  /**
   * Draws the rank of a node about to join a tree of `size` nodes.
   * @returns the packed rank
   */
  next(size: number): number {
    const random = this.random;
    let r1 = 0;
    while (r1 < MAX_PRIMARY && random.random() < 0.5) r1++;
    const limit = tieBreakLimit(size);
    const r2 = limit === 0 ? 0 : Math.floor(random.random() * limit);
    return packRank(r1, r2);
  }
}
