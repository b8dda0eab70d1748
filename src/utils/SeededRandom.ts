const GOLDEN_GAMMA = 0x6d2b79f5;
const UINT32_RANGE = 4294967296;

/**
 * Deterministic pseudo-random number generator
 * Uses the mulberry32 algorithm over a 32-bit state.
 * Any finite seed (negative or fractional included) is floored and wrapped
 * to 32 bits, so seeds that differ below 2^32 start distinct streams.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = SeededRandom.normalize(seed);
  }

  private static normalize(seed: number): number {
    if (!Number.isFinite(seed)) return 0;
    return Math.floor(seed) >>> 0;
  }

  /**
   * Generate next random number between 0 (inclusive) and 1 (exclusive)
   */
  next(): number {
    this.state = (this.state + GOLDEN_GAMMA) >>> 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), this.state | 1);
    t = (t + Math.imul(t ^ (t >>> 7), t | 61)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  }

  /**
   * Generate random number within a range
   * @param min - Minimum value (inclusive)
   * @param max - Maximum value (exclusive)
   */
  range(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /**
   * Generate random integer within a range
   * @param min - Minimum value (inclusive)
   * @param max - Maximum value (inclusive)
   */
  rangeInt(min: number, max: number): number {
    return Math.floor(this.range(min, max + 1));
  }

  /**
   * Reset the generator to a new seed
   */
  setSeed(seed: number): void {
    this.state = SeededRandom.normalize(seed);
  }
}
