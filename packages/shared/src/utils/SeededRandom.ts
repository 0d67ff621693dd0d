/**
 * SeededRandom - Deterministic PRNG
 *
 * Uses xorshift128+ algorithm for fast, high-quality random numbers.
 * Same seed always produces the same sequence on all platforms, which keeps
 * randomised checks reproducible.
 *
 * @see https://en.wikipedia.org/wiki/Xorshift
 */

/**
 * Deterministic pseudo-random number generator using xorshift128+
 *
 * @example
 * ```typescript
 * const rng = new SeededRandom(12345);
 * const float = rng.random();      // 0.0 to 1.0
 * const int = rng.nextInt(100);    // 0 to 99
 * ```
 */
export class SeededRandom {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - Initial seed value (any integer)
   */
  constructor(seed: number) {
    // splitmix64 so that similar seeds produce very different sequences
    this.state0 = this.splitmix64(BigInt(seed));
    this.state1 = this.splitmix64(this.state0);

    // All-zero state is invalid for xorshift
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state0 = 1n;
    }
  }

  private splitmix64(x: bigint): bigint {
    x = (x + 0x9e3779b97f4a7c15n) & 0xffffffffffffffffn;
    x = ((x ^ (x >> 30n)) * 0xbf58476d1ce4e5b9n) & 0xffffffffffffffffn;
    x = ((x ^ (x >> 27n)) * 0x94d049bb133111ebn) & 0xffffffffffffffffn;
    return (x ^ (x >> 31n)) & 0xffffffffffffffffn;
  }

  private next(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;

    this.state0 = s0;
    s1 ^= s1 << 23n;
    s1 = (s1 ^ s0 ^ (s1 >> 18n) ^ (s0 >> 5n)) & 0xffffffffffffffffn;
    this.state1 = s1;

    return (s0 + s1) & 0xffffffffffffffffn;
  }

  /**
   * Random float in [0, 1), drop-in replacement for Math.random()
   */
  random(): number {
    // Upper 53 bits for full double precision
    return Number(this.next() >> 11n) / 9007199254740992; // 2^53
  }

  /**
   * Random integer in [0, max)
   */
  nextInt(max: number): number {
    if (max <= 0) return 0;
    return Math.floor(this.random() * max);
  }

  /**
   * Random integer in [min, max]
   */
  nextIntRange(min: number, max: number): number {
    if (min > max) {
      const temp = min;
      min = max;
      max = temp;
    }
    return min + this.nextInt(max - min + 1);
  }

  /**
   * Pick one element of a non-empty array
   */
  pick<T>(values: readonly T[]): T | undefined {
    return values[this.nextInt(values.length)];
  }
}
