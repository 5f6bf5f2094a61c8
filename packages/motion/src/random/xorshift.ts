const MASK_64 = 0xffffffffffffffffn;
const MULTIPLIER = 0x2545f4914f6cdd1dn;
const INV_2_53 = 1 / 2 ** 53;

/**
 * One xorshift64* step as a pure function.
 * Returns the next generator state and a sample in [-1, 1).
 */
export function nextSample(state: bigint): { state: bigint; value: number } {
  let x = state;
  x ^= x >> 12n;
  x ^= (x << 25n) & MASK_64;
  x ^= x >> 27n;

  const v = (x * MULTIPLIER) & MASK_64;
  // Top 53 bits -> [0, 1) -> [-1, 1)
  const value = Number(v >> 11n) * INV_2_53 * 2 - 1;

  return { state: x, value };
}

/**
 * Deterministic pseudo-random number generator using xorshift64*
 */
export class Xorshift64Star {
  private state: bigint;

  constructor(seed: bigint) {
    this.state = seed & MASK_64;
  }

  /**
   * Generate next random number in [-1, 1)
   */
  nextSigned(): number {
    const result = nextSample(this.state);
    this.state = result.state;
    return result.value;
  }

  getState(): bigint {
    return this.state;
  }
}

/**
 * Reduce a seed to 64 bits; zero is the generator's fixed point and is replaced by `fallback`
 */
export function normalizeSeed(seed: bigint, fallback: bigint): bigint {
  const masked = ((seed % (MASK_64 + 1n)) + MASK_64 + 1n) & MASK_64;
  return masked === 0n ? fallback & MASK_64 : masked;
}
