import { describe, expect, it } from 'vitest';
import { Xorshift64Star, nextSample, normalizeSeed } from './xorshift.js';

describe('xorshift64*', () => {
  it('should produce the known sequence for the default seed', () => {
    const first = nextSample(0x9e3779b97f4a7c15n);
    expect(first.state).toBe(0x3f721dffe39b342n);
    expect(first.value).toBe(-0.8944182532829836);

    const second = nextSample(first.state);
    expect(second.state).toBe(0x5830920757d41153n);
    expect(second.value).toBe(-0.33775943799629293);
  });

  it('should match the stateful wrapper step for step', () => {
    const rng = new Xorshift64Star(0x9e3779b97f4a7c15n);
    expect(rng.nextSigned()).toBe(-0.8944182532829836);
    expect(rng.nextSigned()).toBe(-0.33775943799629293);
    expect(rng.nextSigned()).toBe(0.3146347114824979);
    expect(rng.nextSigned()).toBe(-0.020079191987909084);
    expect(rng.getState()).toBe(0xb334115d4185b10dn);
  });

  it('should keep samples inside [-1, 1)', () => {
    const rng = new Xorshift64Star(12345n);
    for (let i = 0; i < 1000; i++) {
      const value = rng.nextSigned();
      expect(value).toBeGreaterThanOrEqual(-1);
      expect(value).toBeLessThan(1);
    }
  });

  it('should keep state within 64 bits', () => {
    const rng = new Xorshift64Star(0xffffffffffffffffn);
    for (let i = 0; i < 100; i++) {
      rng.nextSigned();
      expect(rng.getState()).toBeLessThanOrEqual(0xffffffffffffffffn);
      expect(rng.getState()).toBeGreaterThanOrEqual(0n);
    }
  });

  describe('normalizeSeed', () => {
    it('should replace the zero fixed point with the fallback', () => {
      expect(normalizeSeed(0n, 7n)).toBe(7n);
      expect(normalizeSeed(1n << 64n, 7n)).toBe(7n);
    });

    it('should wrap seeds into 64 bits', () => {
      expect(normalizeSeed((1n << 64n) + 5n, 7n)).toBe(5n);
      expect(normalizeSeed(-1n, 7n)).toBe(0xffffffffffffffffn);
    });
  });
});
