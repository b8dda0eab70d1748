import { describe, expect, it } from 'vitest';

import { HeightField } from '../src/core/HeightField';
import { resolveConfig } from '../src/core/types';
import { PerlinNoise } from '../src/utils/PerlinNoise';
import { SeededRandom } from '../src/utils/SeededRandom';

const coords: Array<[number, number]> = [
  [0, 0],
  [128, 0],
  [0, -128],
  [384, 512],
  [-1280, 768],
  [4096, -4096]
];

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandom(128300);
    const b = new SeededRandom(128300);
    for (let i = 0; i < 10; i++) expect(a.next()).toBe(b.next());
  });

  it('wraps negative seeds to 32 bits', () => {
    const negative = new SeededRandom(-5);
    const wrapped = new SeededRandom(2 ** 32 - 5);
    for (let i = 0; i < 10; i++) {
      const value = negative.next();
      expect(value).toBe(wrapped.next());
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('starts distinct streams for seeds that differ below 2^32', () => {
    // congruent modulo 233280
    const a = new SeededRandom(300);
    const b = new SeededRandom(300 + 233280);
    const c = new SeededRandom(-300);
    expect(a.next()).not.toBe(b.next());
    expect(new SeededRandom(300).next()).not.toBe(c.next());
  });

  it('draws integers from an inclusive range', () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 200; i++) {
      const n = rng.rangeInt(2, 7);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(2);
      expect(n).toBeLessThanOrEqual(7);
    }
  });
});

describe('PerlinNoise', () => {
  it('stays within [-1, 1]', () => {
    const noise = new PerlinNoise(300);
    for (let i = 0; i < 500; i++) {
      const value = noise.noise3D(i * 0.37 - 40, i * 0.71 + 3, 300);
      expect(value).toBeGreaterThanOrEqual(-1);
      expect(value).toBeLessThanOrEqual(1);
    }
  });

  it('is zero on integer lattice points', () => {
    const noise = new PerlinNoise(300);
    expect(noise.noise3D(4, -7, 300)).toBe(0);
  });

  it('is deterministic per seed', () => {
    const a = new PerlinNoise(42);
    const b = new PerlinNoise(42);
    expect(a.noise3D(1.25, 3.5, 0.75)).toBe(b.noise3D(1.25, 3.5, 0.75));
  });
});

describe('HeightField', () => {
  it('returns identical heights for repeated and independent calls', () => {
    const config = resolveConfig();
    const first = new HeightField(config);
    const second = new HeightField(config);

    for (const [x, z] of coords) {
      const height = first.computeHeight({ x, z });
      expect(first.computeHeight({ x, z })).toBe(height);
      expect(second.computeHeight({ x, z })).toBe(height);
    }
  });

  it('does not depend on call order', () => {
    const config = resolveConfig();
    const forward = new HeightField(config);
    const backward = new HeightField(config);
    const a = coords.map(([x, z]) => forward.computeHeight({ x, z }));
    const b = [...coords].reverse().map(([x, z]) => backward.computeHeight({ x, z })).reverse();
    expect(b).toEqual(a);
  });

  it('aligns heights to the step relative to the origin height', () => {
    const field = new HeightField(resolveConfig({ originHeight: 2, heightStep: 4 }));
    for (const [x, z] of coords) {
      const height = field.computeHeight({ x, z });
      expect(Number.isInteger((height - 2) / 4)).toBe(true);
    }
  });

  it('keeps heights within the scaled noise band', () => {
    // noise in [-1, 1] * 10, floored to multiples of 4
    const field = new HeightField(resolveConfig());
    for (let i = -20; i <= 20; i++) {
      const height = field.computeHeight({ x: i * 128, z: i * -256 });
      expect(height).toBeGreaterThanOrEqual(-12);
      expect(height).toBeLessThanOrEqual(8);
    }
  });

  it('computes a reproducible, step-aligned height at the origin for seed 300', () => {
    const config = resolveConfig({ worldSeed: 300, heightStep: 4, originHeight: 0 });
    const a = new HeightField(config).computeHeight({ x: 0, z: 0 });
    const b = new HeightField(config).computeHeight({ x: 0, z: 0 });
    expect(a).toBe(b);
    expect(Number.isInteger(a / 4)).toBe(true);
    // (0, 0, 300) is a lattice point of the noise
    expect(a).toBe(0);
  });

  it('flattens the world when the variation scale is zero', () => {
    const field = new HeightField(resolveConfig({ heightVariationScale: 0, originHeight: 16 }));
    for (const [x, z] of coords) expect(field.computeHeight({ x, z })).toBe(16);
  });
});
