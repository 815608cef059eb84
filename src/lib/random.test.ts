import { describe, it, expect } from 'vitest';
import { createSeededRandom, pickIndex, pickUniform, randomRange } from './random.ts';
import { randomInsideCircle } from './vec2.ts';

describe('createSeededRandom', () => {
  it('repeats its sequence for a seed and stays in [0, 1)', () => {
    const a = createSeededRandom(99);
    const b = createSeededRandom(99);
    for (let index = 0; index < 100; index += 1) {
      const value = a();
      expect(b()).toBe(value);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('pickIndex', () => {
  it('keeps a roll of exactly 1 in range', () => {
    expect(pickIndex(4, () => 1)).toBe(3);
    expect(pickIndex(4, () => 0.5)).toBe(2);
    expect(pickIndex(4, () => Number.NaN)).toBe(0);
  });

  it('throws on an empty collection', () => {
    expect(() => pickUniform([], () => 0)).toThrow(RangeError);
  });
});

describe('randomRange', () => {
  it('maps the roll onto the window', () => {
    expect(randomRange(0.8, 2, () => 0.5)).toBeCloseTo(1.4);
    expect(randomRange(3, 3, () => 0.5)).toBe(3);
  });
});

describe('randomInsideCircle', () => {
  it('stays inside the radius', () => {
    const random = createSeededRandom(5);
    for (let index = 0; index < 50; index += 1) {
      const point = randomInsideCircle(8, random);
      expect(Math.hypot(point.x, point.y)).toBeLessThanOrEqual(8);
    }
    expect(randomInsideCircle(0, random)).toEqual({ x: 0, y: 0 });
  });
});
