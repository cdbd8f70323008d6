import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeRandom, rollPercent } from '../src/rng.ts';
import { scriptedRandom } from './helpers.ts';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('makeRandom', () => {
  it('repeats the same draws for the same seed', () => {
    const a = makeRandom('test-seed');
    const b = makeRandom('test-seed');
    const drawsA = Array.from({ length: 5 }, () => a.next());
    const drawsB = Array.from({ length: 5 }, () => b.next());
    expect(drawsA).toEqual(drawsB);
  });

  it('keeps int draws inside the range', () => {
    const rng = makeRandom('range');
    for (let i = 0; i < 200; i++) {
      const value = rng.int(100);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(100);
    }
    expect(rng.int(1)).toBe(0);
  });

  it('treats probabilities at the ends as certain', () => {
    const rng = makeRandom('edges');
    expect(rng.chance(0)).toBe(false);
    expect(rng.chance(1)).toBe(true);
  });
});

describe('rollPercent', () => {
  it('passes when the draw is below the percentage', () => {
    expect(rollPercent(scriptedRandom([0.049]), 5)).toBe(true);
    expect(rollPercent(scriptedRandom([0.051]), 5)).toBe(false);
    expect(rollPercent(scriptedRandom([0]), 0)).toBe(false);
    expect(rollPercent(scriptedRandom([0.999]), 100)).toBe(true);
  });
});
