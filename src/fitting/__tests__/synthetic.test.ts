import { describe, it, expect } from '@jest/globals';
import { logisticModel } from '../models';
import { createSeededRandom } from '../seeded-random';
import { range, synthesizeSeries } from '../synthetic';

describe('createSeededRandom', () => {
  it('follows the LCG sequence', () => {
    const rng = createSeededRandom(0);

    expect(rng.random()).toBe(1013904223 / 0x100000000);
    expect(rng.getState()).toBe(1013904223);
  });

  it('repeats the same sequence for the same seed', () => {
    const a = createSeededRandom(5);
    const b = createSeededRandom(5);

    const first = [a.gaussian(), a.gaussian(), a.gaussian(), a.random()];
    const second = [b.gaussian(), b.gaussian(), b.gaussian(), b.random()];

    expect(first).toEqual(second);
  });

  it('produces different sequences for different seeds', () => {
    expect(createSeededRandom(1).random()).not.toBe(createSeededRandom(2).random());
  });

  it('keeps uniform values in [0, 1)', () => {
    const rng = createSeededRandom(123);
    for (let i = 0; i < 1000; i++) {
      const u = rng.random();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });
});

describe('range', () => {
  it('produces evenly spaced abscissas', () => {
    expect(range(4)).toEqual([0, 1, 2, 3]);
    expect(range(3, 10, 0.5)).toEqual([10, 10.5, 11]);
    expect(range(0)).toEqual([]);
  });
});

describe('synthesizeSeries', () => {
  const params = [0, 5, 5, 1, -5, 15, 1];

  it('returns the exact model values without noise', () => {
    const x = range(20);

    const series = synthesizeSeries(logisticModel, params, x);

    expect(series.x).toEqual(x);
    expect(series.x).not.toBe(x);
    expect(series.y).toEqual(logisticModel.evaluate(x, params).value);
  });

  it('adds reproducible noise', () => {
    const a = synthesizeSeries(logisticModel, params, range(20), { noise: 0.1, seed: 3 });
    const b = synthesizeSeries(logisticModel, params, range(20), { noise: 0.1, seed: 3 });
    const clean = logisticModel.evaluate(range(20), params).value;

    expect(a.y).toEqual(b.y);
    expect(a.y).not.toEqual(clean);
  });

  it('rejects a parameter vector of the wrong length', () => {
    expect(() => synthesizeSeries(logisticModel, [1, 2], range(20))).toThrow('parameters: expected 7 values, got 2');
  });
});
