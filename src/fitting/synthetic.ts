/**
 * Synthetic series generation for tests and demonstrations.
 */

import { createSeededRandom } from './seeded-random';
import { validateParameters } from './validation';
import type { DoubleSigmoidModel, ObservationSeries } from './types';

export interface SyntheticOptions {
  /** Standard deviation of additive Gaussian noise (default 0) */
  noise?: number;
  /** Seed for the noise generator (default 1) */
  seed?: number;
}

/**
 * Evaluate a model at x and add seeded Gaussian noise.
 */
export function synthesizeSeries(
  model: DoubleSigmoidModel,
  parameters: readonly number[],
  x: readonly number[],
  options: SyntheticOptions = {}
): ObservationSeries {
  const { noise = 0, seed = 1 } = options;
  const params = validateParameters(parameters);
  const rng = createSeededRandom(seed);
  const { value } = model.evaluate(x, params);

  return {
    x: [...x],
    y: noise > 0 ? value.map(v => v + noise * rng.gaussian()) : value,
  };
}

/**
 * Evenly spaced abscissas: start, start + step, ... (count values)
 */
export function range(count: number, start = 0, step = 1): number[] {
  return Array.from({ length: count }, (_, i) => start + i * step);
}
