/**
 * Precision casting.
 *
 * Single precision is applied once, at entry, to copies of the caller's
 * arrays. Caller buffers are never written.
 */

import type { ObservationSeries, ParameterVector, Precision, PreparedSeries } from './types';

export function castValues(values: readonly number[], precision: Precision): number[] {
  return precision === 'single' ? values.map(Math.fround) : [...values];
}

/**
 * Copy a series at the requested precision, filling default weights of 1.
 */
export function castSeries(series: ObservationSeries, precision: Precision): PreparedSeries {
  const weights = series.weights ?? new Array<number>(series.x.length).fill(1);
  return {
    x: castValues(series.x, precision),
    y: castValues(series.y, precision),
    weights: castValues(weights, precision),
  };
}

export function castParameters(params: ParameterVector, precision: Precision): ParameterVector {
  if (precision === 'double') {
    return [...params];
  }
  const [p0, p1, p2, p3, p4, p5, p6] = params;
  return [
    Math.fround(p0),
    Math.fround(p1),
    Math.fround(p2),
    Math.fround(p3),
    Math.fround(p4),
    Math.fround(p5),
    Math.fround(p6),
  ];
}
