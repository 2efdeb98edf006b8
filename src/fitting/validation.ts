/**
 * Input validation for fitting.
 * Every check runs before numeric work so a failed call produces no partial output.
 */

import { InputValidationError } from './errors';
import {
  MIN_SERIES_LENGTH,
  PARAMETER_COUNT,
  type ObservationSeries,
  type ParameterVector,
} from './types';

function assertFiniteArray(field: string, values: readonly number[]): void {
  if (!Array.isArray(values)) {
    throw new InputValidationError(field, 'expected an array of numbers');
  }
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new InputValidationError(field, `element ${i} is not a finite number (${String(v)})`);
    }
  }
}

/**
 * Validate an observation series: equal lengths, at least MIN_SERIES_LENGTH
 * samples, finite values, non-negative weights with at least one positive.
 */
export function validateSeries(series: ObservationSeries): void {
  const { x, y, weights } = series;

  assertFiniteArray('x', x);
  assertFiniteArray('y', y);

  if (x.length !== y.length) {
    throw new InputValidationError('y', `length ${y.length} does not match x length ${x.length}`);
  }
  if (x.length < MIN_SERIES_LENGTH) {
    throw new InputValidationError(
      'x',
      `series has ${x.length} samples, at least ${MIN_SERIES_LENGTH} are required`
    );
  }

  if (weights !== undefined) {
    assertFiniteArray('weights', weights);
    if (weights.length !== x.length) {
      throw new InputValidationError(
        'weights',
        `length ${weights.length} does not match x length ${x.length}`
      );
    }
    const negative = weights.findIndex(w => w < 0);
    if (negative >= 0) {
      throw new InputValidationError('weights', `element ${negative} is negative`);
    }
    if (!weights.some(w => w > 0)) {
      throw new InputValidationError('weights', 'all weights are zero');
    }
  }
}

/**
 * Narrow an arbitrary numeric array to a 7-element parameter vector.
 */
export function validateParameters(params: readonly number[]): ParameterVector {
  assertFiniteArray('parameters', params);
  if (params.length !== PARAMETER_COUNT) {
    throw new InputValidationError(
      'parameters',
      `expected ${PARAMETER_COUNT} values, got ${params.length}`
    );
  }
  const [p0, p1, p2, p3, p4, p5, p6] = params;
  return [p0, p1, p2, p3, p4, p5, p6];
}
