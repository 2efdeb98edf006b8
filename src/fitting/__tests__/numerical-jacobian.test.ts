import { describe, it, expect } from '@jest/globals';
import { logisticModel, sineModel } from '../models';
import { numericalJacobian, withNumericalJacobian } from '../numerical-jacobian';

const X = [1.5, 4.2, 6.8, 13.1, 16.7];
const PARAMS = [0.1, 3, 5, 0.9, -3, 15, 1.1];

describe('numericalJacobian', () => {
  it('approximates the analytic Jacobian', () => {
    const numeric = numericalJacobian(logisticModel, X, PARAMS);
    const analytic = logisticModel.jacobian(X, PARAMS);

    numeric.forEach((row, i) => {
      row.forEach((value, j) => {
        expect(value).toBeCloseTo(analytic[i][j], 6);
      });
    });
  });

  it('is zero for parameters that do not move the curve', () => {
    // Both sine windows lie beyond every sample
    const [row] = numericalJacobian(sineModel, [0], [0, 1, 10, 11, -1, 20, 21]);

    expect(row).toEqual([1, 0, 0, 0, 0, 0, 0]);
  });
});

describe('withNumericalJacobian', () => {
  it('keeps evaluation and swaps in central differences', () => {
    const wrapped = withNumericalJacobian(logisticModel);

    expect(wrapped.id).toBe('logistic');
    expect(wrapped.name).toBe('Numerical(Logistic)');
    expect(wrapped.evaluate(X, PARAMS)).toEqual(logisticModel.evaluate(X, PARAMS));
    expect(wrapped.jacobian?.(X, PARAMS)).toEqual(numericalJacobian(logisticModel, X, PARAMS));
  });
});
