/**
 * Numerical Jacobian
 *
 * Central-difference approximation of a model's Jacobian, used when the
 * caller asks for numeric derivatives or the model has no analytic ones.
 * Slower and less precise than the analytic providers, but interchangeable.
 */

import type { DoubleSigmoidModel } from './types';

/** Relative step for central difference computation */
const NUMERICAL_EPS = 1e-6;

/**
 * Jacobian of the model value via central differences:
 * jacobian[sample][parameter].
 */
export function numericalJacobian(
  model: DoubleSigmoidModel,
  x: readonly number[],
  params: readonly number[]
): number[][] {
  const n = x.length;
  const jacobian: number[][] = [];

  for (let i = 0; i < n; i++) {
    jacobian.push(new Array<number>(params.length).fill(0));
  }

  for (let p = 0; p < params.length; p++) {
    const h = NUMERICAL_EPS * Math.max(1, Math.abs(params[p]));

    const paramsPlus = [...params];
    paramsPlus[p] += h;
    const valuesPlus = model.evaluate(x, paramsPlus).value;

    const paramsMinus = [...params];
    paramsMinus[p] -= h;
    const valuesMinus = model.evaluate(x, paramsMinus).value;

    for (let i = 0; i < n; i++) {
      const grad = (valuesPlus[i] - valuesMinus[i]) / (2 * h);
      jacobian[i][p] = isFinite(grad) ? grad : 0;
    }
  }

  return jacobian;
}

/**
 * Wrap a model so its Jacobian is computed numerically.
 * Evaluation is unchanged.
 */
export function withNumericalJacobian(model: DoubleSigmoidModel): DoubleSigmoidModel {
  return {
    id: model.id,
    name: `Numerical(${model.name})`,
    evaluate: (x, params) => model.evaluate(x, params),
    jacobian: (x, params) => numericalJacobian(model, x, params),
  };
}
