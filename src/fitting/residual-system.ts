/**
 * Weighted Residual System
 *
 * Binds one prepared series to one model and computes everything the
 * damped least-squares solver needs: residuals r = y - f(x; p), the
 * weighted chi-square, the Jacobian, and the weighted normal equations.
 */

import { numericalJacobian } from './numerical-jacobian';
import type { DerivativeMode, DoubleSigmoidModel, ParameterVector, PreparedSeries } from './types';

export interface NormalEquations {
  /** J^T W J (7 x 7) */
  JtWJ: number[][];
  /** J^T W r (7) */
  JtWr: number[];
}

export class WeightedResidualSystem {
  /** Current estimate; the solver writes the posterior back here */
  public parameters: ParameterVector;

  private readonly _effectiveSamples: number;

  constructor(
    public readonly series: PreparedSeries,
    public readonly model: DoubleSigmoidModel,
    initialParameters: ParameterVector
  ) {
    this.parameters = [...initialParameters];
    this._effectiveSamples = series.weights.filter(w => w > 0).length;
  }

  /** Number of samples with positive weight */
  get effectiveSamples(): number {
    return this._effectiveSamples;
  }

  /**
   * Residuals y - f(x; params)
   */
  computeResiduals(params: readonly number[]): number[] {
    const { value } = this.model.evaluate(this.series.x, params);
    return this.series.y.map((y, i) => y - value[i]);
  }

  /**
   * Weighted chi-square. Excluded samples contribute nothing, whatever
   * their residual.
   */
  computeChiSquare(residuals: readonly number[]): number {
    const weights = this.series.weights;
    let sum = 0;
    for (let i = 0; i < residuals.length; i++) {
      if (weights[i] > 0) {
        sum += weights[i] * residuals[i] * residuals[i];
      }
    }
    return sum;
  }

  /**
   * Jacobian of the model value at params, [samples x 7].
   * Falls back to central differences when the model has no analytic Jacobian.
   */
  computeJacobian(params: readonly number[], mode: DerivativeMode): number[][] {
    if (mode === 'analytic' && this.model.jacobian) {
      return this.model.jacobian(this.series.x, params);
    }
    return numericalJacobian(this.model, this.series.x, params);
  }

  /**
   * Compute J^T W J and J^T W r, skipping excluded samples.
   */
  computeNormalEquations(J: number[][], residuals: readonly number[]): NormalEquations {
    const weights = this.series.weights;
    const m = J.length;
    const n = J[0]?.length ?? 0;

    const JtWJ: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    for (let i = 0; i < n; i++) {
      for (let j = i; j < n; j++) {
        let sum = 0;
        for (let k = 0; k < m; k++) {
          if (weights[k] > 0) {
            sum += weights[k] * J[k][i] * J[k][j];
          }
        }
        JtWJ[i][j] = sum;
        JtWJ[j][i] = sum;
      }
    }

    const JtWr: number[] = new Array<number>(n).fill(0);
    for (let i = 0; i < n; i++) {
      let sum = 0;
      for (let k = 0; k < m; k++) {
        if (weights[k] > 0) {
          sum += weights[k] * J[k][i] * residuals[k];
        }
      }
      JtWr[i] = sum;
    }

    return { JtWJ, JtWr };
  }

  /**
   * sqrt(chi2 / max(1, nEffective - 7))
   */
  computeStandardError(chiSquare: number): number {
    const dof = Math.max(1, this._effectiveSamples - this.parameters.length);
    return Math.sqrt(chiSquare / dof);
  }
}
