/**
 * Dense Levenberg-Marquardt Solver
 *
 * Weighted nonlinear least squares for the 7-parameter double-S models.
 *
 * Minimizes: chi2 = sum_i w_i * (y_i - f(x_i; p))^2
 *
 * Each iteration solves the Marquardt-damped normal equations
 *   (J^T W J + lambda * diag(J^T W J)) dp = J^T W r
 * with a dense Cholesky factorization, then accepts or rejects p + dp.
 */

import { UnknownSolverStatusError } from './errors';
import { resolveFitOptions } from './fit-config';
import { log, logDebug, logOnce } from './fit-logger';
import type { WeightedResidualSystem } from './residual-system';
import {
  LINEAR_SOLVE_STATUS,
  type FitOptions,
  type FitResult,
  type FitStatus,
  type LinearSolveResult,
  type ParameterVector,
} from './types';

/**
 * Solve the system in place, starting from system.parameters.
 *
 * The posterior is written back to system.parameters and copied into the
 * result; a non-converged result still carries the best parameters found.
 *
 * @param system The system to solve
 * @param options Solver options
 * @returns Solver result
 */
export function solveDenseLM(
  system: WeightedResidualSystem,
  options: Partial<FitOptions> = {}
): FitResult {
  const opts = resolveFitOptions(options);
  const solveLinear = opts.linearSolver ?? solveCholesky;
  const trace = opts.verbose ? log : logDebug;

  let parameters: ParameterVector = [...system.parameters];
  let lambda = opts.initialDamping;

  let residuals = system.computeResiduals(parameters);
  let chiSquare = system.computeChiSquare(residuals);
  const initialChiSquare = chiSquare;
  const chiSquareHistory = [chiSquare];

  trace(`[LM] ${system.model.name}: initial chi2=${chiSquare.toExponential(6)}`);

  let iteration = 0;
  let status: FitStatus | null = null;

  if (!Number.isFinite(chiSquare)) {
    logOnce(`[LM] ${system.model.name}: prior parameters give a non-finite chi-square`);
    status = 'diverged';
  }

  while (status === null && iteration < opts.maxIterations) {
    iteration++;

    const J = system.computeJacobian(parameters, opts.derivatives);
    const { JtWJ, JtWr } = system.computeNormalEquations(J, residuals);

    let stepAccepted = false;

    for (let retry = 0; retry < opts.maxDampingRetries; retry++) {
      const { status: solveStatus, solution: step } = solveLinear(dampDiagonal(JtWJ, lambda), JtWr);

      let trialChiSquare = Infinity;
      let trialParameters: ParameterVector = parameters;
      let trialResiduals: number[] = residuals;

      switch (solveStatus) {
        case LINEAR_SOLVE_STATUS.OK: {
          trialParameters = addStep(parameters, step);
          trialResiduals = system.computeResiduals(trialParameters);
          trialChiSquare = system.computeChiSquare(trialResiduals);
          break;
        }
        case LINEAR_SOLVE_STATUS.NOT_POSITIVE_DEFINITE:
        case LINEAR_SOLVE_STATUS.NON_FINITE:
          trace(`[LM] iter ${iteration}: damped system not solvable (status ${solveStatus}), lambda=${lambda.toExponential(2)}`);
          break;
        default:
          throw new UnknownSolverStatusError(solveStatus);
      }

      if (trialChiSquare <= chiSquare) {
        // Accept the step
        const reduction = chiSquare - trialChiSquare;
        parameters = trialParameters;
        residuals = trialResiduals;
        chiSquare = trialChiSquare;
        chiSquareHistory.push(chiSquare);

        // Decrease damping (trust the linear approximation more)
        lambda = Math.max(lambda * opts.dampingDecrease, opts.minDamping);

        trace(
          `[LM] iter ${iteration}: chi2=${chiSquare.toExponential(6)}, lambda=${lambda.toExponential(2)}, reduction=${reduction.toExponential(4)}`
        );

        if (reduction < opts.tolerance) {
          status = 'converged';
        }
        stepAccepted = true;
        break;
      }

      if (Number.isFinite(trialChiSquare) && trialChiSquare - chiSquare < opts.tolerance) {
        // The step no longer changes chi2 measurably: keep the current estimate
        trace(`[LM] iter ${iteration}: rejected step within tolerance, chi2=${chiSquare.toExponential(6)}`);
        status = 'converged';
        stepAccepted = true;
        break;
      }

      // Reject step, increase damping
      lambda *= opts.dampingIncrease;
      if (lambda > opts.maxDamping) {
        break;
      }
    }

    if (!stepAccepted) {
      logOnce(`[LM] ${system.model.name}: could not find a step that reduces chi2 (lambda=${lambda.toExponential(2)})`);
      status = 'diverged';
    }
  }

  const finalStatus: FitStatus = status ?? 'max-iterations';

  // Update system parameters
  system.parameters = [...parameters];

  const standardError = system.computeStandardError(chiSquare);

  trace(
    `[LM] ${system.model.name}: ${finalStatus} after ${iteration} iterations, chi2=${chiSquare.toExponential(6)}, stderr=${standardError.toExponential(4)}`
  );

  return {
    status: finalStatus,
    parameters: [...parameters],
    iterations: iteration,
    chiSquare,
    initialChiSquare,
    standardError,
    chiSquareHistory,
    damping: lambda,
  };
}

function addStep(parameters: ParameterVector, step: readonly number[]): ParameterVector {
  const [p0, p1, p2, p3, p4, p5, p6] = parameters;
  return [
    p0 + step[0],
    p1 + step[1],
    p2 + step[2],
    p3 + step[3],
    p4 + step[4],
    p5 + step[5],
    p6 + step[6],
  ];
}

/**
 * Marquardt damping: A + lambda * diag(A)
 */
export function dampDiagonal(A: number[][], lambda: number): number[][] {
  return A.map((row, i) => row.map((val, j) => (i === j ? val * (1 + lambda) : val)));
}

/**
 * Solve A * x = b using Cholesky decomposition
 */
export function solveCholesky(A: number[][], b: number[]): LinearSolveResult {
  const n = A.length;

  if (A.some(row => row.some(v => !Number.isFinite(v))) || b.some(v => !Number.isFinite(v))) {
    return { status: LINEAR_SOLVE_STATUS.NON_FINITE, solution: [] };
  }

  // L * L^T = A, then L * y = b, then L^T * x = y
  const L = choleskyDecompose(A);
  if (!L) {
    return { status: LINEAR_SOLVE_STATUS.NOT_POSITIVE_DEFINITE, solution: [] };
  }

  // Forward substitution: L * y = b
  const y = new Array<number>(n).fill(0);
  for (let i = 0; i < n; i++) {
    let sum = b[i];
    for (let j = 0; j < i; j++) {
      sum -= L[i][j] * y[j];
    }
    y[i] = sum / L[i][i];
  }

  // Back substitution: L^T * x = y
  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = y[i];
    for (let j = i + 1; j < n; j++) {
      sum -= L[j][i] * x[j];
    }
    x[i] = sum / L[i][i];
  }

  if (x.some(v => !Number.isFinite(v))) {
    return { status: LINEAR_SOLVE_STATUS.NON_FINITE, solution: [] };
  }

  return { status: LINEAR_SOLVE_STATUS.OK, solution: x };
}

/**
 * Cholesky decomposition: A = L * L^T
 * Returns L (lower triangular) or null if not positive definite
 */
function choleskyDecompose(A: number[][]): number[][] | null {
  const n = A.length;
  const L: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    for (let j = 0; j <= i; j++) {
      let sum = A[i][j];

      for (let k = 0; k < j; k++) {
        sum -= L[i][k] * L[j][k];
      }

      if (i === j) {
        if (sum <= 0) {
          return null;
        }
        L[i][j] = Math.sqrt(sum);
      } else {
        L[i][j] = sum / L[j][j];
      }
    }
  }

  return L;
}
