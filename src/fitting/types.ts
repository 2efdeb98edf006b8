/**
 * Double Sigmoid Fitting Types
 *
 * Shared data model for the models, the prior estimator and the
 * damped least-squares solver.
 */

/** Number of parameters in every double-S model */
export const PARAMETER_COUNT = 7;

/** Minimum number of samples a series must carry to be fitted */
export const MIN_SERIES_LENGTH = 10;

/**
 * Parameter layout shared by all model variants:
 *
 * - p0: base level
 * - p1: amplitude of the first (rising) component
 * - p2, p3: phase/shape controls of the rising transition
 * - p4: amplitude of the second (falling) component
 * - p5, p6: phase/shape controls of the falling transition
 */
export type ParameterVector = [number, number, number, number, number, number, number];

export type ModelId = 'gaussian' | 'hyperbolic-tangent' | 'logistic' | 'sine';

/** Numeric precision of the inputs for one fit */
export type Precision = 'single' | 'double';

/** How the solver obtains the Jacobian */
export type DerivativeMode = 'analytic' | 'numeric';

/**
 * Time-ordered measurements. A weight of 0 excludes the sample from the
 * objective; omitted weights default to 1.
 */
export interface ObservationSeries {
  x: readonly number[];
  y: readonly number[];
  weights?: readonly number[];
}

/** Series after validation and precision cast: weights always present */
export interface PreparedSeries {
  readonly x: readonly number[];
  readonly y: readonly number[];
  readonly weights: readonly number[];
}

/**
 * Result of evaluating a model at a set of abscissas.
 * All three arrays have the same length as the input.
 */
export interface ModelEvaluation {
  value: number[];
  component1: number[];
  component2: number[];
}

/**
 * A double-S model: evaluation plus (optionally) its analytic Jacobian.
 * A model without `jacobian` is fitted with central differences.
 */
export interface DoubleSigmoidModel {
  readonly id: string;
  readonly name: string;

  /**
   * Evaluate the curve and its two additive components at every abscissa.
   */
  evaluate(x: readonly number[], params: readonly number[]): ModelEvaluation;

  /**
   * Partial derivatives of the curve value: jacobian[sample][parameter],
   * shape [x.length x 7].
   */
  jacobian?(x: readonly number[], params: readonly number[]): number[][];
}

/**
 * A model that always provides its analytic Jacobian.
 */
export interface AnalyticDoubleSigmoidModel extends DoubleSigmoidModel {
  jacobian(x: readonly number[], params: readonly number[]): number[][];
}

export type FitStatus = 'converged' | 'diverged' | 'max-iterations';

/**
 * Status codes returned by the linear solver of the damped normal equations.
 * Any other value is treated as fatal by the optimizer.
 */
export const LINEAR_SOLVE_STATUS = {
  OK: 0,
  NOT_POSITIVE_DEFINITE: 1,
  NON_FINITE: 2,
} as const;

export interface LinearSolveResult {
  status: number;
  /** Solution vector; empty unless status is OK */
  solution: number[];
}

/**
 * Solves A x = b for a symmetric system.
 */
export type LinearSolver = (A: number[][], b: number[]) => LinearSolveResult;

/**
 * Options for the damped least-squares solver
 */
export interface FitOptions {
  /** Maximum number of iterations */
  maxIterations: number;

  /** Convergence tolerance on the absolute chi-square change */
  tolerance: number;

  /** Precision the inputs are cast to at entry */
  precision: Precision;

  /** Analytic Jacobian or central differences */
  derivatives: DerivativeMode;

  /** Initial damping parameter (lambda) */
  initialDamping: number;

  /** Factor to increase damping on step rejection */
  dampingIncrease: number;

  /** Factor to decrease damping on step acceptance */
  dampingDecrease: number;

  /** Minimum damping value */
  minDamping: number;

  /** Maximum damping value; exceeding it ends the fit as diverged */
  maxDamping: number;

  /** Rejected steps allowed within one iteration before the fit diverges */
  maxDampingRetries: number;

  /** Whether to log iteration info */
  verbose: boolean;

  /** Replaces the built-in Cholesky solve */
  linearSolver?: LinearSolver;
}

/**
 * Outcome of one fit. Parameters are the best-effort posterior whatever
 * the status.
 */
export interface FitResult {
  status: FitStatus;

  /** Posterior parameters */
  parameters: ParameterVector;

  /** Number of iterations taken */
  iterations: number;

  /** Final weighted chi-square */
  chiSquare: number;

  /** Chi-square at the prior parameters */
  initialChiSquare: number;

  /** sqrt(chiSquare / max(1, nEffective - 7)) */
  standardError: number;

  /** Chi-square at the prior followed by every accepted step */
  chiSquareHistory: number[];

  /** Damping at exit */
  damping: number;
}
