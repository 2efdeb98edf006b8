import type { FitResult } from './types';

export class FitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FitError';
  }
}

/**
 * Raised before any numeric work when the inputs cannot be fitted.
 */
export class InputValidationError extends FitError {
  constructor(
    public field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
    this.name = 'InputValidationError';
  }
}

/**
 * The linear solver returned a status code the optimizer does not know.
 * Always fatal.
 */
export class UnknownSolverStatusError extends FitError {
  constructor(public status: number) {
    super(`Unknown linear solver status: ${status}`);
    this.name = 'UnknownSolverStatusError';
  }
}

/**
 * Thrown by assertConverged; carries the best-effort result for inspection.
 */
export class ConvergenceFailureError extends FitError {
  constructor(public result: FitResult) {
    super(
      `Fit did not converge (status=${result.status}, iterations=${result.iterations}, ` +
        `chi2=${result.chiSquare.toExponential(4)})`,
    );
    this.name = 'ConvergenceFailureError';
  }
}
