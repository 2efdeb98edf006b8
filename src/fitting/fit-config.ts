/**
 * Fit Configuration
 *
 * Defaults for the damped least-squares solver, and the check that
 * turns a partial, caller-supplied configuration into a complete one.
 * Configuration is always passed explicitly; there is no process-wide state.
 */

import { InputValidationError } from './errors';
import type { FitOptions } from './types';

export const DEFAULT_FIT_OPTIONS: FitOptions = {
  maxIterations: 20,
  tolerance: 1e-3,
  precision: 'double',
  derivatives: 'analytic',
  initialDamping: 1e-3,
  dampingIncrease: 10,
  dampingDecrease: 0.1,
  minDamping: 1e-12,
  maxDamping: 1e12,
  maxDampingRetries: 10,
  verbose: false,
};

function requirePositive(field: keyof FitOptions, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InputValidationError(field, `must be a positive number (got ${value})`);
  }
}

function requirePositiveInteger(field: keyof FitOptions, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InputValidationError(field, `must be a positive integer (got ${value})`);
  }
}

/**
 * Merge caller options over the defaults and validate the result.
 */
export function resolveFitOptions(options: Partial<FitOptions> = {}): FitOptions {
  const opts: FitOptions = { ...DEFAULT_FIT_OPTIONS, ...options };

  requirePositiveInteger('maxIterations', opts.maxIterations);
  requirePositive('tolerance', opts.tolerance);
  requirePositive('initialDamping', opts.initialDamping);
  requirePositive('minDamping', opts.minDamping);
  requirePositive('maxDamping', opts.maxDamping);
  requirePositiveInteger('maxDampingRetries', opts.maxDampingRetries);

  if (!(opts.dampingIncrease > 1)) {
    throw new InputValidationError('dampingIncrease', `must be greater than 1 (got ${opts.dampingIncrease})`);
  }
  if (!(opts.dampingDecrease > 0 && opts.dampingDecrease < 1)) {
    throw new InputValidationError(
      'dampingDecrease',
      `must lie strictly between 0 and 1 (got ${opts.dampingDecrease})`
    );
  }
  if (opts.minDamping > opts.maxDamping) {
    throw new InputValidationError('minDamping', 'must not exceed maxDamping');
  }
  if (opts.precision !== 'single' && opts.precision !== 'double') {
    throw new InputValidationError('precision', `unknown precision '${String(opts.precision)}'`);
  }
  if (opts.derivatives !== 'analytic' && opts.derivatives !== 'numeric') {
    throw new InputValidationError('derivatives', `unknown derivative mode '${String(opts.derivatives)}'`);
  }

  return opts;
}
