/**
 * Fitting entry points.
 *
 * The prior estimator and the solver never call each other; these
 * functions compose them for callers that want the whole pipeline.
 */

import { solveDenseLM } from './dense-lm';
import { ConvergenceFailureError } from './errors';
import { resolveFitOptions } from './fit-config';
import { beginFitLog } from './fit-logger';
import { getModel } from './models/registry';
import { castParameters, castSeries } from './precision';
import { estimatePriors, type PriorEstimate } from './prior-estimator';
import { WeightedResidualSystem } from './residual-system';
import { validateParameters, validateSeries } from './validation';
import type { DoubleSigmoidModel, FitOptions, FitResult, ObservationSeries, ParameterVector } from './types';

export interface DoubleSigmoidFitOptions extends Partial<FitOptions> {
  /** Starting parameters; estimated from the data when omitted */
  priors?: readonly number[];
}

export interface FitReport {
  model: DoubleSigmoidModel;
  /** Parameters the solver started from */
  priors: ParameterVector;
  /** Present when the priors were estimated from the data */
  priorEstimate?: PriorEstimate;
  result: FitResult;
}

/**
 * Fit a series with a caller-supplied model and starting parameters.
 *
 * Inputs are validated and cast to the requested precision (as copies)
 * before any numeric work. Starts a new fit log.
 */
export function fitSeries(
  series: ObservationSeries,
  model: DoubleSigmoidModel,
  priors: readonly number[],
  options: Partial<FitOptions> = {}
): FitResult {
  const opts = resolveFitOptions(options);
  validateSeries(series);
  const initial = validateParameters(priors);

  beginFitLog(model.name);
  return solveSeries(series, model, initial, opts);
}

function solveSeries(
  series: ObservationSeries,
  model: DoubleSigmoidModel,
  priors: ParameterVector,
  opts: FitOptions
): FitResult {
  const prepared = castSeries(series, opts.precision);
  const system = new WeightedResidualSystem(prepared, model, castParameters(priors, opts.precision));

  return solveDenseLM(system, opts);
}

/**
 * Fit a series with one of the registered models, estimating the priors
 * from the data unless they are supplied. Zero-weight samples take no part
 * in the estimate.
 */
export function fitDoubleSigmoid(
  series: ObservationSeries,
  modelId: string,
  options: DoubleSigmoidFitOptions = {}
): FitReport {
  const { priors, ...fitOptions } = options;
  const model = getModel(modelId);
  const opts = resolveFitOptions(fitOptions);
  validateSeries(series);
  const supplied = priors === undefined ? undefined : validateParameters(priors);

  beginFitLog(model.name);

  let priorEstimate: PriorEstimate | undefined;
  let start: ParameterVector;
  if (supplied !== undefined) {
    start = supplied;
  } else {
    priorEstimate = estimatePriors(castSeries(series, opts.precision), modelId);
    start = priorEstimate.parameters;
  }

  const result = solveSeries(series, model, start, opts);

  return { model, priors: start, priorEstimate, result };
}

/**
 * Throw ConvergenceFailureError unless the fit converged.
 */
export function assertConverged(result: FitResult): FitResult {
  if (result.status !== 'converged') {
    throw new ConvergenceFailureError(result);
  }
  return result;
}
