/**
 * Double Sigmoid Fitting Module
 *
 * Four interchangeable double-S models with analytic Jacobians, a prior
 * estimator, and a weighted Levenberg-Marquardt solver.
 */

// Types
export type {
  ParameterVector,
  ModelId,
  Precision,
  DerivativeMode,
  ObservationSeries,
  PreparedSeries,
  ModelEvaluation,
  DoubleSigmoidModel,
  AnalyticDoubleSigmoidModel,
  FitStatus,
  FitOptions,
  FitResult,
  LinearSolver,
  LinearSolveResult,
} from './types';

export { PARAMETER_COUNT, MIN_SERIES_LENGTH, LINEAR_SOLVE_STATUS } from './types';

// Errors
export {
  FitError,
  InputValidationError,
  UnknownSolverStatusError,
  ConvergenceFailureError,
} from './errors';

// Configuration and logging
export { DEFAULT_FIT_OPTIONS, resolveFitOptions } from './fit-config';
export {
  fitLogs,
  log,
  logDebug,
  logOnce,
  clearFitLogs,
  beginFitLog,
  getCurrentFit,
  setVerbosity,
  getVerbosity,
  setLogCallback,
} from './fit-logger';

// Models
export {
  createDoubleSigmoidModel,
  gaussianModel,
  hyperbolicTangentModel,
  logisticModel,
  sineModel,
  getModel,
  isModelId,
  listModels,
  MODEL_IDS,
  type ComponentShape,
  type ComponentGradient,
} from './models';
export { numericalJacobian, withNumericalJacobian } from './numerical-jacobian';

// Priors
export {
  estimatePriors,
  seasonMidpoint,
  segmentSeason,
  type PriorEstimate,
  type SeasonSegments,
  type SegmentMeans,
  type SegmentFallback,
} from './prior-estimator';

// Solver
export { WeightedResidualSystem, type NormalEquations } from './residual-system';
export { solveDenseLM, solveCholesky, dampDiagonal } from './dense-lm';
export { validateSeries, validateParameters } from './validation';
export { castSeries, castParameters, castValues } from './precision';

// Entry points
export {
  fitSeries,
  fitDoubleSigmoid,
  assertConverged,
  type DoubleSigmoidFitOptions,
  type FitReport,
} from './fit-series';

// Visualization collaborator
export {
  buildFitDiagram,
  renderFitDiagram,
  resolveDiagramTarget,
  type FitDiagram,
  type FitDiagramOptions,
  type FitDiagramRenderer,
  type DiagramOutputConfig,
  type DiagramTarget,
} from './fit-diagram';

// Synthetic data
export { synthesizeSeries, range, type SyntheticOptions } from './synthetic';
export { createSeededRandom, type SeededRandom } from './seeded-random';
