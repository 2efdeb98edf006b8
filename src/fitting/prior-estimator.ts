/**
 * Prior Estimator
 *
 * Derives a starting parameter vector from the raw series by splitting it
 * into a low phase before the growing season, the season itself, and a low
 * phase after it. The solver's convergence depends heavily on this guess.
 */

import { InputValidationError } from './errors';
import { log } from './fit-logger';
import { isModelId, MODEL_IDS } from './models/registry';
import { validateSeries } from './validation';
import type { ModelId, ObservationSeries, ParameterVector } from './types';

/**
 * Sample indices of the three phases of the season.
 */
export interface SeasonSegments {
  /** Low samples preceding the first in-season sample */
  before: number[];
  /** Samples at or above the midpoint */
  during: number[];
  /** Low samples following the last in-season sample */
  after: number[];
  /** First index attaining the maximum within the season */
  firstMax: number;
  /** Last index attaining the maximum within the season */
  lastMax: number;
}

export interface SegmentMeans {
  before: number;
  during: number;
  after: number;
}

/** Season edges that had no low samples and were anchored on the season itself */
export type SegmentFallback = 'before' | 'after';

export interface PriorEstimate {
  modelId: ModelId;
  /** Starting parameters; segment indices refer to the positive-weight samples only */
  parameters: ParameterVector;
  /** Threshold separating low and in-season samples */
  midpoint: number;
  segments: SeasonSegments;
  means: SegmentMeans;
  fallbacks: SegmentFallback[];
}

/**
 * Half the range of y.
 *
 * Note this is (max - min) / 2, not min + (max - min) / 2: the threshold is
 * only the true mid-value when min is 0. The half-range threshold is kept
 * as observed.
 */
export function seasonMidpoint(y: readonly number[]): number {
  let min = Infinity;
  let max = -Infinity;
  for (const v of y) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return (max - min) / 2;
}

/**
 * Partition the series into before / during / after the growing season.
 */
export function segmentSeason(x: readonly number[], y: readonly number[], midpoint: number): SeasonSegments {
  const during: number[] = [];
  for (let i = 0; i < y.length; i++) {
    if (y[i] >= midpoint) during.push(i);
  }

  if (during.length === 0) {
    throw new InputValidationError(
      'y',
      `no sample reaches the season threshold ${midpoint} (half the range of y)`
    );
  }

  const xStart = x[during[0]];
  const xEnd = x[during[during.length - 1]];

  const before: number[] = [];
  const after: number[] = [];
  for (let i = 0; i < y.length; i++) {
    if (y[i] > midpoint) continue;
    if (x[i] < xStart) before.push(i);
    else if (x[i] > xEnd) after.push(i);
  }

  let maxValue = -Infinity;
  for (const i of during) {
    if (y[i] > maxValue) maxValue = y[i];
  }
  const maxima = during.filter(i => y[i] === maxValue);

  return {
    before,
    during,
    after,
    firstMax: maxima[0],
    lastMax: maxima[maxima.length - 1],
  };
}

/**
 * Mean of y over the contiguous index span [first, last], including any
 * interior samples that fall outside the segment itself.
 */
function spanMean(y: readonly number[], first: number, last: number): number {
  let sum = 0;
  for (let i = first; i <= last; i++) {
    sum += y[i];
  }
  return sum / (last - first + 1);
}

/**
 * Estimate starting parameters for the given model from raw data.
 * Samples with zero weight are dropped first, so an excluded sample never
 * moves the estimate.
 *
 * @throws InputValidationError for an unknown model id or an unusable series
 */
export function estimatePriors(series: ObservationSeries, modelId: string): PriorEstimate {
  if (!isModelId(modelId)) {
    throw new InputValidationError(
      'model',
      `unknown model '${modelId}' (expected one of ${MODEL_IDS.join(', ')})`
    );
  }
  validateSeries(series);

  const { x, y } = positiveWeightSamples(series);
  const n = x.length;
  const midpoint = seasonMidpoint(y);
  const segments = segmentSeason(x, y, midpoint);
  const { before, during, after, firstMax, lastMax } = segments;

  const firstDuring = during[0];
  const lastDuring = during[during.length - 1];

  const fallbacks: SegmentFallback[] = [];

  // Without low samples on an edge, anchor that edge on the season boundary
  let firstBefore = firstDuring;
  let lastBefore = firstDuring;
  if (before.length > 0) {
    firstBefore = before[0];
    lastBefore = before[before.length - 1];
  } else {
    fallbacks.push('before');
  }

  let firstAfter = lastDuring;
  let lastAfter = lastDuring;
  if (after.length > 0) {
    firstAfter = after[0];
    lastAfter = after[after.length - 1];
  } else {
    fallbacks.push('after');
  }

  if (fallbacks.length > 0) {
    log(`[Priors] no low samples ${fallbacks.join(' and ')} the season; anchoring on the season edge`);
  }

  const means: SegmentMeans = {
    before: spanMean(y, firstBefore, lastBefore),
    during: spanMean(y, firstDuring, lastDuring),
    after: spanMean(y, firstAfter, lastAfter),
  };

  const p0 = means.before;
  const p1 = means.during - means.before;
  const p4 = means.after - means.during;

  // Lower bound for widths and fallback steepness: the mean sample spacing
  const spacing = Math.abs(x[n - 1] - x[0]) / (n - 1) || 1;

  const points: TransitionPoints = {
    lastBefore: { x: x[lastBefore], y: y[lastBefore] },
    firstDuring: { x: x[firstDuring], y: y[firstDuring] },
    firstMax: x[firstMax],
    lastMax: x[lastMax],
    lastDuring: { x: x[lastDuring], y: y[lastDuring] },
    firstAfter: { x: x[firstAfter], y: y[firstAfter] },
  };

  const [p2, p3, p5, p6] = PHASE_MAPPINGS[modelId](points, spacing);

  return {
    modelId,
    parameters: [p0, p1, p2, p3, p4, p5, p6],
    midpoint,
    segments,
    means,
    fallbacks,
  };
}

function positiveWeightSamples(series: ObservationSeries): { x: readonly number[]; y: readonly number[] } {
  const { weights } = series;
  if (weights === undefined || weights.every(w => w > 0)) {
    return series;
  }
  const keep = series.x.map((_, i) => i).filter(i => weights[i] > 0);
  return { x: keep.map(i => series.x[i]), y: keep.map(i => series.y[i]) };
}

interface SamplePoint {
  x: number;
  y: number;
}

interface TransitionPoints {
  lastBefore: SamplePoint;
  firstDuring: SamplePoint;
  /** x of the first in-season maximum */
  firstMax: number;
  /** x of the last in-season maximum */
  lastMax: number;
  lastDuring: SamplePoint;
  firstAfter: SamplePoint;
}

type PhaseMapping = (
  points: TransitionPoints,
  spacing: number
) => [number, number, number, number];

/**
 * Rate of change between two samples: the y gap over the x gap, measured in
 * the direction of the transition (rising or falling) so that a falling edge
 * also gives a positive steepness.
 */
function edgeRate(from: SamplePoint, to: SamplePoint, direction: 1 | -1, spacing: number): number {
  const gap = to.x - from.x;
  if (gap === 0) {
    return 1 / spacing;
  }
  return (direction * (to.y - from.y)) / gap;
}

const PHASE_MAPPINGS: Record<ModelId, PhaseMapping> = {
  gaussian(points, spacing) {
    const spread1 = (points.firstMax - points.lastBefore.x) / 3;
    const spread2 = (points.firstAfter.x - points.lastMax) / 3;
    return [
      points.firstDuring.x,
      spread1 > 0 ? spread1 : spacing,
      points.lastDuring.x,
      spread2 > 0 ? spread2 : spacing,
    ];
  },

  'hyperbolic-tangent'(points, spacing) {
    return [
      (points.lastBefore.x + points.firstDuring.x) / 2,
      edgeRate(points.lastBefore, points.firstDuring, 1, spacing),
      (points.lastDuring.x + points.firstAfter.x) / 2,
      edgeRate(points.lastDuring, points.firstAfter, -1, spacing),
    ];
  },

  // Same phase points as tanh, twice the rate
  logistic(points, spacing) {
    return [
      (points.lastBefore.x + points.firstDuring.x) / 2,
      2 * edgeRate(points.lastBefore, points.firstDuring, 1, spacing),
      (points.lastDuring.x + points.firstAfter.x) / 2,
      2 * edgeRate(points.lastDuring, points.firstAfter, -1, spacing),
    ];
  },

  sine(points, spacing) {
    const rise = points.lastBefore.x;
    const plateauStart = Math.max(points.firstMax, rise + spacing);
    const plateauEnd = points.lastMax;
    const fall = Math.max(points.firstAfter.x, plateauEnd + spacing);
    return [rise, plateauStart, plateauEnd, fall];
  },
};
