import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ConvergenceFailureError, InputValidationError } from '../errors';
import { assertConverged, fitDoubleSigmoid, fitSeries } from '../fit-series';
import { clearFitLogs, fitLogs, getCurrentFit, setLogCallback } from '../fit-logger';
import { getModel, logisticModel, sineModel } from '../models';
import { range, synthesizeSeries } from '../synthetic';
import type { DoubleSigmoidModel, FitResult, ModelId, ObservationSeries, ParameterVector } from '../types';

const GENERATING: Record<ModelId, ParameterVector> = {
  logistic: [0, 5, 5, 1, -5, 15, 1],
  'hyperbolic-tangent': [0, 5, 5, 0.5, -5, 15, 0.5],
  sine: [0, 5, 3, 8, -5, 12, 17],
  gaussian: [0, 5, 7, 2, -5, 13, 2],
};

function noisySeries(modelId: ModelId) {
  return synthesizeSeries(getModel(modelId), GENERATING[modelId], range(20), { noise: 0.05, seed: 42 });
}

function expectNear(actual: readonly number[], expected: readonly number[], relative: number): void {
  actual.forEach((value, i) => {
    expect(Math.abs(value - expected[i])).toBeLessThanOrEqual(relative * Math.max(Math.abs(expected[i]), 1));
  });
}

beforeEach(() => {
  clearFitLogs();
});

afterEach(() => {
  setLogCallback(null);
});

describe('fitDoubleSigmoid', () => {
  it.each([['logistic'], ['hyperbolic-tangent'], ['sine'], ['gaussian']] as const)(
    'recovers a noisy %s season from estimated priors',
    modelId => {
      const report = fitDoubleSigmoid(noisySeries(modelId), modelId);

      expect(report.model.id).toBe(modelId);
      expect(report.priorEstimate?.parameters).toEqual(report.priors);
      expect(report.result.status).toBe('converged');
      expect(report.result.chiSquare).toBeLessThan(0.5);
      expectNear(report.result.parameters, GENERATING[modelId], 0.05);
    }
  );

  it('converges on a single rise with a flat second component', () => {
    const truth: ParameterVector = [0, 5, 5, 1, 0, -5, 1];
    const series = synthesizeSeries(logisticModel, truth, range(20), { noise: 0.05, seed: 1 });

    const { priorEstimate, result } = fitDoubleSigmoid(series, 'logistic');

    expect(priorEstimate?.fallbacks).toEqual(['after']);
    expect(result.status).toBe('converged');
    expect(result.chiSquare).toBeLessThan(0.5);
    // p5 and p6 are not identifiable while the second amplitude is zero
    expectNear(result.parameters.slice(0, 4), truth.slice(0, 4), 0.05);
  });

  it('keeps zero-weight samples out of the estimated priors', () => {
    const series = noisySeries('logistic');
    const weights = series.x.map((_, i) => (i === 2 ? 0 : 1));
    const y = series.y.map((v, i) => (i === 2 ? 40 : v));
    const kept = series.x.map((_, i) => i).filter(i => i !== 2);

    const weighted = fitDoubleSigmoid({ x: series.x, y, weights }, 'logistic');
    const removed = fitDoubleSigmoid(
      { x: kept.map(i => series.x[i]), y: kept.map(i => series.y[i]) },
      'logistic'
    );

    expect(weighted.priors).toEqual(removed.priors);
    expect(weighted.result).toEqual(removed.result);
    expect(weighted.result.status).toBe('converged');
  });

  it('estimates logistic priors from the plateaus and edge slopes', () => {
    const { priors } = fitDoubleSigmoid(noisySeries('logistic'), 'logistic');

    expect(priors[2]).toBe(4.5);
    expect(priors[5]).toBe(15.5);
    expect(priors[0]).toBeCloseTo(0.4955, 3);
    expect(priors[1]).toBeCloseTo(3.6435, 3);
    expect(priors[4]).toBeCloseTo(-3.564, 3);
  });

  it('starts from caller-supplied priors without estimating', () => {
    const priors: ParameterVector = [0.2, 4, 5.5, 0.8, -4, 14, 0.8];

    const report = fitDoubleSigmoid(noisySeries('logistic'), 'logistic', { priors });

    expect(report.priors).toEqual(priors);
    expect(report.priorEstimate).toBeUndefined();
    expect(report.result.status).toBe('converged');
  });

  it('rejects an unknown model before any numeric work', () => {
    expect(() => fitDoubleSigmoid({ x: [], y: [] }, 'cubic')).toThrow(InputValidationError);
  });

  it('rejects priors of the wrong length', () => {
    expect(() => fitDoubleSigmoid(noisySeries('logistic'), 'logistic', { priors: [1, 2, 3] })).toThrow(
      'parameters: expected 7 values, got 3'
    );
  });

  it('rejects invalid options', () => {
    expect(() => fitDoubleSigmoid(noisySeries('logistic'), 'logistic', { maxIterations: 0 })).toThrow(
      'maxIterations: must be a positive integer (got 0)'
    );
  });
});

describe('fitSeries', () => {
  const series = noisySeries('logistic');
  const priors = fitDoubleSigmoid(series, 'logistic').priors;

  it('treats zero-weight samples exactly like removed ones', () => {
    const weights = series.x.map((_, i) => (i === 3 || i === 12 ? 0 : 1));
    const y = series.y.map((v, i) => (i === 3 ? 100 : v));
    const kept = series.x.map((_, i) => i).filter(i => weights[i] > 0);

    const weighted = fitSeries({ x: series.x, y, weights }, logisticModel, priors);
    const removed = fitSeries(
      { x: kept.map(i => series.x[i]), y: kept.map(i => series.y[i]) },
      logisticModel,
      priors
    );

    expect(weighted).toEqual(removed);
  });

  it('fits single-precision inputs to nearly the same posterior', () => {
    const double = fitSeries(series, logisticModel, priors);
    const single = fitSeries(series, logisticModel, priors, { precision: 'single' });

    expect(single.status).toBe('converged');
    single.parameters.forEach((p, i) => {
      expect(p).toBeCloseTo(double.parameters[i], 5);
    });
  });

  it('leaves the caller arrays untouched', () => {
    const x = [...series.x];
    const y = [...series.y];
    const start = [...priors];

    fitSeries({ x, y }, logisticModel, start, { precision: 'single' });

    expect(x).toEqual(series.x);
    expect(y).toEqual(series.y);
    expect(start).toEqual(priors);
  });

  it('uses central differences for a model without a Jacobian', () => {
    const custom: DoubleSigmoidModel = {
      id: 'custom-logistic',
      name: 'Custom logistic',
      evaluate: (x, params) => logisticModel.evaluate(x, params),
    };

    const analytic = fitSeries(series, logisticModel, priors);
    const numeric = fitSeries(series, custom, priors);

    expect(numeric.status).toBe('converged');
    numeric.parameters.forEach((p, i) => {
      expect(p).toBeCloseTo(analytic.parameters[i], 6);
    });
  });

  it('computes the standard error over the positive-weight samples', () => {
    const result = fitSeries(series, logisticModel, priors);

    expect(result.standardError).toBeCloseTo(Math.sqrt(result.chiSquare / 13), 12);
  });

  it.each<[string, ObservationSeries, string]>([
    ['mismatched lengths', { x: range(12), y: range(11) }, 'y: length 11 does not match x length 12'],
    ['a non-finite sample', { x: range(12), y: range(12).map(v => (v === 4 ? NaN : v)) }, 'y: element 4 is not a finite number (NaN)'],
    ['a negative weight', { x: range(12), y: range(12), weights: range(12, -1) }, 'weights: element 0 is negative'],
    ['all-zero weights', { x: range(12), y: range(12), weights: new Array<number>(12).fill(0) }, 'weights: all weights are zero'],
  ])('rejects %s', (_label, input, message) => {
    expect(() => fitSeries(input, logisticModel, priors)).toThrow(message);
  });
});

describe('fit log', () => {
  const series = synthesizeSeries(sineModel, [0.2, 3, 5, 11, -3, 18, 24], range(30));
  const farPriors: ParameterVector = [0.5, 2, 1000, 1001, -2, 2000, 2001];
  const warning = '[LM] Sine: could not find a step that reduces chi2 (lambda=1.00e+7)';

  it('reports the divergence warning once per fit, not once per process', () => {
    const messages: string[] = [];
    setLogCallback(message => messages.push(message));

    const first = fitSeries(series, sineModel, farPriors);
    const second = fitSeries(series, sineModel, farPriors);

    expect(first.status).toBe('diverged');
    expect(second.status).toBe('diverged');
    expect(messages).toEqual([warning, warning]);
  });

  it('holds only the messages of the latest fit', () => {
    fitSeries(series, sineModel, farPriors);
    fitDoubleSigmoid(noisySeries('logistic'), 'logistic');

    expect(fitLogs).toEqual([]);
    expect(getCurrentFit()).toBe('Logistic');
  });
});

describe('assertConverged', () => {
  const series = noisySeries('logistic');

  it('passes a converged result through', () => {
    const { result } = fitDoubleSigmoid(series, 'logistic');

    expect(assertConverged(result)).toBe(result);
  });

  it('throws with the best-effort result attached', () => {
    const { result } = fitDoubleSigmoid(series, 'logistic', { maxIterations: 1 });
    let caught: unknown;

    try {
      assertConverged(result);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConvergenceFailureError);
    if (caught instanceof ConvergenceFailureError) {
      const failed: FitResult = caught.result;
      expect(failed.status).toBe('max-iterations');
      expect(failed.parameters).toEqual(result.parameters);
      expect(caught.message).toContain('status=max-iterations, iterations=1');
    }
  });
});
