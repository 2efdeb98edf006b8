/**
 * Logistic double-S model
 *
 * comp(x) = amp / (1 + exp(-(x - a) * b))
 */

import { createDoubleSigmoidModel, type ComponentShape } from './component';

export const logisticRamp: ComponentShape = {
  value(x, amplitude, a, b) {
    return amplitude / (1 + Math.exp(-(x - a) * b));
  },

  gradient(x, amplitude, a, b) {
    const e = Math.exp(-(x - a) * b);
    const denom = (1 + e) * (1 + e);
    // Far from the transition e overflows; the limits of the quotients are 0
    if (!Number.isFinite(denom)) {
      return [0, 0, 0];
    }
    return [
      1 / (1 + e),
      -(amplitude * b * e) / denom,
      -(amplitude * (a - x) * e) / denom,
    ];
  },
};

export const logisticModel = createDoubleSigmoidModel(
  'logistic',
  'Logistic',
  logisticRamp,
  logisticRamp
);
