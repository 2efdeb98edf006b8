/**
 * Hyperbolic tangent double-S model
 *
 * comp(x) = amp * (tanh((x - a) * b) + 1) / 2
 *
 * a is the transition centre and b its steepness.
 */

import { createDoubleSigmoidModel, type ComponentShape } from './component';

export const tanhRamp: ComponentShape = {
  value(x, amplitude, a, b) {
    return (amplitude * (Math.tanh((x - a) * b) + 1)) / 2;
  },

  gradient(x, amplitude, a, b) {
    const c = Math.cosh((x - a) * b);
    const c2 = c * c;
    return [
      (Math.tanh((x - a) * b) + 1) / 2,
      -(amplitude * b) / (2 * c2),
      (amplitude * (x - a)) / (2 * c2),
    ];
  },
};

export const hyperbolicTangentModel = createDoubleSigmoidModel(
  'hyperbolic-tangent',
  'Hyperbolic tangent',
  tanhRamp,
  tanhRamp
);
