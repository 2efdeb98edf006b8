/**
 * Sine double-S model
 *
 * Each component is a raised-sine ramp between two phase bounds a < b,
 * defined over three disjoint intervals:
 *
 *   x <= a      0
 *   a < x < b   amp * (sin(-pi/2 + pi * (x - a) / (b - a)) + 1) / 2
 *   x >= b      amp
 */

import { createDoubleSigmoidModel, type ComponentShape } from './component';

export const raisedSineRamp: ComponentShape = {
  value(x, amplitude, a, b) {
    if (x <= a) {
      return 0;
    }
    if (x >= b) {
      return amplitude;
    }
    return (amplitude * (Math.sin(-Math.PI / 2 + (Math.PI * (x - a)) / (b - a)) + 1)) / 2;
  },

  gradient(x, amplitude, a, b) {
    if (x <= a) {
      return [0, 0, 0];
    }
    if (x >= b) {
      return [1, 0, 0];
    }
    const t = (Math.PI * (x - a)) / (b - a);
    const s = Math.sin(t);
    return [
      (1 - Math.cos(t)) / 2,
      (Math.PI * amplitude * (x - b) * s) / (2 * (a - b) * (a - b)),
      -(Math.PI * amplitude * (x - a) * s) / (2 * (b - a) * (b - a)),
    ];
  },
};

export const sineModel = createDoubleSigmoidModel('sine', 'Sine', raisedSineRamp, raisedSineRamp);
