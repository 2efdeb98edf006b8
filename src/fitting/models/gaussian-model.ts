/**
 * Gaussian double-S model
 *
 * Half-Gaussian ramps. The rising component climbs along the left flank of
 * a Gaussian and holds its amplitude from the phase point on:
 *
 *   x < a    amp * exp(-u^2 / 2),  u = (x - a) / b
 *   x >= a   amp
 *
 * The falling component mirrors it, leaving zero at its phase point:
 *
 *   x <= a   0
 *   x > a    amp * (1 - exp(-u^2 / 2))
 *
 * b is the spread (standard deviation) of each flank. Both pieces meet with
 * matching value and slope at x = a.
 */

import { createDoubleSigmoidModel, type ComponentShape } from './component';

export const gaussianRise: ComponentShape = {
  value(x, amplitude, a, b) {
    if (x >= a) {
      return amplitude;
    }
    const u = (x - a) / b;
    return amplitude * Math.exp(-0.5 * u * u);
  },

  gradient(x, amplitude, a, b) {
    if (x >= a) {
      return [1, 0, 0];
    }
    const u = (x - a) / b;
    const g = Math.exp(-0.5 * u * u);
    return [g, (amplitude * g * u) / b, (amplitude * g * u * u) / b];
  },
};

export const gaussianFall: ComponentShape = {
  value(x, amplitude, a, b) {
    if (x <= a) {
      return 0;
    }
    const u = (x - a) / b;
    return amplitude * (1 - Math.exp(-0.5 * u * u));
  },

  gradient(x, amplitude, a, b) {
    if (x <= a) {
      return [0, 0, 0];
    }
    const u = (x - a) / b;
    const g = Math.exp(-0.5 * u * u);
    return [1 - g, -(amplitude * g * u) / b, -(amplitude * g * u * u) / b];
  },
};

export const gaussianModel = createDoubleSigmoidModel('gaussian', 'Gaussian', gaussianRise, gaussianFall);
