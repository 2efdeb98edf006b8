/**
 * Double-S model assembly.
 *
 * Every variant is p0 + comp1(x) + comp2(x), where each component is a
 * sigmoid-like ramp described by an amplitude and a phase/shape pair.
 * A variant only has to describe its two component shapes; evaluation over
 * a whole abscissa set and the n x 7 Jacobian are assembled here.
 */

import type { AnalyticDoubleSigmoidModel, ModelEvaluation, ModelId } from '../types';

/**
 * Partial derivatives of one component w.r.t. (amplitude, a, b)
 */
export type ComponentGradient = [number, number, number];

/**
 * A single sigmoid-like ramp.
 *
 * `a` and `b` are the phase/shape pair (p2, p3 for the rising component,
 * p5, p6 for the falling one).
 */
export interface ComponentShape {
  value(x: number, amplitude: number, a: number, b: number): number;
  gradient(x: number, amplitude: number, a: number, b: number): ComponentGradient;
}

export function createDoubleSigmoidModel(
  id: ModelId,
  name: string,
  rising: ComponentShape,
  falling: ComponentShape
): AnalyticDoubleSigmoidModel {
  return {
    id,
    name,

    evaluate(x: readonly number[], params: readonly number[]): ModelEvaluation {
      const [p0, p1, p2, p3, p4, p5, p6] = params;
      const n = x.length;
      const value = new Array<number>(n);
      const component1 = new Array<number>(n);
      const component2 = new Array<number>(n);

      for (let i = 0; i < n; i++) {
        const c1 = rising.value(x[i], p1, p2, p3);
        const c2 = falling.value(x[i], p4, p5, p6);
        component1[i] = c1;
        component2[i] = c2;
        value[i] = p0 + c1 + c2;
      }

      return { value, component1, component2 };
    },

    jacobian(x: readonly number[], params: readonly number[]): number[][] {
      const [, p1, p2, p3, p4, p5, p6] = params;

      return x.map(xi => {
        const [d1, d2, d3] = rising.gradient(xi, p1, p2, p3);
        const [d4, d5, d6] = falling.gradient(xi, p4, p5, p6);
        return [1, d1, d2, d3, d4, d5, d6];
      });
    },
  };
}
