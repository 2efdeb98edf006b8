/**
 * Fit diagram data.
 *
 * Rendering and persistence belong to an external renderer. This module
 * only prepares the numbers a renderer needs and resolves where the
 * output should go from an explicitly injected configuration.
 */

import * as path from 'path';
import { InputValidationError } from './errors';
import type { DoubleSigmoidModel, FitResult, ObservationSeries } from './types';

export interface FitDiagram {
  modelName: string;
  /** Abscissas the curves are sampled at */
  x: number[];
  component1: number[];
  component2: number[];
  combined: number[];
  /** Raw observations, when requested */
  points?: { x: number[]; y: number[] };
  iterations: number;
  chiSquare: number;
}

export interface FitDiagramOptions {
  /** Number of curve samples between the first and last abscissa (default 200) */
  samples?: number;
  /** Include the raw observations (default true) */
  includePoints?: boolean;
}

/**
 * Where rendered diagrams go. Supplied by the caller; nothing is looked up
 * from process-wide state.
 */
export interface DiagramOutputConfig {
  outputDir: string;
  /** Optional version folder placed under outputDir */
  versionRoot?: string;
  /** File name without directory (default "<model>-fit.png") */
  fileName?: string;
}

export interface DiagramTarget {
  directory: string;
  filePath: string;
}

export interface FitDiagramRenderer {
  render(diagram: FitDiagram, target: DiagramTarget): void;
}

export function buildFitDiagram(
  series: ObservationSeries,
  model: DoubleSigmoidModel,
  result: FitResult,
  options: FitDiagramOptions = {}
): FitDiagram {
  const { samples = 200, includePoints = true } = options;
  if (!Number.isInteger(samples) || samples < 2) {
    throw new InputValidationError('samples', `must be an integer of at least 2 (got ${samples})`);
  }
  if (series.x.length === 0) {
    throw new InputValidationError('x', 'series is empty');
  }

  const xMin = Math.min(...series.x);
  const xMax = Math.max(...series.x);
  const step = (xMax - xMin) / (samples - 1);
  const x = Array.from({ length: samples }, (_, i) => (i === samples - 1 ? xMax : xMin + i * step));

  const { value, component1, component2 } = model.evaluate(x, result.parameters);

  return {
    modelName: model.name,
    x,
    component1,
    component2,
    combined: value,
    points: includePoints ? { x: [...series.x], y: [...series.y] } : undefined,
    iterations: result.iterations,
    chiSquare: result.chiSquare,
  };
}

export function resolveDiagramTarget(diagram: FitDiagram, config: DiagramOutputConfig): DiagramTarget {
  if (config.outputDir.trim() === '') {
    throw new InputValidationError('outputDir', 'must not be empty');
  }
  const directory = config.versionRoot
    ? path.join(config.outputDir, config.versionRoot)
    : path.join(config.outputDir);
  const fileName = config.fileName ?? `${diagram.modelName.toLowerCase().replace(/\s+/g, '-')}-fit.png`;
  return { directory, filePath: path.join(directory, fileName) };
}

/**
 * Hand a diagram to the renderer together with its resolved target.
 */
export function renderFitDiagram(
  diagram: FitDiagram,
  renderer: FitDiagramRenderer,
  config: DiagramOutputConfig
): DiagramTarget {
  const target = resolveDiagramTarget(diagram, config);
  renderer.render(diagram, target);
  return target;
}
