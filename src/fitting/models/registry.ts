/**
 * Model registry: lookup table from the enumerated model id to its
 * evaluation and derivative behaviour.
 */

import { InputValidationError } from '../errors';
import type { AnalyticDoubleSigmoidModel, ModelId } from '../types';
import { gaussianModel } from './gaussian-model';
import { hyperbolicTangentModel } from './hyperbolic-tangent-model';
import { logisticModel } from './logistic-model';
import { sineModel } from './sine-model';

const MODELS: Readonly<Record<ModelId, AnalyticDoubleSigmoidModel>> = {
  gaussian: gaussianModel,
  'hyperbolic-tangent': hyperbolicTangentModel,
  logistic: logisticModel,
  sine: sineModel,
};

export const MODEL_IDS: readonly ModelId[] = ['gaussian', 'hyperbolic-tangent', 'logistic', 'sine'];

export function isModelId(value: unknown): value is ModelId {
  return typeof value === 'string' && MODEL_IDS.some(id => id === value);
}

/**
 * Resolve a model by id. Unknown ids raise InputValidationError, so free-form
 * strings from configuration can be passed straight through.
 */
export function getModel(id: string): AnalyticDoubleSigmoidModel {
  if (!isModelId(id)) {
    throw new InputValidationError('model', `unknown model '${id}' (expected one of ${MODEL_IDS.join(', ')})`);
  }
  return MODELS[id];
}

export function listModels(): AnalyticDoubleSigmoidModel[] {
  return MODEL_IDS.map(id => MODELS[id]);
}
