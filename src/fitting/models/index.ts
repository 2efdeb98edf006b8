/**
 * Double-S model variants
 */

export { createDoubleSigmoidModel, type ComponentShape, type ComponentGradient } from './component';
export { gaussianModel, gaussianRise, gaussianFall } from './gaussian-model';
export { hyperbolicTangentModel, tanhRamp } from './hyperbolic-tangent-model';
export { logisticModel, logisticRamp } from './logistic-model';
export { sineModel, raisedSineRamp } from './sine-model';
export { getModel, isModelId, listModels, MODEL_IDS } from './registry';
