/**
 * @arch hexagraph.core.barrel
 */
export {
  LAYER_RULES,
  isLayerDependencyAllowed,
  allowedDependencies,
  allowedDependents,
  layerViolationReason,
} from './rules.js';
export { LayerDependencyValidator } from './validator.js';
export type { LayerViolation, LayerValidationResult, LayerRuleTable } from './types.js';
