/**
 * @arch hexagraph.core.domain
 * @intent:stateless
 *
 * Permitted dependencies between hexagonal layers.
 */
import { LAYERS, type Layer } from '../graph/types.js';
import type { LayerRuleTable } from './types.js';

/**
 * Domain depends only on itself, ports on domain and ports, adapters on
 * ports and domain. Application and infrastructure may depend on anything.
 * Unknown may depend on nothing.
 */
export const LAYER_RULES: LayerRuleTable = {
  Domain: ['Domain'],
  Port: ['Domain', 'Port'],
  Adapter: ['Port', 'Domain'],
  Application: 'any',
  Infrastructure: 'any',
  Unknown: [],
};

export function isLayerDependencyAllowed(from: Layer, to: Layer): boolean {
  const allowed = LAYER_RULES[from];
  return allowed === 'any' || allowed.includes(to);
}

/**
 * Layers `from` may depend on, in declaration order.
 */
export function allowedDependencies(from: Layer): Layer[] {
  return LAYERS.filter((to) => isLayerDependencyAllowed(from, to));
}

/**
 * Layers allowed to depend on `to`, in declaration order.
 */
export function allowedDependents(to: Layer): Layer[] {
  return LAYERS.filter((from) => isLayerDependencyAllowed(from, to));
}

export function layerViolationReason(from: Layer, to: Layer): string {
  return `${from} layer cannot depend on ${to} layer`;
}
