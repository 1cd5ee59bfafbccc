/**
 * @arch hexagraph.core.types
 *
 * Types for layer dependency validation.
 */
import type { NodeId } from '../graph/node-id.js';
import type { Layer } from '../graph/types.js';

/**
 * An edge whose source layer may not depend on its target layer.
 */
export interface LayerViolation {
  /** Source node of the offending edge */
  from: NodeId;
  /** Target node of the offending edge */
  to: NodeId;
  fromLayer: Layer;
  toLayer: Layer;
  /** Human-readable message */
  reason: string;
}

/**
 * Result of layer dependency validation.
 */
export interface LayerValidationResult {
  /** Whether every resolvable edge respects the layer rules */
  passed: boolean;
  /** All violations, in edge order */
  violations: LayerViolation[];
}

/**
 * Which layers a layer may depend on. `'any'` allows every layer.
 */
export type LayerRuleTable = Readonly<Record<Layer, readonly Layer[] | 'any'>>;
