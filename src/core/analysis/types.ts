/**
 * @arch hexagraph.core.types
 *
 * Result types for structural analysis.
 */
import type { NodeId } from '../graph/node-id.js';

/**
 * Node ids of one cycle in traversal order. The closing edge runs from the
 * last id back to the first; the first id is not repeated.
 */
export type Cycle = NodeId[];

/**
 * Afferent/efferent coupling of a single node.
 */
export interface CouplingMetrics {
  /** Incoming edges */
  afferent: number;
  /** Outgoing edges */
  efferent: number;
  /** efferent / (afferent + efferent); 0 for an isolated node */
  instability: number;
}
