/**
 * @arch hexagraph.core.types
 *
 * Types for architectural validation and smell detection.
 */
import type { Cycle } from '../analysis/types.js';
import type { NodeId } from '../graph/node-id.js';

/**
 * A Port-layer node with no incoming Implements edge.
 */
export interface UnimplementedPort {
  portId: NodeId;
  portName: string;
}

/**
 * Result of port implementation validation.
 */
export interface PortValidationResult {
  passed: boolean;
  unimplemented: UnimplementedPort[];
}

export type SmellKind = 'god-component' | 'circular-dependency' | 'orphaned-component';

/**
 * A structural pattern considered undesirable.
 */
export type ArchitecturalSmell =
  | { kind: 'god-component'; nodeId: NodeId; connectionCount: number }
  | { kind: 'circular-dependency'; cycle: Cycle }
  | { kind: 'orphaned-component'; nodeId: NodeId };

export interface ValidatorOptions {
  /** A node whose total degree exceeds this is a god component (default: 10) */
  godComponentThreshold?: number;
}
