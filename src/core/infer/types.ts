/**
 * @arch hexagraph.core.types
 *
 * Architectural patterns inferred from graph shape.
 */
import type { NodeId } from '../graph/node-id.js';

export interface RepositoryPattern {
  pattern: 'repository';
  count: number;
  repositories: NodeId[];
}

export interface CqrsPattern {
  pattern: 'cqrs';
  directiveCount: number;
  queryCount: number;
}

export interface EventSourcingPattern {
  pattern: 'event-sourcing';
  eventCount: number;
  aggregates: NodeId[];
}

export type ArchitecturalPattern = RepositoryPattern | CqrsPattern | EventSourcingPattern;

export type PatternName = ArchitecturalPattern['pattern'];
