/**
 * @arch hexagraph.core.types
 *
 * Node and edge value types for the architecture graph.
 */
import type { NodeId } from './node-id.js';

/**
 * Coarse architectural tiers.
 */
export const LAYERS = [
  'Domain',
  'Port',
  'Adapter',
  'Application',
  'Infrastructure',
  'Unknown',
] as const;

export type Layer = (typeof LAYERS)[number];

/**
 * Fine-grained responsibilities within a layer.
 */
export const ROLES = [
  'Entity',
  'ValueObject',
  'Aggregate',
  'DomainEvent',
  'DomainService',
  'InputPort',
  'OutputPort',
  'Repository',
  'UseCase',
  'Query',
  'Adapter',
  'Mapper',
  'Directive',
  'DirectiveHandler',
  'QueryHandler',
  'Config',
  'Unknown',
] as const;

export type Role = (typeof ROLES)[number];

/**
 * Kinds of directed relationship between two components.
 */
export const RELATIONSHIP_KINDS = [
  'Implements',
  'Depends',
  'Transforms',
  'Aggregates',
  'Invokes',
  'Produces',
  'Consumes',
  'Validates',
  'Configures',
  'Unknown',
] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

/**
 * Open string-to-string attribute map.
 */
export type Metadata = Readonly<Record<string, string>>;

/**
 * One architectural unit. Frozen once created.
 */
export interface ComponentNode {
  /** Identity derived from the fully-qualified name */
  readonly id: NodeId;
  readonly layer: Layer;
  readonly role: Role;
  /** Display name, e.g. `User` */
  readonly typeName: string;
  /** Module or path the component lives in, e.g. `app::domain` */
  readonly modulePath: string;
  readonly metadata: Metadata;
}

/**
 * Directed relationship between two node ids. Edges reference nodes, they do not own them.
 */
export interface RelationshipEdge {
  readonly source: NodeId;
  readonly target: NodeId;
  readonly kind: RelationshipKind;
  readonly metadata: Metadata;
}

/**
 * Metadata attached to a graph when it is built.
 */
export interface GraphMetadata {
  readonly description: string;
  /** Unix timestamp in seconds */
  readonly createdAt: number;
  readonly version: number;
  readonly attributes: Metadata;
}
