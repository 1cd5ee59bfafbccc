/**
 * @arch hexagraph.core.domain
 * @intent:stateless
 *
 * Factories and predicates for graph nodes, edges and metadata.
 */
import { formatNodeId, nodeIdFromName, type NodeId } from './node-id.js';
import type {
  ComponentNode,
  GraphMetadata,
  Layer,
  Metadata,
  RelationshipEdge,
  RelationshipKind,
  Role,
} from './types.js';

export const DEFAULT_GRAPH_DESCRIPTION = 'Hexagonal Architecture Graph';

/**
 * Input for {@link createNode}. The id is derived from `name` unless given.
 */
export interface NodeInput {
  /** Fully-qualified name, e.g. `app::domain::User` */
  name: string;
  layer: Layer;
  role?: Role;
  /** Defaults to the last segment of `name` */
  typeName?: string;
  /** Defaults to everything before the last segment of `name` */
  modulePath?: string;
  metadata?: Record<string, string>;
  id?: NodeId;
}

const QUALIFIED_NAME = /^(.*)(?:::|[./])([^:./]+)$/;

/**
 * Split `a::b::C`, `a.b.C` or `a/b/C` into module path and type name.
 */
export function splitQualifiedName(name: string): { modulePath: string; typeName: string } {
  const match = QUALIFIED_NAME.exec(name);
  if (!match) {
    return { modulePath: '', typeName: name };
  }
  return { modulePath: match[1], typeName: match[2] };
}

export function createNode(input: NodeInput): ComponentNode {
  const parts = splitQualifiedName(input.name);
  return Object.freeze({
    id: input.id ?? nodeIdFromName(input.name),
    layer: input.layer,
    role: input.role ?? 'Unknown',
    typeName: input.typeName ?? parts.typeName,
    modulePath: input.modulePath ?? parts.modulePath,
    metadata: freezeMetadata(input.metadata),
  });
}

export function createEdge(
  source: NodeId,
  target: NodeId,
  kind: RelationshipKind,
  metadata?: Record<string, string>
): RelationshipEdge {
  return Object.freeze({
    source,
    target,
    kind,
    metadata: freezeMetadata(metadata),
  });
}

export function createGraphMetadata(options: {
  description?: string;
  version?: number;
  attributes?: Record<string, string>;
} = {}): GraphMetadata {
  return Object.freeze({
    description: options.description ?? DEFAULT_GRAPH_DESCRIPTION,
    createdAt: Math.floor(Date.now() / 1000),
    version: options.version ?? 1,
    attributes: freezeMetadata(options.attributes),
  });
}

function freezeMetadata(metadata?: Record<string, string>): Metadata {
  return Object.freeze({ ...metadata });
}

export function isInLayer(node: ComponentNode, layer: Layer): boolean {
  return node.layer === layer;
}

export function hasRole(node: ComponentNode, role: Role): boolean {
  return node.role === role;
}

export function hasRelationship(edge: RelationshipEdge, kind: RelationshipKind): boolean {
  return edge.kind === kind;
}

export function connects(edge: RelationshipEdge, from: NodeId, to: NodeId): boolean {
  return edge.source === from && edge.target === to;
}

/**
 * `User::Entity (Domain in app::domain)`
 */
export function describeNode(node: ComponentNode): string {
  return `${node.typeName}::${node.role} (${node.layer} in ${node.modulePath})`;
}

/**
 * `NodeId(1) --[Depends]--> NodeId(2)`
 */
export function describeEdge(edge: RelationshipEdge): string {
  return `${formatNodeId(edge.source)} --[${edge.kind}]--> ${formatNodeId(edge.target)}`;
}
