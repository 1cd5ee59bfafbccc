/**
 * @arch hexagraph.core.barrel
 */
export {
  nodeIdFromName,
  nodeIdFromTypeName,
  formatNodeId,
  parseNodeId,
  type NodeId,
} from './node-id.js';
export {
  LAYERS,
  ROLES,
  RELATIONSHIP_KINDS,
} from './types.js';
export type {
  Layer,
  Role,
  RelationshipKind,
  Metadata,
  ComponentNode,
  RelationshipEdge,
  GraphMetadata,
} from './types.js';
export {
  DEFAULT_GRAPH_DESCRIPTION,
  createNode,
  createEdge,
  createGraphMetadata,
  splitQualifiedName,
  isInLayer,
  hasRole,
  hasRelationship,
  connects,
  describeNode,
  describeEdge,
  type NodeInput,
} from './entities.js';
export { GraphBuilder } from './builder.js';
export { ArchitectureGraph } from './graph.js';
export { GraphQuery, type QueryFilter } from './query.js';
export { summarizeGraph, formatGraphSummary, type GraphSummary } from './summary.js';
