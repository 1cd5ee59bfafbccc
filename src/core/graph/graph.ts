/**
 * @arch hexagraph.core.domain
 *
 * Immutable architecture graph snapshot.
 */
import { GraphAnalysis } from '../analysis/analyzer.js';
import { IntentInference } from '../infer/inference.js';
import { ArchitecturalValidator, type ValidatorOptions } from '../validation/validator.js';
import { createGraphMetadata } from './entities.js';
import type { NodeId } from './node-id.js';
import { GraphQuery } from './query.js';
import type { ComponentNode, GraphMetadata, Layer, RelationshipEdge, Role } from './types.js';

/**
 * Read-only graph of components and their relationships.
 *
 * Built once by a GraphBuilder and then shared freely; nothing inside it
 * changes after construction. Every read is total: an unknown id yields
 * `undefined` or an empty list, never an error.
 *
 * Lookups go through the id map; adjacency queries scan the edge list,
 * which is sized for whole-codebase architecture graphs.
 */
export class ArchitectureGraph {
  private readonly nodeTable: ReadonlyMap<NodeId, ComponentNode>;
  private readonly edgeList: readonly RelationshipEdge[];
  private readonly graphMetadata: GraphMetadata;

  constructor(
    nodes: ReadonlyMap<NodeId, ComponentNode>,
    edges: readonly RelationshipEdge[],
    metadata: GraphMetadata
  ) {
    this.nodeTable = new Map(nodes);
    this.edgeList = Object.freeze([...edges]);
    this.graphMetadata = metadata;
    Object.freeze(this);
  }

  /**
   * A graph with no nodes, no edges and default metadata.
   */
  static empty(): ArchitectureGraph {
    return new ArchitectureGraph(new Map(), [], createGraphMetadata());
  }

  nodeCount(): number {
    return this.nodeTable.size;
  }

  edgeCount(): number {
    return this.edgeList.length;
  }

  getNode(id: NodeId): ComponentNode | undefined {
    return this.nodeTable.get(id);
  }

  hasNode(id: NodeId): boolean {
    return this.nodeTable.has(id);
  }

  nodes(): ComponentNode[] {
    return Array.from(this.nodeTable.values());
  }

  edges(): readonly RelationshipEdge[] {
    return this.edgeList;
  }

  nodesByLayer(layer: Layer): ComponentNode[] {
    return this.nodes().filter((node) => node.layer === layer);
  }

  nodesByRole(role: Role): ComponentNode[] {
    return this.nodes().filter((node) => node.role === role);
  }

  edgesFrom(source: NodeId): RelationshipEdge[] {
    return this.edgeList.filter((edge) => edge.source === source);
  }

  edgesTo(target: NodeId): RelationshipEdge[] {
    return this.edgeList.filter((edge) => edge.target === target);
  }

  /**
   * Number of distinct layers among the nodes.
   */
  layerCount(): number {
    return new Set(this.nodes().map((node) => node.layer)).size;
  }

  isEmpty(): boolean {
    return this.nodeTable.size === 0;
  }

  metadata(): GraphMetadata {
    return this.graphMetadata;
  }

  query(): GraphQuery {
    return new GraphQuery(this);
  }

  analysis(): GraphAnalysis {
    return new GraphAnalysis(this);
  }

  validation(options?: ValidatorOptions): ArchitecturalValidator {
    return new ArchitecturalValidator(this, options);
  }

  intent(): IntentInference {
    return new IntentInference(this);
  }
}
