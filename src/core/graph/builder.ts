/**
 * @arch hexagraph.core.engine
 *
 * Fluent, single-owner builder that produces an immutable ArchitectureGraph.
 */
import { GraphError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { ArchitectureGraph } from './graph.js';
import { createGraphMetadata, DEFAULT_GRAPH_DESCRIPTION, describeEdge } from './entities.js';
import { formatNodeId, type NodeId } from './node-id.js';
import type { ComponentNode, RelationshipEdge } from './types.js';

const log = logger.child('graph');

/**
 * Accumulates nodes and edges, then builds one graph snapshot.
 *
 * `build()` and `buildValidated()` consume the builder: every later call throws.
 *
 * @example
 * ```ts
 * const graph = new GraphBuilder()
 *   .withDescription('Orders service')
 *   .withNode(createNode({ name: 'orders::domain::Order', layer: 'Domain', role: 'Aggregate' }))
 *   .withNode(createNode({ name: 'orders::ports::OrderRepository', layer: 'Port', role: 'Repository' }))
 *   .withEdge(createEdge(repoId, orderId, 'Depends'))
 *   .buildValidated();
 * ```
 */
export class GraphBuilder {
  private nodes: ComponentNode[] = [];
  private edges: RelationshipEdge[] = [];
  private description: string = DEFAULT_GRAPH_DESCRIPTION;
  private version = 1;
  private attributes: Record<string, string> = {};
  private consumed = false;

  withDescription(description: string): this {
    this.assertOpen();
    this.description = description;
    return this;
  }

  withVersion(version: number): this {
    this.assertOpen();
    this.version = version;
    return this;
  }

  withAttribute(key: string, value: string): this {
    this.assertOpen();
    this.attributes[key] = value;
    return this;
  }

  withNode(node: ComponentNode): this {
    this.assertOpen();
    this.nodes.push(node);
    return this;
  }

  addNode(node: ComponentNode): this {
    return this.withNode(node);
  }

  withNodes(nodes: Iterable<ComponentNode>): this {
    this.assertOpen();
    this.nodes.push(...nodes);
    return this;
  }

  withEdge(edge: RelationshipEdge): this {
    this.assertOpen();
    this.edges.push(edge);
    return this;
  }

  addEdge(edge: RelationshipEdge): this {
    return this.withEdge(edge);
  }

  withEdges(edges: Iterable<RelationshipEdge>): this {
    this.assertOpen();
    this.edges.push(...edges);
    return this;
  }

  /**
   * Check that every edge references known nodes.
   * Throws on the first offending edge; the source endpoint is checked before the target.
   */
  validate(): void {
    this.assertOpen();
    const nodeIds = new Set<NodeId>(this.nodes.map((node) => node.id));

    for (const edge of this.edges) {
      if (!nodeIds.has(edge.source)) {
        throw new GraphError(
          ErrorCodes.MISSING_SOURCE_NODE,
          `Edge ${describeEdge(edge)} references missing source node ${formatNodeId(edge.source)}`,
          edgeDetails(edge)
        );
      }

      if (!nodeIds.has(edge.target)) {
        throw new GraphError(
          ErrorCodes.MISSING_TARGET_NODE,
          `Edge ${describeEdge(edge)} references missing target node ${formatNodeId(edge.target)}`,
          edgeDetails(edge)
        );
      }
    }
  }

  /**
   * Build the graph without checking edges. Dangling edges are kept.
   */
  build(): ArchitectureGraph {
    this.assertOpen();
    return this.finish();
  }

  /**
   * Validate, then build. On failure the accumulated state is discarded and the error rethrown.
   */
  buildValidated(): ArchitectureGraph {
    try {
      this.validate();
    } catch (error) {
      this.discard();
      throw error;
    }
    return this.finish();
  }

  private finish(): ArchitectureGraph {
    const nodeTable = new Map<NodeId, ComponentNode>();
    for (const node of this.nodes) {
      nodeTable.set(node.id, node);
    }

    const graph = new ArchitectureGraph(
      nodeTable,
      this.edges,
      createGraphMetadata({
        description: this.description,
        version: this.version,
        attributes: this.attributes,
      })
    );

    log.debug('Built architecture graph', {
      nodes: graph.nodeCount(),
      edges: graph.edgeCount(),
    });

    this.discard();
    return graph;
  }

  private discard(): void {
    this.nodes = [];
    this.edges = [];
    this.attributes = {};
    this.consumed = true;
  }

  private assertOpen(): void {
    if (this.consumed) {
      throw new GraphError(
        ErrorCodes.BUILDER_CONSUMED,
        'GraphBuilder has already been consumed; create a new builder'
      );
    }
  }
}

function edgeDetails(edge: RelationshipEdge): Record<string, unknown> {
  return {
    source: edge.source.toString(),
    target: edge.target.toString(),
    kind: edge.kind,
  };
}
