/**
 * @arch hexagraph.core.engine
 * @intent:stateless
 *
 * Cycle detection and coupling metrics over an architecture graph.
 */
import type { ArchitectureGraph } from '../graph/graph.js';
import type { NodeId } from '../graph/node-id.js';
import type { ComponentNode } from '../graph/types.js';
import type { CouplingMetrics, Cycle } from './types.js';

/**
 * Read-only structural analysis. Never mutates the graph.
 */
export class GraphAnalysis {
  constructor(private readonly graph: ArchitectureGraph) {}

  /**
   * Detect circular dependencies using DFS.
   *
   * Each node not yet visited starts a traversal. An edge to a node on the
   * current recursion stack closes a cycle: the path from that node onwards.
   * Cycles are reported as found, without deduplication.
   *
   * Known limitation: nodes stay visited after their traversal ends, so a
   * cycle reachable only through such a node from a later root is not reported.
   */
  detectCycles(): Cycle[] {
    const cycles: Cycle[] = [];
    const visited = new Set<NodeId>();
    const recursionStack = new Set<NodeId>();
    const pathStack: NodeId[] = [];

    const dfs = (nodeId: NodeId): void => {
      visited.add(nodeId);
      recursionStack.add(nodeId);
      pathStack.push(nodeId);

      for (const edge of this.graph.edgesFrom(nodeId)) {
        if (!visited.has(edge.target)) {
          dfs(edge.target);
        } else if (recursionStack.has(edge.target)) {
          const cycleStart = pathStack.indexOf(edge.target);
          cycles.push(pathStack.slice(cycleStart));
        }
      }

      pathStack.pop();
      recursionStack.delete(nodeId);
    };

    for (const node of this.graph.nodes()) {
      if (!visited.has(node.id)) {
        dfs(node.id);
      }
    }

    return cycles;
  }

  /**
   * Coupling of one node, or null when the id is not in the graph.
   */
  calculateCoupling(nodeId: NodeId): CouplingMetrics | null {
    if (!this.graph.hasNode(nodeId)) {
      return null;
    }

    const afferent = this.graph.edgesTo(nodeId).length;
    const efferent = this.graph.edgesFrom(nodeId).length;
    const total = afferent + efferent;

    return {
      afferent,
      efferent,
      instability: total === 0 ? 0 : efferent / total,
    };
  }

  /**
   * Nodes with no outgoing edges.
   */
  findLeafNodes(): ComponentNode[] {
    return this.graph.nodes().filter((node) => this.graph.edgesFrom(node.id).length === 0);
  }

  /**
   * Nodes with no incoming edges.
   */
  findRootNodes(): ComponentNode[] {
    return this.graph.nodes().filter((node) => this.graph.edgesTo(node.id).length === 0);
  }
}
