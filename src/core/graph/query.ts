/**
 * @arch hexagraph.core.engine
 * @intent:stateless
 */
import type { ArchitectureGraph } from './graph.js';
import type { ComponentNode, Layer, Role } from './types.js';

/**
 * A single node predicate.
 */
export type QueryFilter =
  | { kind: 'layer'; layer: Layer }
  | { kind: 'role'; role: Role }
  | { kind: 'typeNameContains'; substring: string }
  | { kind: 'modulePathContains'; substring: string };

/**
 * Fluent node filter over a graph.
 *
 * Each call returns a new query with one more predicate; results satisfy all of them.
 * Result order follows the graph's node table and must not be relied upon.
 *
 * @example
 * ```ts
 * const repositories = graph.query().layer('Port').role('Repository').execute();
 * ```
 */
export class GraphQuery {
  constructor(
    private readonly graph: ArchitectureGraph,
    private readonly filters: readonly QueryFilter[] = []
  ) {}

  layer(layer: Layer): GraphQuery {
    return this.with({ kind: 'layer', layer });
  }

  role(role: Role): GraphQuery {
    return this.with({ kind: 'role', role });
  }

  typeNameContains(substring: string): GraphQuery {
    return this.with({ kind: 'typeNameContains', substring });
  }

  modulePathContains(substring: string): GraphQuery {
    return this.with({ kind: 'modulePathContains', substring });
  }

  execute(): ComponentNode[] {
    return this.graph.nodes().filter((node) => this.matchesAll(node));
  }

  count(): number {
    let count = 0;
    for (const node of this.graph.nodes()) {
      if (this.matchesAll(node)) count++;
    }
    return count;
  }

  first(): ComponentNode | undefined {
    return this.graph.nodes().find((node) => this.matchesAll(node));
  }

  private with(filter: QueryFilter): GraphQuery {
    return new GraphQuery(this.graph, [...this.filters, filter]);
  }

  private matchesAll(node: ComponentNode): boolean {
    return this.filters.every((filter) => matches(node, filter));
  }
}

function matches(node: ComponentNode, filter: QueryFilter): boolean {
  switch (filter.kind) {
    case 'layer':
      return node.layer === filter.layer;
    case 'role':
      return node.role === filter.role;
    case 'typeNameContains':
      return node.typeName.includes(filter.substring);
    case 'modulePathContains':
      return node.modulePath.includes(filter.substring);
  }
}
