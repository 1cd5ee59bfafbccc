/**
 * @arch hexagraph.core.engine
 * @intent:stateless
 *
 * Architectural validation: layer rules, port implementations and smells.
 * Every check collects all findings; none stops at the first.
 */
import { GraphAnalysis } from '../analysis/analyzer.js';
import type { ArchitectureGraph } from '../graph/graph.js';
import type { NodeId } from '../graph/node-id.js';
import { LayerDependencyValidator } from '../layers/validator.js';
import type { LayerValidationResult } from '../layers/types.js';
import type {
  ArchitecturalSmell,
  PortValidationResult,
  UnimplementedPort,
  ValidatorOptions,
} from './types.js';

export type { ValidatorOptions } from './types.js';

export const DEFAULT_GOD_COMPONENT_THRESHOLD = 10;

export class ArchitecturalValidator {
  private readonly godComponentThreshold: number;

  constructor(
    private readonly graph: ArchitectureGraph,
    options: ValidatorOptions = {}
  ) {
    this.godComponentThreshold = options.godComponentThreshold ?? DEFAULT_GOD_COMPONENT_THRESHOLD;
  }

  /**
   * Check every edge against the layer rule table.
   */
  validateLayerDependencies(): LayerValidationResult {
    return new LayerDependencyValidator().validate(this.graph);
  }

  /**
   * Every port needs at least one incoming Implements edge.
   */
  validatePortImplementations(): PortValidationResult {
    const unimplemented: UnimplementedPort[] = [];

    for (const port of this.graph.query().layer('Port').execute()) {
      const implemented = this.graph
        .edgesTo(port.id)
        .some((edge) => edge.kind === 'Implements');

      if (!implemented) {
        unimplemented.push({ portId: port.id, portName: port.typeName });
      }
    }

    return {
      passed: unimplemented.length === 0,
      unimplemented,
    };
  }

  /**
   * God components, then circular dependencies, then orphans.
   */
  detectSmells(): ArchitecturalSmell[] {
    return [
      ...this.detectGodComponents(),
      ...this.detectCircularDependencies(),
      ...this.detectOrphanedComponents(),
    ];
  }

  private detectGodComponents(): ArchitecturalSmell[] {
    const smells: ArchitecturalSmell[] = [];
    for (const node of this.graph.nodes()) {
      const connectionCount = this.degree(node.id);
      if (connectionCount > this.godComponentThreshold) {
        smells.push({ kind: 'god-component', nodeId: node.id, connectionCount });
      }
    }
    return smells;
  }

  private detectCircularDependencies(): ArchitecturalSmell[] {
    return new GraphAnalysis(this.graph)
      .detectCycles()
      .map((cycle): ArchitecturalSmell => ({ kind: 'circular-dependency', cycle }));
  }

  private detectOrphanedComponents(): ArchitecturalSmell[] {
    return this.graph
      .nodes()
      .filter((node) => this.degree(node.id) === 0)
      .map((node): ArchitecturalSmell => ({ kind: 'orphaned-component', nodeId: node.id }));
  }

  private degree(nodeId: NodeId): number {
    return this.graph.edgesTo(nodeId).length + this.graph.edgesFrom(nodeId).length;
  }
}
