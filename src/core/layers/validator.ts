/**
 * @arch hexagraph.core.engine
 * @intent:stateless
 *
 * Layer dependency validator - enforces the hexagonal dependency direction on every edge.
 */
import type { ArchitectureGraph } from '../graph/graph.js';
import { isLayerDependencyAllowed, layerViolationReason } from './rules.js';
import type { LayerValidationResult, LayerViolation } from './types.js';

/**
 * Validates every edge of a graph against the layer rule table.
 *
 * Edges with an endpoint missing from the graph are skipped; the builder's
 * integrity check is the place that reports those.
 */
export class LayerDependencyValidator {
  validate(graph: ArchitectureGraph): LayerValidationResult {
    const violations: LayerViolation[] = [];

    for (const edge of graph.edges()) {
      const source = graph.getNode(edge.source);
      const target = graph.getNode(edge.target);
      if (!source || !target) {
        continue;
      }

      if (!isLayerDependencyAllowed(source.layer, target.layer)) {
        violations.push({
          from: source.id,
          to: target.id,
          fromLayer: source.layer,
          toLayer: target.layer,
          reason: layerViolationReason(source.layer, target.layer),
        });
      }
    }

    return {
      passed: violations.length === 0,
      violations,
    };
  }
}
