/**
 * @arch hexagraph.core.engine
 * @intent:stateless
 *
 * Assembles the architecture context document.
 */
import type { ArchitectureGraph } from '../graph/graph.js';
import { formatNodeId, type NodeId } from '../graph/node-id.js';
import { LAYERS, type Layer, type RelationshipEdge } from '../graph/types.js';
import type { ArchitecturalPattern } from '../infer/types.js';
import {
  allowedDependencies,
  allowedDependents,
  isLayerDependencyAllowed,
  layerViolationReason,
} from '../layers/rules.js';
import type { ArchitecturalSmell } from '../validation/types.js';
import {
  CONTEXT_SCHEMA_VERSION,
  type ArchitectureContext,
  type ComponentInfo,
  type ContextOptions,
  type LayerBoundary,
  type PatternInfo,
  type RelationshipInfo,
  type SmellInfo,
  type Suggestion,
} from './types.js';

/** Display name for a node id */
export type NameOf = (id: NodeId) => string;

const LAYER_PURPOSES: Record<Layer, string> = {
  Domain: 'Business entities and rules, free of infrastructure',
  Port: 'Interfaces the domain exposes or requires',
  Adapter: 'Implementations of ports for specific technologies',
  Application: 'Use cases orchestrating domain and ports',
  Infrastructure: 'Wiring, configuration and runtime concerns',
  Unknown: 'Components without a declared layer',
};

/**
 * Flatten a graph, its analysis and its validation findings into one document.
 *
 * Suggestions come in a fixed order: missing port implementations, layer
 * violations, then one per circular dependency or god component smell.
 */
export function buildArchitectureContext(
  graph: ArchitectureGraph,
  options: ContextOptions = {}
): ArchitectureContext {
  const analysis = graph.analysis();
  const validator = graph.validation({ godComponentThreshold: options.godComponentThreshold });
  const nameOf: NameOf = (id) => graph.getNode(id)?.typeName ?? formatNodeId(id);

  const components = graph.nodes().map(
    (node): ComponentInfo => ({
      id: node.id.toString(),
      typeName: node.typeName,
      layer: node.layer,
      role: node.role,
      modulePath: node.modulePath,
      purpose: node.metadata['purpose'],
      dependencies: graph.edgesFrom(node.id).map((edge) => nameOf(edge.target)),
      coupling: analysis.calculateCoupling(node.id) ?? { afferent: 0, efferent: 0, instability: 0 },
    })
  );

  const smells = validator.detectSmells();
  const suggestions: Suggestion[] = [];

  for (const port of validator.validatePortImplementations().unimplemented) {
    suggestions.push({
      type: 'missing_implementation',
      component: port.portName,
      description: `Port ${port.portName} has no implementing adapter`,
      priority: 'high',
    });
  }

  for (const violation of validator.validateLayerDependencies().violations) {
    suggestions.push({
      type: 'architectural_violation',
      component: nameOf(violation.from),
      description: `${nameOf(violation.from)} -> ${nameOf(violation.to)}: ${violation.reason}`,
      priority: 'critical',
    });
  }

  for (const smell of smells) {
    if (smell.kind === 'circular-dependency') {
      suggestions.push({
        type: 'potential_issue',
        description: `Break the circular dependency ${formatCycle(smell.cycle, nameOf)}`,
        priority: 'high',
      });
    } else if (smell.kind === 'god-component') {
      suggestions.push({
        type: 'improvement',
        component: nameOf(smell.nodeId),
        description: `${nameOf(smell.nodeId)} has ${smell.connectionCount} connections; consider splitting it`,
        priority: 'medium',
      });
    }
  }

  const metadata = graph.metadata();
  return {
    architecture: 'hexagonal',
    description: metadata.description,
    version: metadata.version,
    components,
    relationships: graph.edges().map((edge) => describeRelationship(graph, edge, nameOf)),
    layerBoundaries: LAYERS.map(
      (layer): LayerBoundary => ({
        layer,
        canDependOn: allowedDependencies(layer),
        dependentsAllowed: allowedDependents(layer),
        purpose: LAYER_PURPOSES[layer],
      })
    ),
    smells: smells.map((smell) => describeSmell(smell, nameOf)),
    patterns: graph
      .intent()
      .identifyPatterns()
      .map((pattern) => describePattern(pattern, graph, nameOf)),
    suggestions,
    metadata: {
      generatedAt: (options.generatedAt ?? new Date()).toISOString(),
      totalComponents: graph.nodeCount(),
      totalRelationships: graph.edgeCount(),
      schemaVersion: CONTEXT_SCHEMA_VERSION,
    },
  };
}

function describeRelationship(
  graph: ArchitectureGraph,
  edge: RelationshipEdge,
  nameOf: NameOf
): RelationshipInfo {
  const info = { from: nameOf(edge.source), to: nameOf(edge.target), kind: edge.kind };
  const source = graph.getNode(edge.source);
  const target = graph.getNode(edge.target);

  if (!source || !target) {
    const missing = source ? edge.target : edge.source;
    return { ...info, isValid: false, validationMessage: `Unregistered component ${formatNodeId(missing)}` };
  }

  if (!isLayerDependencyAllowed(source.layer, target.layer)) {
    return { ...info, isValid: false, validationMessage: layerViolationReason(source.layer, target.layer) };
  }

  return { ...info, isValid: true };
}

export function describeSmell(smell: ArchitecturalSmell, nameOf: NameOf): SmellInfo {
  switch (smell.kind) {
    case 'god-component':
      return {
        kind: smell.kind,
        components: [nameOf(smell.nodeId)],
        description: `${nameOf(smell.nodeId)} has ${smell.connectionCount} connections`,
      };
    case 'circular-dependency':
      return {
        kind: smell.kind,
        components: smell.cycle.map(nameOf),
        description: `Circular dependency ${formatCycle(smell.cycle, nameOf)}`,
      };
    case 'orphaned-component':
      return {
        kind: smell.kind,
        components: [nameOf(smell.nodeId)],
        description: `${nameOf(smell.nodeId)} has no relationships`,
      };
  }
}

export function describePattern(pattern: ArchitecturalPattern, graph: ArchitectureGraph, nameOf: NameOf): PatternInfo {
  switch (pattern.pattern) {
    case 'repository':
      return {
        pattern: pattern.pattern,
        components: pattern.repositories.map(nameOf),
        description: `repositories: ${pattern.count}`,
      };
    case 'cqrs':
      return {
        pattern: pattern.pattern,
        components: [...graph.nodesByRole('Directive'), ...graph.nodesByRole('Query')].map(
          (node) => node.typeName
        ),
        description: `directives: ${pattern.directiveCount}, queries: ${pattern.queryCount}`,
      };
    case 'event-sourcing':
      return {
        pattern: pattern.pattern,
        components: pattern.aggregates.map(nameOf),
        description: `events: ${pattern.eventCount}, aggregates: ${pattern.aggregates.length}`,
      };
  }
}

/**
 * `A -> B -> A`: the cycle's nodes followed by its first node again.
 */
export function formatCycle(cycle: readonly NodeId[], nameOf: NameOf): string {
  const names = cycle.map(nameOf);
  const first = names[0];
  if (first !== undefined) {
    names.push(first);
  }
  return names.join(' -> ');
}
