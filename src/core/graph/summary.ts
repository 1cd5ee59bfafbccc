/**
 * @arch hexagraph.core.domain
 * @intent:stateless
 */
import type { ArchitectureGraph } from './graph.js';
import { LAYERS, type Layer } from './types.js';

export interface GraphSummary {
  description: string;
  version: number;
  nodeCount: number;
  edgeCount: number;
  /** Layers with at least one node, in declaration order */
  layers: Array<{ layer: Layer; count: number }>;
}

export function summarizeGraph(graph: ArchitectureGraph): GraphSummary {
  const layers: GraphSummary['layers'] = [];
  for (const layer of LAYERS) {
    const count = graph.nodesByLayer(layer).length;
    if (count > 0) {
      layers.push({ layer, count });
    }
  }

  const metadata = graph.metadata();
  return {
    description: metadata.description,
    version: metadata.version,
    nodeCount: graph.nodeCount(),
    edgeCount: graph.edgeCount(),
    layers,
  };
}

/**
 * Plain-text summary, one fact per line.
 */
export function formatGraphSummary(summary: GraphSummary): string {
  const lines = [
    `${summary.description}:`,
    `  Nodes: ${summary.nodeCount}`,
    `  Edges: ${summary.edgeCount}`,
  ];

  if (summary.layers.length > 0) {
    lines.push('', 'By Layer:');
    for (const { layer, count } of summary.layers) {
      lines.push(`  ${layer}: ${count}`);
    }
  }

  return lines.join('\n');
}
