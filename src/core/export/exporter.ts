/**
 * @arch hexagraph.core.engine
 * @intent:stateless
 *
 * Renders an architecture graph as Mermaid, Graphviz DOT or JSON.
 */
import { ErrorCodes, HexagraphError } from '../../utils/errors.js';
import type { ArchitectureGraph } from '../graph/graph.js';
import type { NodeId } from '../graph/node-id.js';
import { LAYERS, type ComponentNode, type Layer } from '../graph/types.js';
import { DIAGRAM_FORMATS, type DiagramFormat, type ExportedGraph } from './types.js';

const LAYER_STYLES: Record<Layer, { fill: string; stroke: string }> = {
  Domain: { fill: '#fff3e0', stroke: '#e65100' },
  Port: { fill: '#e3f2fd', stroke: '#0d47a1' },
  Adapter: { fill: '#e8f5e9', stroke: '#1b5e20' },
  Application: { fill: '#f3e5f5', stroke: '#4a148c' },
  Infrastructure: { fill: '#eceff1', stroke: '#263238' },
  Unknown: { fill: '#fafafa', stroke: '#9e9e9e' },
};

export function isDiagramFormat(value: string): value is DiagramFormat {
  return (DIAGRAM_FORMATS as readonly string[]).includes(value);
}

/**
 * Format a graph as diagram text.
 */
export function exportGraph(graph: ArchitectureGraph, format: DiagramFormat): string {
  switch (format) {
    case 'mermaid':
      return formatMermaid(graph);
    case 'graphviz':
      return formatGraphviz(graph);
    case 'json':
      return JSON.stringify(toExportedGraph(graph), null, 2);
    default:
      throw new HexagraphError(ErrorCodes.UNKNOWN_FORMAT, `Unknown format: ${String(format)}`);
  }
}

/**
 * Plain-data view of a graph, safe for JSON.stringify.
 */
export function toExportedGraph(graph: ArchitectureGraph): ExportedGraph {
  const metadata = graph.metadata();
  return {
    metadata: {
      description: metadata.description,
      createdAt: metadata.createdAt,
      version: metadata.version,
      attributes: { ...metadata.attributes },
    },
    nodes: graph.nodes().map((node) => ({
      id: node.id.toString(),
      typeName: node.typeName,
      modulePath: node.modulePath,
      layer: node.layer,
      role: node.role,
      metadata: { ...node.metadata },
    })),
    edges: graph.edges().map((edge) => ({
      source: edge.source.toString(),
      target: edge.target.toString(),
      kind: edge.kind,
      metadata: { ...edge.metadata },
    })),
  };
}

function formatMermaid(graph: ArchitectureGraph): string {
  const lines: string[] = ['graph TD'];

  for (const node of graph.nodes()) {
    lines.push(`    ${diagramId(node.id)}["${escapeMermaid(node.typeName)}<br/>(${node.role})"]`);
  }

  if (graph.edgeCount() > 0) {
    lines.push('');
    for (const edge of graph.edges()) {
      lines.push(`    ${diagramId(edge.source)} -->|${edge.kind}| ${diagramId(edge.target)}`);
    }
  }

  const byLayer = groupByLayer(graph.nodes());
  if (byLayer.size > 0) {
    lines.push('');
    for (const [layer, ids] of byLayer) {
      const style = LAYER_STYLES[layer];
      lines.push(`    classDef ${layer.toLowerCase()} fill:${style.fill},stroke:${style.stroke}`);
      lines.push(`    class ${ids.join(',')} ${layer.toLowerCase()}`);
    }
  }

  return lines.join('\n');
}

function formatGraphviz(graph: ArchitectureGraph): string {
  const lines: string[] = [
    'digraph Architecture {',
    '    rankdir=TB;',
    '    node [shape=box, style=filled];',
    '',
  ];

  for (const node of graph.nodes()) {
    const style = LAYER_STYLES[node.layer];
    lines.push(
      `    ${diagramId(node.id)} [label="${escapeDot(node.typeName)}\\n(${node.role})", fillcolor="${style.fill}", color="${style.stroke}"];`
    );
  }

  lines.push('');

  for (const edge of graph.edges()) {
    lines.push(`    ${diagramId(edge.source)} -> ${diagramId(edge.target)} [label="${edge.kind}"];`);
  }

  lines.push('}');
  return lines.join('\n');
}

/**
 * Node ids in declaration order of their layer.
 */
function groupByLayer(nodes: ComponentNode[]): Map<Layer, string[]> {
  const groups = new Map<Layer, string[]>();
  for (const layer of LAYERS) {
    const ids = nodes.filter((node) => node.layer === layer).map((node) => diagramId(node.id));
    if (ids.length > 0) {
      groups.set(layer, ids);
    }
  }
  return groups;
}

function diagramId(id: NodeId): string {
  return `n${id}`;
}

function escapeMermaid(text: string): string {
  return text.replace(/"/g, '#quot;');
}

function escapeDot(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
