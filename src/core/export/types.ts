/**
 * @arch hexagraph.core.types
 */

export const DIAGRAM_FORMATS = ['mermaid', 'graphviz', 'json'] as const;

/**
 * Diagram output format.
 */
export type DiagramFormat = (typeof DIAGRAM_FORMATS)[number];

/**
 * Serialized node in the JSON export. Ids are decimal strings.
 */
export interface ExportedNode {
  id: string;
  typeName: string;
  modulePath: string;
  layer: string;
  role: string;
  metadata: Record<string, string>;
}

export interface ExportedEdge {
  source: string;
  target: string;
  kind: string;
  metadata: Record<string, string>;
}

export interface ExportedGraph {
  metadata: {
    description: string;
    createdAt: number;
    version: number;
    attributes: Record<string, string>;
  };
  nodes: ExportedNode[];
  edges: ExportedEdge[];
}
