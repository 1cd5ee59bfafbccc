/**
 * @arch hexagraph.core.barrel
 */
export { exportGraph, toExportedGraph, isDiagramFormat } from './exporter.js';
export {
  DIAGRAM_FORMATS,
  type DiagramFormat,
  type ExportedGraph,
  type ExportedNode,
  type ExportedEdge,
} from './types.js';
