/**
 * @arch hexagraph.cli.formatter
 */
import type { AnalysisReport, IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatAnalysis(report: AnalysisReport): string {
    return JSON.stringify(
      {
        passed: report.passed,
        summary: {
          description: report.summary.description,
          version: report.summary.version,
          nodes: report.summary.nodeCount,
          edges: report.summary.edgeCount,
          layers: Object.fromEntries(report.summary.layers.map(({ layer, count }) => [layer, count])),
        },
        layer_violations: report.layerViolations,
        unimplemented_ports: report.unimplementedPorts,
        smells: report.smells,
        patterns: report.patterns,
      },
      null,
      2
    );
  }
}
