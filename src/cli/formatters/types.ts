/**
 * @arch hexagraph.cli.types
 *
 * Formatter type definitions.
 */
import type { GraphSummary } from '../../core/graph/summary.js';
import type { PatternInfo, SmellInfo } from '../../core/context/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

/**
 * A layer violation with both endpoints resolved to display names.
 */
export interface ReportedViolation {
  from: string;
  to: string;
  reason: string;
}

/**
 * Everything the analyze command reports about one graph.
 */
export interface AnalysisReport {
  summary: GraphSummary;
  layerViolations: ReportedViolation[];
  /** Type names of ports without an implementing adapter */
  unimplementedPorts: string[];
  smells: SmellInfo[];
  patterns: PatternInfo[];
  /** No layer violations and no unimplemented ports */
  passed: boolean;
}

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatAnalysis(report: AnalysisReport): string;
}
