/**
 * @arch hexagraph.cli.command
 * @intent:cli-output
 *
 * CLI command for architectural analysis of a component manifest.
 */
import { Command } from 'commander';
import { describePattern, describeSmell, type NameOf } from '../../core/context/builder.js';
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import { formatNodeId } from '../../core/graph/node-id.js';
import { summarizeGraph } from '../../core/graph/summary.js';
import type { OutputFormat } from '../../core/config/schema.js';
import { logger } from '../../utils/logger.js';
import { createFormatter, type AnalysisReport } from '../formatters/index.js';
import { loadProject } from './project.js';

interface AnalyzeOptions {
  config?: string;
  json?: boolean;
  strict?: boolean;
  strictEdges?: boolean;
  godThreshold?: string;
}

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Validate layer rules and port implementations, and report smells and patterns')
    .argument('[manifest]', 'Component manifest (default: manifest from config)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .option('--strict', 'Exit with code 1 on layer violations or unimplemented ports')
    .option('--strict-edges', 'Reject relationships naming unregistered components')
    .option('--god-threshold <n>', 'Connection count above which a component is a god component')
    .action(async (manifest: string | undefined, options: AnalyzeOptions) => {
      try {
        await runAnalyze(manifest, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runAnalyze(manifestArg: string | undefined, options: AnalyzeOptions): Promise<void> {
  const { config, graph } = await loadProject(manifestArg, options);

  let threshold = config.analysis.god_component_threshold;
  if (options.godThreshold !== undefined) {
    threshold = Number.parseInt(options.godThreshold, 10);
    if (Number.isNaN(threshold) || threshold < 0) {
      throw new Error(`Invalid god component threshold: ${options.godThreshold}`);
    }
  }

  const format: OutputFormat = options.json ? 'json' : config.output.format;
  const report = createAnalysisReport(graph, threshold);

  console.log(createFormatter(format).formatAnalysis(report));

  if (options.strict && !report.passed) {
    process.exit(1);
  }
}

/**
 * Run every check against a graph and resolve ids to type names.
 */
export function createAnalysisReport(graph: ArchitectureGraph, godComponentThreshold?: number): AnalysisReport {
  const validator = graph.validation({ godComponentThreshold });
  const nameOf: NameOf = (id) => graph.getNode(id)?.typeName ?? formatNodeId(id);

  const layerViolations = validator.validateLayerDependencies().violations.map((violation) => ({
    from: nameOf(violation.from),
    to: nameOf(violation.to),
    reason: violation.reason,
  }));
  const unimplementedPorts = validator.validatePortImplementations().unimplemented.map((port) => port.portName);

  return {
    summary: summarizeGraph(graph),
    layerViolations,
    unimplementedPorts,
    smells: validator.detectSmells().map((smell) => describeSmell(smell, nameOf)),
    patterns: graph
      .intent()
      .identifyPatterns()
      .map((pattern) => describePattern(pattern, graph, nameOf)),
    passed: layerViolations.length === 0 && unimplementedPorts.length === 0,
  };
}
