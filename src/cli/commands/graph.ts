/**
 * @arch hexagraph.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { exportGraph, isDiagramFormat } from '../../core/export/exporter.js';
import { DIAGRAM_FORMATS, type DiagramFormat } from '../../core/export/types.js';
import { logger as log } from '../../utils/logger.js';
import { loadProject } from './project.js';

interface GraphOptions {
  config?: string;
  format?: string;
  strictEdges?: boolean;
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Render the architecture graph as a diagram')
    .argument('[manifest]', 'Component manifest (default: manifest from config)')
    .option('-c, --config <path>', 'Path to config file')
    .option('-f, --format <format>', `Output format (${DIAGRAM_FORMATS.join(', ')})`)
    .option('--strict-edges', 'Reject relationships naming unregistered components')
    .action(async (manifest: string | undefined, options: GraphOptions) => {
      try {
        await runGraph(manifest, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runGraph(manifestArg: string | undefined, options: GraphOptions): Promise<void> {
  const { config, graph } = await loadProject(manifestArg, options);

  let format: DiagramFormat = config.output.diagram;
  if (options.format !== undefined) {
    if (!isDiagramFormat(options.format)) {
      throw new Error(`Invalid format: ${options.format}. Use: ${DIAGRAM_FORMATS.join(', ')}`);
    }
    format = options.format;
  }

  if (graph.isEmpty()) {
    log.warn('No components found in manifest');
    return;
  }

  const output = exportGraph(graph, format);

  if (format === 'json') {
    console.log(output);
    return;
  }

  console.log();
  console.log(chalk.bold(`Architecture Graph (${format})`));
  console.log(chalk.dim('─'.repeat(50)));
  console.log();
  console.log(output);
  console.log();
  console.log(chalk.dim('─'.repeat(50)));
  console.log(chalk.dim(`Components: ${graph.nodeCount()}, Relationships: ${graph.edgeCount()}`));
}
