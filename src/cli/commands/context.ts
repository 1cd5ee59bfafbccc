/**
 * @arch hexagraph.cli.command
 * @intent:cli-output
 *
 * Prints the architecture context document as JSON.
 */
import { Command } from 'commander';
import { buildArchitectureContext } from '../../core/context/builder.js';
import { logger } from '../../utils/logger.js';
import { loadProject } from './project.js';

interface ContextCommandOptions {
  config?: string;
  strictEdges?: boolean;
}

/**
 * Create the context command.
 */
export function createContextCommand(): Command {
  return new Command('context')
    .description('Print components, relationships, rules and suggestions as one JSON document')
    .argument('[manifest]', 'Component manifest (default: manifest from config)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--strict-edges', 'Reject relationships naming unregistered components')
    .action(async (manifest: string | undefined, options: ContextCommandOptions) => {
      try {
        const { config, graph } = await loadProject(manifest, options);
        const context = buildArchitectureContext(graph, {
          godComponentThreshold: config.analysis.god_component_threshold,
        });
        console.log(JSON.stringify(context, null, 2));
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
