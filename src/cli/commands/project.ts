/**
 * @arch hexagraph.cli.helpers
 *
 * Shared loading for commands: config, then manifest, then graph.
 */
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import { buildGraphFromManifest, loadManifest } from '../../core/manifest/loader.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('cli');

export interface ProjectOptions {
  /** Config file, relative to the working directory */
  config?: string;
  /** Fail on relationships that name unregistered components */
  strictEdges?: boolean;
}

export interface LoadedProject {
  config: Config;
  manifestPath: string;
  graph: ArchitectureGraph;
}

/**
 * Load config and build the graph from the manifest argument or, failing
 * that, the manifest named in config.
 */
export async function loadProject(
  manifestArg: string | undefined,
  options: ProjectOptions,
  projectRoot: string = process.cwd()
): Promise<LoadedProject> {
  const config = await loadConfig(projectRoot, options.config);
  logger.setLevel(config.logging.level);

  const manifestPath = path.resolve(projectRoot, manifestArg ?? config.manifest);
  const manifest = await loadManifest(manifestPath);
  log.debug('Loaded manifest', {
    path: manifestPath,
    components: manifest.components.length,
    relationships: manifest.relationships.length,
  });

  const graph = buildGraphFromManifest(manifest, { strict: options.strictEdges });
  return { config, manifestPath, graph };
}
