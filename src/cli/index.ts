/**
 * @arch hexagraph.cli.barrel
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createContextCommand } from './commands/context.js';
import { createGraphCommand } from './commands/graph.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: { version: string } = JSON.parse(
  readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')
);

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('hexagraph')
    .description('Analyze hexagonal architecture graphs')
    .version(packageJson.version);

  [createAnalyzeCommand, createGraphCommand, createContextCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
