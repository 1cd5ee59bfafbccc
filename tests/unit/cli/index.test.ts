/**
 * @arch hexagraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should register the analyze, graph and context commands', () => {
    expect(createCli().commands.map((command) => command.name())).toEqual(['analyze', 'graph', 'context']);
  });

  it('should report the package version', () => {
    expect(createCli().version()).toBe('0.1.0');
  });
});
