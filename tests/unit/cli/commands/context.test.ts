/**
 * @arch hexagraph.test.unit
 * @intent:cli-output
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createContextCommand } from '../../../../src/cli/commands/context.js';
import type { ArchitectureContext } from '../../../../src/core/context/types.js';
import { TROUBLED_MANIFEST, createTempProject, removeTempProject } from '../../../fixtures/project/index.js';

describe('context command', () => {
  let projectRoot: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let processCwdSpy: MockInstance<typeof process.cwd>;

  beforeEach(async () => {
    projectRoot = await createTempProject({ 'architecture.yaml': TROUBLED_MANIFEST });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processCwdSpy = vi.spyOn(process, 'cwd').mockReturnValue(projectRoot);
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    processCwdSpy.mockRestore();
    await removeTempProject(projectRoot);
  });

  it('should print the context document as JSON', async () => {
    await createContextCommand().parseAsync(['node', 'test']);

    const context: ArchitectureContext = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(context.metadata.totalComponents).toBe(3);
    expect(context.suggestions.map((suggestion) => suggestion.type)).toEqual([
      'missing_implementation',
      'architectural_violation',
    ]);
  });
});
