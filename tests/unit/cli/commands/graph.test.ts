/**
 * @arch hexagraph.test.unit
 * @intent:cli-output
 *
 * Tests for the graph command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createGraphCommand } from '../../../../src/cli/commands/graph.js';
import type { ExportedGraph } from '../../../../src/core/export/types.js';
import { CLEAN_MANIFEST, createTempProject, removeTempProject } from '../../../fixtures/project/index.js';

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
  },
}));

vi.mock('../../../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/utils/logger.js')>();
  const log = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    setLevel: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return { ...actual, logger: log };
});

import { logger as log } from '../../../../src/utils/logger.js';

describe('graph command', () => {
  let projectRoot: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let processExitSpy: MockInstance<typeof process.exit>;
  let processCwdSpy: MockInstance<typeof process.cwd>;

  beforeEach(async () => {
    vi.clearAllMocks();
    projectRoot = await createTempProject({
      'architecture.yaml': CLEAN_MANIFEST,
      'empty.yaml': 'description: nothing yet\n',
      '.hexagraph/config.yaml': 'output:\n  diagram: graphviz\n',
    });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    processCwdSpy = vi.spyOn(process, 'cwd').mockReturnValue(projectRoot);
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    processCwdSpy.mockRestore();
    await removeTempProject(projectRoot);
  });

  function printed(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0] ?? ''));
  }

  describe('createGraphCommand', () => {
    it('should create a command with correct name', () => {
      expect(createGraphCommand().name()).toBe('graph');
    });

    it('should have short flags for common options', () => {
      const options = createGraphCommand().options;

      expect(options.find((opt) => opt.long === '--config')?.short).toBe('-c');
      expect(options.find((opt) => opt.long === '--format')?.short).toBe('-f');
    });
  });

  describe('format selection', () => {
    it('should default to the configured diagram format', async () => {
      await createGraphCommand().parseAsync(['node', 'test']);

      expect(printed()).toContain('Architecture Graph (graphviz)');
      expect(printed().some((line) => line.startsWith('digraph Architecture {'))).toBe(true);
    });

    it('should render mermaid on request', async () => {
      await createGraphCommand().parseAsync(['node', 'test', '--format', 'mermaid']);

      expect(printed()).toContain('Architecture Graph (mermaid)');
      expect(printed()).toContain('Components: 3, Relationships: 2');
    });

    it('should print bare JSON', async () => {
      await createGraphCommand().parseAsync(['node', 'test', '-f', 'json']);

      const exported: ExportedGraph = JSON.parse(printed()[0] ?? '');
      expect(exported.nodes.map((node) => node.typeName)).toEqual(['User', 'UserRepository', 'PgUserRepository']);
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    it('should reject invalid format', async () => {
      await expect(createGraphCommand().parseAsync(['node', 'test', '--format', 'svg'])).rejects.toThrow(
        'process.exit called'
      );

      expect(log.error).toHaveBeenCalledWith('Invalid format: svg. Use: mermaid, graphviz, json');
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });
  });

  it('should warn about an empty manifest', async () => {
    await createGraphCommand().parseAsync(['node', 'test', 'empty.yaml']);

    expect(log.warn).toHaveBeenCalledWith('No components found in manifest');
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });
});
