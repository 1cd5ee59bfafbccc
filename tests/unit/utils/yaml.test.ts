/**
 * @arch hexagraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse a mapping', () => {
    expect(parseYaml('a: 1\nb: two\n')).toEqual({ a: 1, b: 'two' });
  });

  it('should throw a parse error for malformed YAML', () => {
    expect(() => parseYaml('a: [1, 2')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: orders\n', Schema)).toEqual({ name: 'orders', count: 1 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('count: 3\n', Schema)).toThrow(/^YAML validation failed: name: /);
  });
});

describe('loadYamlWithSchema', () => {
  it('should load a file from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'hexagraph-yaml-'));
    try {
      const file = join(dir, 'settings.yaml');
      await writeFile(file, 'name: billing\ncount: 2\n');

      await expect(loadYamlWithSchema(file, Schema)).resolves.toEqual({ name: 'billing', count: 2 });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should report a missing file', async () => {
    await expect(loadYamlWithSchema('/nonexistent/settings.yaml', Schema)).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
      message: 'Failed to read YAML file: /nonexistent/settings.yaml',
    });
  });
});
