/**
 * @arch hexagraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  DiagramFormatSchema,
  OutputFormatSchema,
} from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should accept an empty document', () => {
    expect(ConfigSchema.safeParse({}).success).toBe(true);
  });

  it('should require an integer threshold', () => {
    expect(ConfigSchema.safeParse({ analysis: { god_component_threshold: 2.5 } }).success).toBe(false);
  });

  it('should accept zero as a threshold', () => {
    const result = ConfigSchema.safeParse({ analysis: { god_component_threshold: 0 } });

    expect(result.success).toBe(true);
  });
});

describe('format schemas', () => {
  it('should list the diagram formats', () => {
    expect(DiagramFormatSchema.options).toEqual(['mermaid', 'graphviz', 'json']);
  });

  it('should list the report formats', () => {
    expect(OutputFormatSchema.options).toEqual(['human', 'json']);
  });
});
