/**
 * @arch hexagraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { ArchitectureGraph } from '../../../../src/core/graph/graph.js';
import { summarizeGraph, formatGraphSummary } from '../../../../src/core/graph/summary.js';
import { component, graphOf, ordersGraph } from '../../../fixtures/graphs/index.js';

describe('summarizeGraph', () => {
  it('should count nodes per layer in declaration order', () => {
    expect(summarizeGraph(ordersGraph())).toEqual({
      description: 'Orders service',
      version: 2,
      nodeCount: 6,
      edgeCount: 7,
      layers: [
        { layer: 'Domain', count: 2 },
        { layer: 'Port', count: 1 },
        { layer: 'Adapter', count: 1 },
        { layer: 'Application', count: 2 },
      ],
    });
  });

  it('should include the Unknown layer when populated', () => {
    const summary = summarizeGraph(graphOf([component('Mystery', 'Unknown')]));

    expect(summary.layers).toEqual([{ layer: 'Unknown', count: 1 }]);
  });
});

describe('formatGraphSummary', () => {
  it('should list counts and layers', () => {
    expect(formatGraphSummary(summarizeGraph(ordersGraph()))).toBe(
      [
        'Orders service:',
        '  Nodes: 6',
        '  Edges: 7',
        '',
        'By Layer:',
        '  Domain: 2',
        '  Port: 1',
        '  Adapter: 1',
        '  Application: 2',
      ].join('\n')
    );
  });

  it('should omit the layer section for an empty graph', () => {
    expect(formatGraphSummary(summarizeGraph(ArchitectureGraph.empty()))).toBe(
      'Hexagonal Architecture Graph:\n  Nodes: 0\n  Edges: 0'
    );
  });
});
