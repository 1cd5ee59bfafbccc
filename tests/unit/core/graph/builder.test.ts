/**
 * @arch hexagraph.test.unit
 *
 * Tests for the graph builder.
 */
import { describe, it, expect } from 'vitest';
import { GraphBuilder } from '../../../../src/core/graph/builder.js';
import { createEdge } from '../../../../src/core/graph/entities.js';
import { GraphError, ErrorCodes } from '../../../../src/utils/errors.js';
import { component, edge, idOf } from '../../../fixtures/graphs/index.js';

const USER = 'app::domain::User';
const USER_REPOSITORY = 'app::ports::UserRepository';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('GraphBuilder', () => {
  describe('build', () => {
    it('should build an empty graph', () => {
      const graph = new GraphBuilder().build();

      expect(graph.nodeCount()).toBe(0);
      expect(graph.edgeCount()).toBe(0);
      expect(graph.metadata().description).toBe('Hexagonal Architecture Graph');
      expect(graph.metadata().version).toBe(1);
    });

    it('should chain node and edge additions', () => {
      const graph = new GraphBuilder()
        .withNode(component(USER, 'Domain', 'Entity'))
        .addNode(component(USER_REPOSITORY, 'Port', 'Repository'))
        .withEdge(edge(USER_REPOSITORY, USER))
        .build();

      expect(graph.nodeCount()).toBe(2);
      expect(graph.edgeCount()).toBe(1);
      expect(graph.getNode(idOf(USER))?.typeName).toBe('User');
    });

    it('should accept iterables of nodes and edges', () => {
      const graph = new GraphBuilder()
        .withNodes(new Set([component(USER, 'Domain')]))
        .withEdges([edge(USER, USER), edge(USER, USER, 'Validates')])
        .build();

      expect(graph.nodeCount()).toBe(1);
      expect(graph.edgeCount()).toBe(2);
    });

    it('should keep the last node registered under an id', () => {
      const graph = new GraphBuilder()
        .withNode(component(USER, 'Domain', 'Entity'))
        .withNode(component(USER, 'Domain', 'Aggregate'))
        .build();

      expect(graph.nodeCount()).toBe(1);
      expect(graph.getNode(idOf(USER))?.role).toBe('Aggregate');
    });

    it('should keep dangling edges without validation', () => {
      const graph = new GraphBuilder().withEdge(createEdge(1n, 2n, 'Depends')).build();

      expect(graph.edgeCount()).toBe(1);
      expect(graph.nodeCount()).toBe(0);
    });

    it('should record description, version and attributes', () => {
      const graph = new GraphBuilder()
        .withDescription('User service')
        .withVersion(4)
        .withAttribute('team', 'identity')
        .build();

      expect(graph.metadata().description).toBe('User service');
      expect(graph.metadata().version).toBe(4);
      expect(graph.metadata().attributes).toEqual({ team: 'identity' });
    });
  });

  describe('validate', () => {
    it('should pass when every edge resolves', () => {
      const builder = new GraphBuilder()
        .withNodes([component(USER, 'Domain'), component(USER_REPOSITORY, 'Port')])
        .withEdge(edge(USER_REPOSITORY, USER));

      expect(() => builder.validate()).not.toThrow();
    });

    it('should report a missing source node', () => {
      const builder = new GraphBuilder().withNode(component(USER, 'Domain')).withEdge(createEdge(1n, idOf(USER), 'Depends'));

      const error = catchError(() => builder.validate());

      expect(error).toBeInstanceOf(GraphError);
      expect(error).toMatchObject({
        code: ErrorCodes.MISSING_SOURCE_NODE,
        message: `Edge NodeId(1) --[Depends]--> NodeId(${idOf(USER)}) references missing source node NodeId(1)`,
        details: { source: '1', target: idOf(USER).toString(), kind: 'Depends' },
      });
    });

    it('should report a missing target node', () => {
      const builder = new GraphBuilder().withNode(component(USER, 'Domain')).withEdge(createEdge(idOf(USER), 2n, 'Depends'));

      expect(catchError(() => builder.validate())).toMatchObject({
        code: ErrorCodes.MISSING_TARGET_NODE,
        message: `Edge NodeId(${idOf(USER)}) --[Depends]--> NodeId(2) references missing target node NodeId(2)`,
      });
    });

    it('should report the source first when both endpoints are missing', () => {
      const builder = new GraphBuilder().withEdge(createEdge(1n, 2n, 'Depends'));

      expect(catchError(() => builder.validate())).toMatchObject({ code: ErrorCodes.MISSING_SOURCE_NODE });
    });

    it('should report the first offending edge', () => {
      const builder = new GraphBuilder()
        .withNode(component(USER, 'Domain'))
        .withEdge(createEdge(idOf(USER), 2n, 'Depends'))
        .withEdge(createEdge(3n, idOf(USER), 'Depends'));

      expect(catchError(() => builder.validate())).toMatchObject({ code: ErrorCodes.MISSING_TARGET_NODE });
    });
  });

  describe('buildValidated', () => {
    it('should build when every edge resolves', () => {
      const graph = new GraphBuilder()
        .withNodes([component(USER, 'Domain'), component(USER_REPOSITORY, 'Port')])
        .withEdge(edge(USER_REPOSITORY, USER))
        .buildValidated();

      expect(graph.edgeCount()).toBe(1);
    });

    it('should reject a dangling edge and consume the builder', () => {
      const builder = new GraphBuilder().withEdge(createEdge(1n, 2n, 'Depends'));

      expect(() => builder.buildValidated()).toThrow(GraphError);
      expect(catchError(() => builder.build())).toMatchObject({ code: ErrorCodes.BUILDER_CONSUMED });
    });
  });

  describe('consumption', () => {
    it('should reject every call after build', () => {
      const builder = new GraphBuilder();
      builder.build();

      for (const call of [
        () => builder.build(),
        () => builder.buildValidated(),
        () => builder.validate(),
        () => builder.withNode(component(USER, 'Domain')),
        () => builder.withEdge(edge(USER, USER)),
        () => builder.withDescription('again'),
      ]) {
        expect(catchError(call)).toMatchObject({
          code: ErrorCodes.BUILDER_CONSUMED,
          message: 'GraphBuilder has already been consumed; create a new builder',
        });
      }
    });

    it('should not let later additions reach a built graph', () => {
      const builder = new GraphBuilder().withNode(component(USER, 'Domain'));
      const graph = builder.build();

      expect(() => builder.withNode(component(USER_REPOSITORY, 'Port'))).toThrow(GraphError);
      expect(graph.nodeCount()).toBe(1);
    });
  });
});
