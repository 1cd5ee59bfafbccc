/**
 * @arch hexagraph.core.engine
 * @intent:stateless
 *
 * Infers higher-level architectural patterns from component roles.
 */
import type { ArchitectureGraph } from '../graph/graph.js';
import type {
  ArchitecturalPattern,
  CqrsPattern,
  EventSourcingPattern,
  RepositoryPattern,
} from './types.js';

/**
 * Pattern detectors over role queries. Each returns null when its precondition is unmet.
 */
export class IntentInference {
  constructor(private readonly graph: ArchitectureGraph) {}

  /**
   * All matching patterns: repository, then CQRS, then event sourcing.
   */
  identifyPatterns(): ArchitecturalPattern[] {
    const patterns: ArchitecturalPattern[] = [];

    const repository = this.detectRepositoryPattern();
    if (repository) patterns.push(repository);

    const cqrs = this.detectCqrsPattern();
    if (cqrs) patterns.push(cqrs);

    const eventSourcing = this.detectEventSourcingPattern();
    if (eventSourcing) patterns.push(eventSourcing);

    return patterns;
  }

  /**
   * At least one Repository-role node.
   */
  detectRepositoryPattern(): RepositoryPattern | null {
    const repositories = this.graph
      .query()
      .role('Repository')
      .execute()
      .map((node) => node.id);

    if (repositories.length === 0) {
      return null;
    }

    return { pattern: 'repository', count: repositories.length, repositories };
  }

  /**
   * Any Directive or Query node. Either side alone is enough.
   */
  detectCqrsPattern(): CqrsPattern | null {
    const directiveCount = this.graph.query().role('Directive').count();
    const queryCount = this.graph.query().role('Query').count();

    if (directiveCount + queryCount === 0) {
      return null;
    }

    return { pattern: 'cqrs', directiveCount, queryCount };
  }

  /**
   * Domain events and aggregates together; neither alone qualifies.
   */
  detectEventSourcingPattern(): EventSourcingPattern | null {
    const eventCount = this.graph.query().role('DomainEvent').count();
    const aggregates = this.graph
      .query()
      .role('Aggregate')
      .execute()
      .map((node) => node.id);

    if (eventCount === 0 || aggregates.length === 0) {
      return null;
    }

    return { pattern: 'event-sourcing', eventCount, aggregates };
  }
}
