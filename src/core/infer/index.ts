/** @arch hexagraph.core.barrel */
export { IntentInference } from './inference.js';
export type {
  ArchitecturalPattern,
  RepositoryPattern,
  CqrsPattern,
  EventSourcingPattern,
  PatternName,
} from './types.js';
