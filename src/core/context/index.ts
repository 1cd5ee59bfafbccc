/**
 * @arch hexagraph.core.barrel
 */
export {
  buildArchitectureContext,
  describeSmell,
  describePattern,
  formatCycle,
  type NameOf,
} from './builder.js';
export {
  CONTEXT_SCHEMA_VERSION,
  type ArchitectureContext,
  type ComponentInfo,
  type RelationshipInfo,
  type LayerBoundary,
  type SmellInfo,
  type PatternInfo,
  type Suggestion,
  type SuggestionType,
  type SuggestionPriority,
  type ContextMetadata,
  type ContextOptions,
} from './types.js';
