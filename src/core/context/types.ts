/**
 * @arch hexagraph.core.types
 *
 * Architecture context document: a JSON-serialisable view of a graph and
 * everything the analysis, validator and inference report about it.
 * Node ids appear as decimal strings.
 */
import type { CouplingMetrics } from '../analysis/types.js';
import type { Layer, RelationshipKind, Role } from '../graph/types.js';
import type { PatternName } from '../infer/types.js';
import type { SmellKind } from '../validation/types.js';

export const CONTEXT_SCHEMA_VERSION = '1.0.0';

export interface ComponentInfo {
  id: string;
  typeName: string;
  layer: Layer;
  role: Role;
  modulePath: string;
  /** From the component's `purpose` metadata entry */
  purpose?: string;
  /** Type names of the components this one has outgoing edges to */
  dependencies: string[];
  coupling: CouplingMetrics;
}

export interface RelationshipInfo {
  from: string;
  to: string;
  kind: RelationshipKind;
  isValid: boolean;
  validationMessage?: string;
}

export interface LayerBoundary {
  layer: Layer;
  canDependOn: Layer[];
  dependentsAllowed: Layer[];
  purpose: string;
}

export interface SmellInfo {
  kind: SmellKind;
  components: string[];
  description: string;
}

export interface PatternInfo {
  pattern: PatternName;
  components: string[];
  description: string;
}

export type SuggestionType =
  | 'missing_implementation'
  | 'architectural_violation'
  | 'improvement'
  | 'potential_issue';

export type SuggestionPriority = 'low' | 'medium' | 'high' | 'critical';

export interface Suggestion {
  type: SuggestionType;
  component?: string;
  description: string;
  priority: SuggestionPriority;
}

export interface ContextMetadata {
  /** ISO-8601 timestamp */
  generatedAt: string;
  totalComponents: number;
  totalRelationships: number;
  schemaVersion: string;
}

export interface ArchitectureContext {
  architecture: 'hexagonal';
  description: string;
  version: number;
  components: ComponentInfo[];
  relationships: RelationshipInfo[];
  layerBoundaries: LayerBoundary[];
  smells: SmellInfo[];
  patterns: PatternInfo[];
  suggestions: Suggestion[];
  metadata: ContextMetadata;
}

export interface ContextOptions {
  /** Passed through to the validator */
  godComponentThreshold?: number;
  /** Timestamp recorded as `generatedAt` (default: now) */
  generatedAt?: Date;
}
