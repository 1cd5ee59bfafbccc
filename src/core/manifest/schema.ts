/**
 * @arch hexagraph.core.domain.schema
 *
 * Component manifest: the list of component and relationship descriptors
 * a project registers for its architecture graph.
 */
import { z } from 'zod';
import { LAYERS, RELATIONSHIP_KINDS, ROLES } from '../graph/types.js';

const MetadataSchema = z.record(z.string(), z.string());

/** One registered component. */
export const ComponentDescriptorSchema = z.object({
  /** Fully-qualified name; the node id is derived from it */
  name: z.string().min(1),
  type_name: z.string().optional(),
  module_path: z.string().optional(),
  layer: z.enum(LAYERS),
  role: z.enum(ROLES).default('Unknown'),
  metadata: MetadataSchema.optional(),
});

/** One relationship between two registered components, by name. */
export const RelationshipDescriptorSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  kind: z.enum(RELATIONSHIP_KINDS).default('Depends'),
  metadata: MetadataSchema.optional(),
});

export const ManifestSchema = z.object({
  description: z.string().optional(),
  version: z.number().int().min(1).optional(),
  attributes: MetadataSchema.optional(),
  components: z.array(ComponentDescriptorSchema).default([]),
  relationships: z.array(RelationshipDescriptorSchema).default([]),
});

export type Manifest = z.infer<typeof ManifestSchema>;
export type ComponentDescriptor = z.infer<typeof ComponentDescriptorSchema>;
export type RelationshipDescriptor = z.infer<typeof RelationshipDescriptorSchema>;
