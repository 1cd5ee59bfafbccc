/**
 * @arch hexagraph.core.barrel
 */
export { parseManifest, loadManifest, buildGraphFromManifest, type ManifestBuildOptions } from './loader.js';
export {
  ManifestSchema,
  ComponentDescriptorSchema,
  RelationshipDescriptorSchema,
  type Manifest,
  type ComponentDescriptor,
  type RelationshipDescriptor,
} from './schema.js';
