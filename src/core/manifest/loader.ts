/**
 * @arch hexagraph.core.domain
 *
 * Loads component manifests and feeds them to a GraphBuilder.
 */
import { ManifestError, ErrorCodes, HexagraphError } from '../../utils/errors.js';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import { GraphBuilder } from '../graph/builder.js';
import { createEdge, createNode } from '../graph/entities.js';
import type { ArchitectureGraph } from '../graph/graph.js';
import { nodeIdFromName } from '../graph/node-id.js';
import { ManifestSchema, type Manifest } from './schema.js';

export interface ManifestBuildOptions {
  /**
   * Use the builder's integrity check. Relationships naming unregistered
   * components then fail the build instead of becoming dangling edges.
   */
  strict?: boolean;
}

/**
 * Parse and validate manifest YAML.
 */
export function parseManifest(content: string): Manifest {
  try {
    return parseYamlWithSchema(content, ManifestSchema);
  } catch (error) {
    throw toManifestError(error);
  }
}

/**
 * Load and validate a manifest file.
 */
export async function loadManifest(filePath: string): Promise<Manifest> {
  try {
    return await loadYamlWithSchema(filePath, ManifestSchema);
  } catch (error) {
    throw toManifestError(error, filePath);
  }
}

/**
 * Build a graph from a manifest. Relationship endpoints are resolved by
 * component name, so an unregistered name yields an id with no node.
 */
export function buildGraphFromManifest(
  manifest: Manifest,
  options: ManifestBuildOptions = {}
): ArchitectureGraph {
  const builder = new GraphBuilder();

  if (manifest.description !== undefined) builder.withDescription(manifest.description);
  if (manifest.version !== undefined) builder.withVersion(manifest.version);
  for (const [key, value] of Object.entries(manifest.attributes ?? {})) {
    builder.withAttribute(key, value);
  }

  builder.withNodes(
    manifest.components.map((component) =>
      createNode({
        name: component.name,
        layer: component.layer,
        role: component.role,
        typeName: component.type_name,
        modulePath: component.module_path,
        metadata: component.metadata,
      })
    )
  );

  builder.withEdges(
    manifest.relationships.map((relationship) =>
      createEdge(
        nodeIdFromName(relationship.from),
        nodeIdFromName(relationship.to),
        relationship.kind,
        relationship.metadata
      )
    )
  );

  return options.strict ? builder.buildValidated() : builder.build();
}

function toManifestError(error: unknown, filePath?: string): HexagraphError {
  const location = filePath ? { filePath } : {};

  if (error instanceof HexagraphError) {
    if (error.code === ErrorCodes.FILE_NOT_FOUND) {
      return new ManifestError(ErrorCodes.FILE_NOT_FOUND, `Manifest not found: ${filePath ?? 'unknown path'}`, {
        ...location,
      });
    }
    return new ManifestError(ErrorCodes.INVALID_MANIFEST, `Invalid manifest: ${error.message}`, {
      ...error.details,
      ...location,
      originalCode: error.code,
    });
  }

  return new ManifestError(
    ErrorCodes.INVALID_MANIFEST,
    `Invalid manifest: ${error instanceof Error ? error.message : String(error)}`,
    location
  );
}
