/**
 * @arch hexagraph.barrel
 *
 * hexagraph: hexagonal architecture graphs with analysis, validation and
 * pattern inference. Main library exports barrel file.
 */

// Graph model
export * from './core/graph/index.js';

// Analysis
export * from './core/analysis/index.js';

// Layer rules
export * from './core/layers/index.js';

// Validation
export * from './core/validation/index.js';

// Intent inference
export * from './core/infer/index.js';

// Configuration
export * from './core/config/index.js';

// Manifest
export * from './core/manifest/index.js';

// Export
export * from './core/export/index.js';

// Context document
export * from './core/context/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
