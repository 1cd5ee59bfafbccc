/**
 * @arch hexagraph.core.barrel
 */
export { loadConfig, getDefaultConfig, mergeConfig, getConfigPath } from './loader.js';
export {
  ConfigSchema,
  OutputFormatSchema,
  DiagramFormatSchema,
  type Config,
  type AnalysisSettings,
  type OutputSettings,
  type OutputFormat,
} from './schema.js';
