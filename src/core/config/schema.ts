/**
 * @arch hexagraph.core.domain.schema
 */
import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../../utils/logger.js';
import { DIAGRAM_FORMATS } from '../export/types.js';

/**
 * Makes an object field optional and applies its inner defaults when missing.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Report format for the analyze and context commands. */
export const OutputFormatSchema = z.enum(['human', 'json']);

/** Diagram format for the graph command. */
export const DiagramFormatSchema = z.enum(DIAGRAM_FORMATS);

/** Thresholds for structural analysis. */
export const AnalysisSettingsSchema = z.object({
  /** A component with more connections than this is a god component */
  god_component_threshold: z.number().int().min(0).default(10),
});

/** Output defaults for CLI commands. */
export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
  diagram: DiagramFormatSchema.default('mermaid'),
});

/** Logging settings. */
export const LoggingSettingsSchema = z.object({
  level: z.enum(LOG_LEVEL_NAMES).default('info'),
});

/** Full `.hexagraph/config.yaml` schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Component manifest, relative to the project root */
  manifest: z.string().default('architecture.yaml'),
  analysis: withDefaults(AnalysisSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
