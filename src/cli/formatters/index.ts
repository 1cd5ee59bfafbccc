/**
 * @arch hexagraph.cli.barrel
 */
import type { OutputFormat } from '../../core/config/schema.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export type { AnalysisReport, ReportedViolation, FormatOptions, IFormatter } from './types.js';

/**
 * Formatter for an output format.
 */
export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
