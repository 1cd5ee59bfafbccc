/**
 * @arch hexagraph.core.barrel
 */
export { GraphAnalysis } from './analyzer.js';
export type { Cycle, CouplingMetrics } from './types.js';
