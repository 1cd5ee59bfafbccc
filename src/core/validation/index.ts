/**
 * @arch hexagraph.core.barrel
 */
export { ArchitecturalValidator, DEFAULT_GOD_COMPONENT_THRESHOLD } from './validator.js';
export type {
  ArchitecturalSmell,
  SmellKind,
  UnimplementedPort,
  PortValidationResult,
  ValidatorOptions,
} from './types.js';
