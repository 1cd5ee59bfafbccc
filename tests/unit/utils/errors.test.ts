/**
 * @arch hexagraph.test.unit
 */
/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  HexagraphError,
  GraphError,
  ConfigError,
  ManifestError,
  SystemError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('HexagraphError', () => {
  it('should create error with code and message', () => {
    const error = new HexagraphError('G001', 'Test error message');

    expect(error.code).toBe('G001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('HexagraphError');
  });

  it('should include optional details', () => {
    const details = { source: '5381', kind: 'Depends' };
    const error = new HexagraphError('G001', 'Test error', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new HexagraphError('G001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(HexagraphError);
  });

  it('should have stack trace', () => {
    const error = new HexagraphError('G001', 'Test');

    expect(error.stack).toContain('Test');
  });

  describe('toJSON', () => {
    it('should serialize name, code, message and details', () => {
      const error = new GraphError('G002', 'Missing target', { target: '42' });

      expect(error.toJSON()).toEqual({
        name: 'GraphError',
        code: 'G002',
        message: 'Missing target',
        details: { target: '42' },
      });
    });
  });
});

describe('subclasses', () => {
  it.each([
    [GraphError, 'GraphError'],
    [ConfigError, 'ConfigError'],
    [ManifestError, 'ManifestError'],
    [SystemError, 'SystemError'],
  ] as const)('%o should carry its own name', (ErrorClass, name) => {
    const error = new ErrorClass('X', 'message');

    expect(error.name).toBe(name);
    expect(error).toBeInstanceOf(HexagraphError);
  });
});

describe('ErrorCodes', () => {
  it('should use distinct codes', () => {
    const codes = Object.values(ErrorCodes);

    expect(new Set(codes).size).toBe(codes.length);
  });

  it('should prefix graph codes with G', () => {
    expect(ErrorCodes.MISSING_SOURCE_NODE).toBe('G001');
    expect(ErrorCodes.MISSING_TARGET_NODE).toBe('G002');
    expect(ErrorCodes.BUILDER_CONSUMED).toBe('G003');
  });
});
