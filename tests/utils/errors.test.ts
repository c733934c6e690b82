import { describe, it, expect } from 'vitest';
import { CatalogLoadError, errorMessage, ExtractionError, SpecError, ToolchainError } from '../../src/utils/errors.js';

describe('errors', () => {
  it('should name the unit in extraction errors', () => {
    const error = new ExtractionError('set_tempo', 'Callable has no body');
    expect(error).toBeInstanceOf(ToolchainError);
    expect(error.message).toBe('set_tempo: Callable has no body');
    expect(error.unitId).toBe('set_tempo');
  });

  it('should list every spec issue', () => {
    const error = new SpecError(['name: Required', 'description: Required']);
    expect(error.message).toBe('Invalid tool spec:\n  - name: Required\n  - description: Required');
  });

  it('should name the catalog in load errors', () => {
    expect(new CatalogLoadError('catalog.tools.ts', 'not found').message).toBe(
      'Failed to load catalog catalog.tools.ts: not found'
    );
  });

  it('should normalize unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
