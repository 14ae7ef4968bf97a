/**
 * Error Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { asError, errorMessage } from '@/shared/utils/errors';

describe('Error helpers', () => {
  it('should keep Error instances', () => {
    const error = new TypeError('bad type');

    expect(asError(error)).toBe(error);
    expect(errorMessage(error)).toBe('bad type');
  });

  it('should wrap strings and other values', () => {
    expect(asError('plain').message).toBe('plain');
    expect(asError(42).message).toBe('42');
    expect(errorMessage({ toString: () => 'custom' })).toBe('custom');
  });
});
