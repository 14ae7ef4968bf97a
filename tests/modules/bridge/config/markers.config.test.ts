/**
 * Marker Vocabulary Tests
 */

import { describe, it, expect } from 'vitest';
import {
  bracketMarkers,
  getMarkerTable,
  harmonyMarkers,
  isParameterized,
  validateMarkerTable,
} from '@/modules/bridge/config/markers.config';

describe('Marker Vocabularies', () => {
  it('should resolve tables by name, ignoring case and whitespace', () => {
    expect(getMarkerTable('harmony')).toBe(harmonyMarkers);
    expect(getMarkerTable(' Bracket ')).toBe(bracketMarkers);
  });

  it('should reject unknown vocabularies', () => {
    expect(() => getMarkerTable('nope')).toThrow(
      'Unknown marker vocabulary "nope" (expected one of: harmony, bracket)'
    );
  });

  it('should accept the built-in tables', () => {
    expect(() => validateMarkerTable(harmonyMarkers)).not.toThrow();
    expect(() => validateMarkerTable(bracketMarkers)).not.toThrow();
  });

  it('should tell parameterized markers from fixed ones', () => {
    expect(isParameterized({ kind: 'channel', open: '<channel:', close: '>' })).toBe(true);
    expect(isParameterized({ kind: 'end', text: '<end>' })).toBe(false);
  });

  it('should reject empty tables and empty spellings', () => {
    expect(() => validateMarkerTable({ name: 'empty', markers: [], maxArgumentLength: 0 })).toThrow(
      'Marker table "empty" is empty'
    );
    expect(() =>
      validateMarkerTable({
        name: 'blank',
        markers: [{ kind: 'end', text: '' }],
        maxArgumentLength: 0,
      })
    ).toThrow('Marker table "blank" has an empty end marker');
  });

  it('should reject repeated spellings', () => {
    expect(() =>
      validateMarkerTable({
        name: 'twice',
        markers: [
          { kind: 'end', text: '<end>' },
          { kind: 'end', text: '<end>' },
        ],
        maxArgumentLength: 0,
      })
    ).toThrow('Marker table "twice" repeats "<end>"');
  });

  it('should require a close text and an argument limit for parameterized markers', () => {
    expect(() =>
      validateMarkerTable({
        name: 'open',
        markers: [{ kind: 'channel', open: '<channel:', close: '' }],
        maxArgumentLength: 16,
      })
    ).toThrow('Marker table "open": channel marker has no close text');
    expect(() =>
      validateMarkerTable({
        name: 'unbounded',
        markers: [{ kind: 'channel', open: '<channel:', close: '>' }],
        maxArgumentLength: 0,
      })
    ).toThrow('Marker table "unbounded" needs a positive maxArgumentLength');
  });
});
