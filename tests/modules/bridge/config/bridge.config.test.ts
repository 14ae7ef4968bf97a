/**
 * Bridge Configuration Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { bridgeConfig } from '@/modules/bridge/config/bridge.config';
import { harmonyMarkers } from '@/modules/bridge/config/markers.config';

describe('Bridge Configuration', () => {
  const original = {
    maxBlockChars: bridgeConfig.maxBlockChars,
    markerVocabulary: bridgeConfig.markerVocabulary,
  };

  afterEach(() => {
    bridgeConfig.maxBlockChars = original.maxBlockChars;
    bridgeConfig.markerVocabulary = original.markerVocabulary;
  });

  it('should default to xml output over the harmony vocabulary', () => {
    expect(bridgeConfig.outputFormat).toBe('xml');
    expect(bridgeConfig.markerVocabulary).toBe('harmony');
    expect(bridgeConfig.namespaceMode).toBe('leaf');
    expect(bridgeConfig.nestedValues).toBe('elements');
    expect(bridgeConfig.maxBlockChars).toBe(262144);
    expect(bridgeConfig.captureSuppressed).toBe(false);
  });

  it('should validate the defaults', () => {
    expect(() => bridgeConfig.validate()).not.toThrow();
  });

  it('should reject a non-positive block cap', () => {
    bridgeConfig.maxBlockChars = 0;

    expect(() => bridgeConfig.validate()).toThrow('BRIDGE_MAX_BLOCK_CHARS must be a positive integer');
  });

  it('should reject an unknown marker vocabulary', () => {
    bridgeConfig.markerVocabulary = 'nope';

    expect(() => bridgeConfig.validate()).toThrow('Unknown marker vocabulary "nope"');
  });

  it('should derive session options', () => {
    expect(bridgeConfig.sessionOptions()).toEqual({
      markers: harmonyMarkers,
      maxBlockChars: 262144,
      namespaceMode: 'leaf',
      nestedValues: 'elements',
      captureSuppressed: false,
    });
  });
});
