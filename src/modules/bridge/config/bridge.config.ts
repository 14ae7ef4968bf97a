/**
 * Bridge Configuration
 * Output format, marker vocabulary and buffering limits
 */

import type { NamespaceMode, NestedValueMode, OutputFormat, SessionOptions } from '../types';
import { getMarkerTable, validateMarkerTable } from './markers.config';

const outputFormats: readonly OutputFormat[] = ['xml', 'json'];
const namespaceModes: readonly NamespaceMode[] = ['leaf', 'keep'];
const nestedValueModes: readonly NestedValueMode[] = ['elements', 'json'];

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const normalized = (value ?? '').trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalized) ?? fallback;
}

export const bridgeConfig = {
  /**
   * xml: tool calls rendered as tag-tree markup inside the text stream (Cline)
   * json: tool calls sent as OpenAI tool_calls records
   */
  outputFormat: pick(process.env.BRIDGE_OUTPUT_FORMAT, outputFormats, 'xml'),

  markerVocabulary: process.env.BRIDGE_MARKERS || 'harmony',

  /**
   * Cap on the payload of one open block; larger blocks are split
   */
  maxBlockChars: parseInt(process.env.BRIDGE_MAX_BLOCK_CHARS || '262144', 10),

  /**
   * leaf: `functions.write_file` becomes `write_file`
   */
  namespaceMode: pick(process.env.BRIDGE_NAMESPACE_MODE, namespaceModes, 'leaf'),

  nestedValues: pick(process.env.BRIDGE_NESTED_VALUES, nestedValueModes, 'elements'),

  /**
   * Log suppressed analysis blocks at debug level
   */
  captureSuppressed: process.env.BRIDGE_CAPTURE_SUPPRESSED === 'true',

  /**
   * Log preview length for block payloads (characters)
   */
  logPreviewLength: 80,

  validate(): void {
    if (!Number.isInteger(this.maxBlockChars) || this.maxBlockChars < 1) {
      throw new Error('BRIDGE_MAX_BLOCK_CHARS must be a positive integer');
    }
    validateMarkerTable(getMarkerTable(this.markerVocabulary));
  },

  /**
   * Session options derived from this configuration
   */
  sessionOptions(): SessionOptions {
    return {
      markers: getMarkerTable(this.markerVocabulary),
      maxBlockChars: this.maxBlockChars,
      namespaceMode: this.namespaceMode,
      nestedValues: this.nestedValues,
      captureSuppressed: this.captureSuppressed,
    };
  },
};

export type BridgeConfig = typeof bridgeConfig;
