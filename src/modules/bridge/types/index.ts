/**
 * Bridge Module Type Definitions
 * Tokens, channel blocks, calls and the records the pipeline emits
 */

import type { LogMeta } from '@/shared/utils';

// ============================================================================
// Marker vocabulary
// ============================================================================

export type MarkerKind = 'start' | 'channel' | 'recipient' | 'contentType' | 'message' | 'end';

/**
 * Marker spelled by one exact string, e.g. `<|message|>`
 */
export interface FixedMarker {
  kind: MarkerKind;
  text: string;
}

/**
 * Marker carrying an argument between `open` and `close`, e.g. `<channel:` final `>`
 */
export interface ParameterizedMarker {
  kind: MarkerKind;
  open: string;
  close: string;
}

export type MarkerDefinition = FixedMarker | ParameterizedMarker;

export interface MarkerTable {
  name: string;
  markers: MarkerDefinition[];
  /** Longest argument accepted inside a parameterized marker */
  maxArgumentLength: number;
}

// ============================================================================
// Tokens
// ============================================================================

export type Token =
  | { type: 'start'; raw: string }
  | { type: 'channel'; raw: string; name?: string }
  | { type: 'recipient'; raw: string; name?: string }
  | { type: 'contentType'; raw: string; kind?: string }
  | { type: 'message'; raw: string }
  | { type: 'end'; raw: string }
  | { type: 'literal'; text: string };

export interface LexResult {
  tokens: Token[];
  /** Unconsumed suffix that may still turn into a marker */
  tail: string;
}

// ============================================================================
// Channel blocks
// ============================================================================

export type Channel = 'analysis' | 'commentary' | 'final' | 'unknown';

/**
 * How a block was finalized
 * - end: explicit end marker
 * - implicit: a following channel/start marker closed it
 * - stream: end-of-stream flush
 * - limit: payload reached the size cap
 */
export type BlockClosure = 'end' | 'implicit' | 'stream' | 'limit';

export interface ChannelBlock {
  /** Position of the block within its session, from 0 */
  index: number;
  channel: Channel;
  /** Channel name as the producer wrote it */
  channelName: string;
  recipient?: string;
  contentType?: string;
  payload: string;
  complete: boolean;
  closedBy?: BlockClosure;
  /** Opened to carry on a block split at the size cap */
  continued: boolean;
}

export type MachineState = 'idle' | 'header' | 'accumulating';

export type MachineEvent =
  | { type: 'blockOpened'; block: ChannelBlock }
  | { type: 'blockText'; block: ChannelBlock; text: string }
  | { type: 'blockCompleted'; block: ChannelBlock }
  | { type: 'looseText'; text: string; afterMarkers: boolean };

// ============================================================================
// Calls
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface Call {
  name: string;
  arguments: Map<string, JsonValue>;
  /** Payload was malformed; the single `raw` argument holds it verbatim */
  fallback: boolean;
}

export type ConversionResult =
  | { kind: 'call'; call: Call; parseError?: string }
  | { kind: 'invalid'; reason: string };

// ============================================================================
// Routing and output
// ============================================================================

export type BlockRoute = 'suppress' | 'call' | 'passthrough';

export type BridgeRecord = { type: 'text'; text: string } | { type: 'call'; call: Call };

export type OutputFormat = 'xml' | 'json';

export type NamespaceMode = 'leaf' | 'keep';

export type NestedValueMode = 'elements' | 'json';

export interface ConverterOptions {
  namespaceMode: NamespaceMode;
  nestedValues: NestedValueMode;
}

export interface SessionOptions extends ConverterOptions {
  markers: MarkerTable;
  maxBlockChars: number;
  captureSuppressed: boolean;
}

// ============================================================================
// Faults and metrics
// ============================================================================

export enum BridgeFaultType {
  FRAMING = 'framing',
  PAYLOAD = 'payload',
  ROUTING = 'routing',
  TRANSPORT = 'transport',
}

export interface BridgeFault {
  type: BridgeFaultType;
  message: string;
  sessionId: string;
  meta?: LogMeta;
}

export interface BridgeMetrics {
  activeSessions: number;
  totalSessions: number;
  peakConcurrentSessions: number;
  blocksCompleted: number;
  blocksSuppressed: number;
  callsEmitted: number;
  faults: Record<BridgeFaultType, number>;
}
