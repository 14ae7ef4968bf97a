/**
 * Bridge Module Exports
 */

export { bridgeConfig, getMarkerTable, markerTables } from './config';
export { bridgeSessionService } from './services/bridge-session.service';
export { StreamSession } from './services/stream-session.service';
export { ChunkEmitter } from './services/chunk-emitter.service';
export {
  CallConverter,
  renderTagTree,
  toOpenAIToolCall,
  toStructured,
} from './services/call-converter.service';
export { routeBlock } from './services/block-router.service';
export { bridgeMessage, transformCompletion } from './services/completion-transformer.service';
export type { TransformOptions } from './services/completion-transformer.service';
export { BridgeFaultType } from './types';
export type {
  BridgeFault,
  BridgeMetrics,
  BridgeRecord,
  Call,
  ChannelBlock,
  OutputFormat,
  SessionOptions,
} from './types';
