/**
 * Upstream Module Exports
 */

export { upstreamService } from './services/upstream.service';
export { upstreamConfig } from './config';
export { classifyUpstreamError, UpstreamErrorType } from './utils';
export type { ClassifiedUpstreamError } from './utils';
export type {
  ChatCompletionRequest,
  ModelList,
  UpstreamChunkStream,
  UpstreamServiceMetrics,
} from './types';
