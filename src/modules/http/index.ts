/**
 * HTTP Module Exports
 */

export { createApp } from './http.server';
export { SseWriter, SSE_DONE } from './services/sse-writer.service';
export * from './handlers';
export type {
  ApiRequest,
  ErrorBody,
  JsonResponse,
  RouteInfo,
  SseTarget,
  StreamResponse,
} from './types';
