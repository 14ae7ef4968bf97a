/**
 * Upstream Module Type Definitions
 */

import type OpenAI from 'openai';

/**
 * Chat completion body as received from the client.
 * Only `model` and `messages` are checked, every other field is relayed as is.
 */
export type ChatCompletionRequest = OpenAI.ChatCompletionCreateParams;

export type UpstreamChunkStream = AsyncIterable<OpenAI.ChatCompletionChunk>;

export interface ModelList {
  object: 'list';
  data: OpenAI.Model[];
}

export interface UpstreamServiceMetrics {
  totalRequests: number;
  streamingRequests: number;
  totalFailures: number;
  abortedRequests: number;
}
