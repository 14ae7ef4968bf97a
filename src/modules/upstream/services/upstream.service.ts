/**
 * Upstream Service
 * OpenAI-compatible client for the local model server
 * Stateless apart from metrics, one client shared by all requests
 */

import OpenAI from 'openai';
import { logger } from '@/shared/utils';
import { upstreamConfig } from '../config';
import type {
  ChatCompletionRequest,
  ModelList,
  UpstreamChunkStream,
  UpstreamServiceMetrics,
} from '../types';
import { classifyUpstreamError, UpstreamErrorType } from '../utils';

export class UpstreamServiceClass {
  private client: OpenAI;

  // Metrics
  private totalRequests = 0;
  private streamingRequests = 0;
  private totalFailures = 0;
  private abortedRequests = 0;

  constructor() {
    upstreamConfig.validate();

    this.client = new OpenAI({
      baseURL: upstreamConfig.baseURL,
      apiKey: upstreamConfig.apiKey,
      timeout: upstreamConfig.timeout,
      maxRetries: upstreamConfig.maxRetries,
    });

    logger.debug('Upstream client initialized', {
      baseURL: upstreamConfig.baseURL,
      timeoutMs: upstreamConfig.timeout,
    });
  }

  /**
   * Open a streaming chat completion
   * @param signal - Aborts the upstream request (client went away)
   */
  async streamChatCompletion(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<UpstreamChunkStream> {
    this.totalRequests++;
    this.streamingRequests++;

    try {
      return await this.client.chat.completions.create(
        { ...request, stream: true },
        { signal }
      );
    } catch (error) {
      throw this.recordFailure(error, 'Upstream stream request failed', request.model);
    }
  }

  /**
   * Single (non-streaming) chat completion
   */
  async createChatCompletion(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<OpenAI.ChatCompletion> {
    this.totalRequests++;

    try {
      return await this.client.chat.completions.create(
        { ...request, stream: false },
        { signal }
      );
    } catch (error) {
      throw this.recordFailure(error, 'Upstream completion request failed', request.model);
    }
  }

  /**
   * Models currently available on the model server
   */
  async listModels(): Promise<ModelList> {
    this.totalRequests++;

    try {
      const page = await this.client.models.list();
      return { object: 'list', data: page.data };
    } catch (error) {
      throw this.recordFailure(error, 'Upstream model list request failed');
    }
  }

  /**
   * Count and log a failed request; returns the error for rethrowing
   */
  recordFailure(error: unknown, message: string, model?: string): unknown {
    const classified = classifyUpstreamError(error);

    if (classified.type === UpstreamErrorType.ABORTED) {
      this.abortedRequests++;
      logger.debug('Upstream request aborted', { model });
      return error;
    }

    this.totalFailures++;
    logger.error(message, {
      model,
      type: classified.type,
      reason: classified.message,
      status: classified.status,
      error: classified.originalError.message,
    });
    return error;
  }

  getMetrics(): UpstreamServiceMetrics {
    return {
      totalRequests: this.totalRequests,
      streamingRequests: this.streamingRequests,
      totalFailures: this.totalFailures,
      abortedRequests: this.abortedRequests,
    };
  }
}

// Export singleton instance
export const upstreamService = new UpstreamServiceClass();
