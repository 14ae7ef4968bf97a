/**
 * Upstream Error Classifier
 * Classifies model server errors for logging and the client-facing error body
 */

import OpenAI from 'openai';
import { asError } from '@/shared/utils';

export enum UpstreamErrorType {
  FATAL = 'FATAL',
  AUTH = 'AUTH',
  RATE_LIMIT = 'RATE_LIMIT',
  NETWORK = 'NETWORK',
  TIMEOUT = 'TIMEOUT',
  ABORTED = 'ABORTED',
  RETRYABLE = 'RETRYABLE',
  UNKNOWN = 'UNKNOWN',
}

export interface ClassifiedUpstreamError {
  type: UpstreamErrorType;
  message: string;
  /** HTTP status reported by the model server, when it answered */
  status?: number;
  originalError: Error;
}

function classified(
  type: UpstreamErrorType,
  message: string,
  originalError: Error,
  status?: number
): ClassifiedUpstreamError {
  return status === undefined
    ? { type, message, originalError }
    : { type, message, status, originalError };
}

function classifyStatus(status: number, error: Error): ClassifiedUpstreamError {
  if (status === 401 || status === 403) {
    return classified(UpstreamErrorType.AUTH, 'Model server rejected the credentials', error, status);
  }
  if (status === 429) {
    return classified(UpstreamErrorType.RATE_LIMIT, 'Model server is busy', error, status);
  }
  if (status >= 500) {
    return classified(UpstreamErrorType.RETRYABLE, 'Model server error', error, status);
  }
  return classified(UpstreamErrorType.FATAL, 'Model server rejected the request', error, status);
}

/**
 * Classify an upstream error
 * @param error - Anything thrown by the OpenAI client or the stream iterator
 */
export function classifyUpstreamError(error: unknown): ClassifiedUpstreamError {
  const err = asError(error);

  // SDK error classes first (most specific subclasses before their parents)
  if (error instanceof OpenAI.APIUserAbortError || err.name === 'AbortError') {
    return classified(UpstreamErrorType.ABORTED, 'Request aborted', err);
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return classified(UpstreamErrorType.TIMEOUT, 'Model server timed out', err);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return classified(UpstreamErrorType.NETWORK, 'Cannot reach the model server', err);
  }
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    return classifyStatus(error.status, err);
  }

  const errorMessage = err.message.toLowerCase();

  if (errorMessage.includes('timed out') || errorMessage.includes('timeout')) {
    return classified(UpstreamErrorType.TIMEOUT, 'Model server timed out', err);
  }

  if (
    errorMessage.includes('econnrefused') ||
    errorMessage.includes('econnreset') ||
    errorMessage.includes('enotfound') ||
    errorMessage.includes('network') ||
    errorMessage.includes('fetch failed')
  ) {
    return classified(UpstreamErrorType.NETWORK, 'Cannot reach the model server', err);
  }

  if (errorMessage.includes('unauthorized') || errorMessage.includes('invalid api key')) {
    return classified(UpstreamErrorType.AUTH, 'Model server rejected the credentials', err);
  }

  if (
    errorMessage.includes('model not found') ||
    errorMessage.includes('no models loaded') ||
    errorMessage.includes('maximum context length')
  ) {
    return classified(UpstreamErrorType.FATAL, 'Model server rejected the request', err);
  }

  return classified(UpstreamErrorType.UNKNOWN, 'Unknown model server error', err);
}
