/**
 * Upstream Error Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import OpenAI from 'openai';
import { classifyUpstreamError, UpstreamErrorType } from '@/modules/upstream/utils/error-classifier';

describe('Upstream Error Classifier', () => {
  describe('SDK errors', () => {
    it('should classify user aborts', () => {
      const result = classifyUpstreamError(new OpenAI.APIUserAbortError());

      expect(result.type).toBe(UpstreamErrorType.ABORTED);
    });

    it('should classify connection timeouts before connection errors', () => {
      expect(classifyUpstreamError(new OpenAI.APIConnectionTimeoutError()).type).toBe(
        UpstreamErrorType.TIMEOUT
      );
      expect(
        classifyUpstreamError(new OpenAI.APIConnectionError({ message: 'Connection error.' })).type
      ).toBe(UpstreamErrorType.NETWORK);
    });

    it('should classify by HTTP status', () => {
      const cases: [number, UpstreamErrorType][] = [
        [401, UpstreamErrorType.AUTH],
        [403, UpstreamErrorType.AUTH],
        [429, UpstreamErrorType.RATE_LIMIT],
        [500, UpstreamErrorType.RETRYABLE],
        [503, UpstreamErrorType.RETRYABLE],
        [400, UpstreamErrorType.FATAL],
        [404, UpstreamErrorType.FATAL],
      ];

      for (const [status, type] of cases) {
        const result = classifyUpstreamError(
          new OpenAI.APIError(status, undefined, 'model server said no', undefined)
        );
        expect(result.type).toBe(type);
        expect(result.status).toBe(status);
      }
    });
  });

  describe('message matching', () => {
    it('should treat DOM-style abort errors as aborted', () => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';

      expect(classifyUpstreamError(error).type).toBe(UpstreamErrorType.ABORTED);
    });

    it('should classify timeouts', () => {
      expect(classifyUpstreamError(new Error('Request timed out')).type).toBe(
        UpstreamErrorType.TIMEOUT
      );
    });

    it('should classify network failures', () => {
      expect(classifyUpstreamError(new Error('connect ECONNREFUSED 127.0.0.1:1234')).type).toBe(
        UpstreamErrorType.NETWORK
      );
      expect(classifyUpstreamError(new Error('fetch failed')).type).toBe(
        UpstreamErrorType.NETWORK
      );
    });

    it('should classify credential failures', () => {
      expect(classifyUpstreamError(new Error('Unauthorized')).type).toBe(UpstreamErrorType.AUTH);
    });

    it('should classify model server refusals as fatal', () => {
      const result = classifyUpstreamError(new Error('No models loaded. Please load a model'));

      expect(result.type).toBe(UpstreamErrorType.FATAL);
    });

    it('should fall back to unknown and wrap non-errors', () => {
      const result = classifyUpstreamError('something odd');

      expect(result.type).toBe(UpstreamErrorType.UNKNOWN);
      expect(result.originalError).toBeInstanceOf(Error);
      expect(result.originalError.message).toBe('something odd');
      expect(result.status).toBeUndefined();
    });
  });
});
