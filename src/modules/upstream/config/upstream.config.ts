/**
 * Upstream Configuration
 * Local model server (LM Studio) connection settings
 */

import { env } from '@/shared/config';

export const upstreamConfig = {
  // LM Studio serves the OpenAI API under /v1
  baseURL: `${env.LM_STUDIO_URL}/v1`,

  // LM Studio ignores the key, the SDK requires one
  apiKey: process.env.LM_STUDIO_API_KEY || 'lm-studio',

  // Long generations are normal for local models
  timeout: parseInt(process.env.UPSTREAM_TIMEOUT_MS || '600000', 10), // 10 min

  // A half-sent stream cannot be retried
  maxRetries: 0,

  /**
   * Validate configuration
   */
  validate(): void {
    if (!this.apiKey) {
      throw new Error('LM_STUDIO_API_KEY cannot be empty');
    }
    if (!Number.isInteger(this.timeout) || this.timeout < 1) {
      throw new Error('UPSTREAM_TIMEOUT_MS must be a positive integer');
    }
  },
} as const;
