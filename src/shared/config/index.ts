/**
 * Shared Configuration
 * Environment loading and server-wide settings
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '8000', 10),
  HOST: process.env.HOST || '0.0.0.0',

  // Upstream model server (LM Studio)
  LM_STUDIO_URL: (process.env.LM_STUDIO_URL || 'http://localhost:1234').replace(/\/+$/, ''),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate required environment variables
 */
export function validateEnv(): void {
  const required: (keyof typeof env)[] = ['PORT', 'LM_STUDIO_URL'];

  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  if (!Number.isInteger(env.PORT) || env.PORT <= 0 || env.PORT > 65535) {
    throw new Error(`PORT must be a valid TCP port, got ${process.env.PORT}`);
  }
}

export const isDevelopment = env.NODE_ENV === 'development';

export const isProduction = env.NODE_ENV === 'production';

export const isTest = env.NODE_ENV === 'test';

export * from './server';
