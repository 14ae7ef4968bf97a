/**
 * HTTP Server Configuration
 */

export const serverConfig = {
  // Maximum accepted JSON request body (chat histories get large)
  bodyLimit: process.env.BRIDGE_BODY_LIMIT || '20mb',

  // Route prefixes served by the proxy (OpenAI style and LM Studio's native API)
  apiPrefixes: ['/v1', '/api/v0'] as const,

  // Timeout for graceful shutdown (milliseconds)
  shutdownTimeout: 5000,
};
