/**
 * Error helpers shared by handlers and services
 */

/**
 * Normalize an unknown thrown value into an Error
 */
export function asError(error: unknown): Error {
  if (error instanceof Error) return error;
  if (typeof error === 'string') return new Error(error);
  return new Error(String(error));
}

/**
 * Message of an unknown thrown value, for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
