/**
 * UUID Utility
 * Centralized id generation using uuidv7 (time-ordered, sortable)
 */

import { v7 as uuidv7 } from 'uuid';

/**
 * Generate a UUID v7, used for bridge sessions and request ids
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Generate an OpenAI-style tool call id (`call_` + 24 hex chars of a v7 uuid)
 */
export function generateCallId(): string {
  return `call_${uuidv7().replace(/-/g, '').slice(-24)}`;
}
