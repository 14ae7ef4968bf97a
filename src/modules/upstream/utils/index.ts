/**
 * Upstream Utilities
 */

export {
  classifyUpstreamError,
  UpstreamErrorType,
  type ClassifiedUpstreamError,
} from './error-classifier';
