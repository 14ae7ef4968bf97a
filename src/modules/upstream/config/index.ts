/**
 * Upstream Configuration Exports
 */

export { upstreamConfig } from './upstream.config';
