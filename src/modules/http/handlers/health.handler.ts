/**
 * Health Handler
 */

import { bridgeConfig, bridgeSessionService } from '@/modules/bridge';
import { upstreamConfig, upstreamService } from '@/modules/upstream';
import type { ApiRequest, JsonResponse } from '../types';

export function handleHealth(_req: ApiRequest, res: JsonResponse): void {
  const metrics = bridgeSessionService.getMetrics();

  res.status(200).json({
    status: 'ok',
    message: 'Channel bridge is running',
    uptime: process.uptime(),
    bridge: {
      outputFormat: bridgeConfig.outputFormat,
      markers: bridgeConfig.markerVocabulary,
      ...metrics,
    },
    upstream: {
      baseURL: upstreamConfig.baseURL,
      ...upstreamService.getMetrics(),
    },
  });
}
