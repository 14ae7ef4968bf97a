/**
 * Models Handler
 * Relays the model server's model list
 */

import { upstreamService, classifyUpstreamError } from '@/modules/upstream';
import type { ApiRequest, JsonResponse } from '../types';
import { ErrorType, sendError } from './error.handler';

export async function handleModels(_req: ApiRequest, res: JsonResponse): Promise<void> {
  try {
    const models = await upstreamService.listModels();
    res.status(200).json(models);
  } catch (error) {
    sendError(res, 502, classifyUpstreamError(error).originalError.message, ErrorType.PROXY_ERROR);
  }
}
