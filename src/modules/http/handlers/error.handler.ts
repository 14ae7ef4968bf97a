/**
 * Centralized Error Responses
 * OpenAI-style `{ error: { message, type } }` bodies
 */

import type { NextFunction } from 'express';
import { errorMessage, logger } from '@/shared/utils';
import type { ErrorBody, JsonResponse, RouteInfo } from '../types';

export const ErrorType = {
  BAD_REQUEST: 'bad_request',
  PROXY_ERROR: 'proxy_error',
  NOT_FOUND: 'not_found',
} as const;

export function errorBody(message: string, type: string): ErrorBody {
  return { error: { message, type } };
}

/**
 * Send an error body unless the response has already started
 */
export function sendError(res: JsonResponse, status: number, message: string, type: string): void {
  if (res.headersSent) {
    logger.warn('Error after response started, not sent', { status, message, type });
    return;
  }
  res.status(status).json(errorBody(message, type));
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Unknown route
 */
export function handleNotFound(req: RouteInfo, res: JsonResponse): void {
  sendError(res, 404, `Route ${req.method} ${req.path} not found`, ErrorType.NOT_FOUND);
}

/**
 * Express error middleware (body parser failures and anything a route passed to next)
 */
export function handleHttpError(
  error: unknown,
  req: RouteInfo,
  res: JsonResponse,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status = statusOf(error);

  if (error instanceof SyntaxError || status === 400) {
    sendError(res, 400, 'Invalid JSON', ErrorType.BAD_REQUEST);
    return;
  }

  if (status === 413) {
    sendError(res, 413, 'Request body too large', ErrorType.BAD_REQUEST);
    return;
  }

  logger.error('Unhandled request error', {
    method: req.method,
    path: req.path,
    error: errorMessage(error),
  });
  sendError(res, 500, errorMessage(error), ErrorType.PROXY_ERROR);
}
