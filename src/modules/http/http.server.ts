/**
 * HTTP Server
 * Express app serving the OpenAI-compatible bridge endpoints
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { serverConfig } from '@/shared/config';
import {
  handleChatCompletions,
  handleHealth,
  handleHttpError,
  handleModels,
  handleNotFound,
} from './handlers';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Forward rejections to the error middleware (Express 4 does not await handlers)
 */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createApp(): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: serverConfig.bodyLimit }));

  app.get('/health', handleHealth);

  // OpenAI style (/v1) and LM Studio native (/api/v0) routes
  for (const prefix of serverConfig.apiPrefixes) {
    app.post(`${prefix}/chat/completions`, asyncRoute(handleChatCompletions));
    app.get(`${prefix}/models`, asyncRoute(handleModels));
  }

  app.use(handleNotFound);
  app.use(handleHttpError);

  return app;
}
