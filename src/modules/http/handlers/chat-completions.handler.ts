/**
 * Chat Completions Handler
 * Relays a chat completion to the model server and bridges its channel output.
 *
 * Streaming: upstream chunks -> StreamSession -> ChunkEmitter -> SSE frames.
 * A client disconnect aborts the upstream request. An upstream failure after
 * the stream started flushes the session, then closes with [DONE].
 */

import type OpenAI from 'openai';
import {
  bridgeConfig,
  bridgeSessionService,
  BridgeFaultType,
  ChunkEmitter,
  transformCompletion,
} from '@/modules/bridge';
import { classifyUpstreamError, upstreamService, UpstreamErrorType } from '@/modules/upstream';
import type { ChatCompletionRequest } from '@/modules/upstream';
import { generateId, logger } from '@/shared/utils';
import { SseWriter } from '../services/sse-writer.service';
import type { ApiRequest, JsonResponse, StreamResponse } from '../types';
import { ErrorType, sendError } from './error.handler';

type FinishReason = OpenAI.ChatCompletionChunk.Choice['finish_reason'];

/**
 * Minimal body check; everything else is the model server's business
 */
export function isChatCompletionRequest(body: unknown): body is ChatCompletionRequest {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return false;
  }
  return (
    'model' in body &&
    typeof body.model === 'string' &&
    'messages' in body &&
    Array.isArray(body.messages)
  );
}

export async function handleChatCompletions(req: ApiRequest, res: StreamResponse): Promise<void> {
  const requestId = generateId();
  const body = req.body;

  if (!isChatCompletionRequest(body)) {
    logger.warn('Rejected chat completion request', { requestId });
    sendError(res, 400, 'Invalid JSON', ErrorType.BAD_REQUEST);
    return;
  }

  logger.info('Chat completion request', {
    requestId,
    model: body.model,
    stream: body.stream === true,
    format: bridgeConfig.outputFormat,
    messages: body.messages.length,
  });

  if (body.stream === true) {
    await streamCompletion(requestId, body, res);
  } else {
    await completeOnce(requestId, body, res);
  }
}

/**
 * Non-streaming request: one upstream completion, transformed as a whole
 */
async function completeOnce(
  requestId: string,
  body: ChatCompletionRequest,
  res: JsonResponse
): Promise<void> {
  try {
    const completion = await upstreamService.createChatCompletion(body);
    const transformed = transformCompletion(completion, { format: bridgeConfig.outputFormat });

    logger.info('Chat completion done', {
      requestId,
      finishReason: transformed.choices[0]?.finish_reason,
    });
    res.status(200).json(transformed);
  } catch (error) {
    const classified = classifyUpstreamError(error);
    sendError(res, 502, classified.originalError.message, ErrorType.PROXY_ERROR);
  }
}

async function streamCompletion(
  requestId: string,
  body: ChatCompletionRequest,
  res: StreamResponse
): Promise<void> {
  const abortController = new AbortController();
  const onClose = (): void => {
    if (!res.writableEnded) {
      logger.info('Client disconnected, aborting upstream', { requestId });
      abortController.abort();
    }
  };
  res.once('close', onClose);

  let stream: AsyncIterable<OpenAI.ChatCompletionChunk>;
  try {
    stream = await upstreamService.streamChatCompletion(body, abortController.signal);
  } catch (error) {
    res.removeListener('close', onClose);
    const classified = classifyUpstreamError(error);
    if (classified.type !== UpstreamErrorType.ABORTED) {
      sendError(res, 502, classified.originalError.message, ErrorType.PROXY_ERROR);
    }
    return;
  }

  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  const session = bridgeSessionService.createSession();
  const emitter = new ChunkEmitter(bridgeConfig.outputFormat, session.converter);
  const writer = new SseWriter(res);
  let upstreamFinish: FinishReason = null;
  let upstreamChunks = 0;

  try {
    for await (const chunk of stream) {
      upstreamChunks++;
      emitter.observe(chunk);

      const choice = chunk.choices[0];
      if (!choice) {
        continue;
      }
      if (choice.finish_reason) {
        upstreamFinish = choice.finish_reason;
      }

      // Role and upstream-parsed tool calls bypass the channel pipeline
      const { delta } = choice;
      const frames = [
        ...emitter.relay(delta),
        ...(delta.content ? emitter.frames(session.push(delta.content)) : []),
      ];
      if (!(await writeFrames(writer, frames))) {
        break;
      }
    }
  } catch (error) {
    const classified = classifyUpstreamError(error);
    if (classified.type !== UpstreamErrorType.ABORTED) {
      bridgeSessionService.recordFault({
        type: BridgeFaultType.TRANSPORT,
        message: 'Upstream stream failed',
        sessionId: session.id,
        meta: { requestId, errorType: classified.type, error: classified.originalError.message },
      });
    }
  }

  try {
    await writeFrames(writer, [...emitter.frames(session.finish()), ...emitter.flushRelayed()]);
    if (writer.isOpen) {
      await writer.send(emitter.finalFrame(upstreamFinish));
    }
    await writer.close();
  } finally {
    res.removeListener('close', onClose);
    bridgeSessionService.endSession(session.id);
  }

  logger.info('Chat completion stream done', {
    requestId,
    sessionId: session.id,
    upstreamChunks,
    framesWritten: writer.frames,
    ...session.stats,
  });
}

/**
 * @returns false once the client is gone
 */
async function writeFrames(
  writer: SseWriter,
  frames: readonly OpenAI.ChatCompletionChunk[]
): Promise<boolean> {
  for (const frame of frames) {
    if (!(await writer.send(frame))) {
      return false;
    }
  }
  return writer.isOpen;
}
