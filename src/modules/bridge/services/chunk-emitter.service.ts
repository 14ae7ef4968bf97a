/**
 * Chunk Emitter
 * Re-frames bridge records as OpenAI `chat.completion.chunk` frames
 *
 * - text record -> content delta
 * - call record, xml mode -> one content delta holding the whole markup
 * - call record, json mode -> one complete tool_calls delta
 *
 * Role and tool_calls deltas the model server sends itself bypass the channel
 * pipeline and are relayed: as tool_calls deltas in json mode (indices continue
 * after the bridge's own calls), as markup at end of stream in xml mode.
 */

import type OpenAI from 'openai';
import { generateCallId, generateId, logger } from '@/shared/utils';
import type { BridgeRecord, Call, OutputFormat } from '../types';
import { CallConverter, toOpenAIToolCall } from './call-converter.service';

type ChatCompletionChunk = OpenAI.ChatCompletionChunk;
type FinishReason = OpenAI.ChatCompletionChunk.Choice['finish_reason'];
type Delta = OpenAI.ChatCompletionChunk.Choice.Delta;
type ToolCallDelta = OpenAI.ChatCompletionChunk.Choice.Delta.ToolCall;

interface RelayedCall {
  name: string;
  arguments: string;
}

export interface FrameIdentity {
  id: string;
  model: string;
  created: number;
}

export class ChunkEmitter {
  private identity: FrameIdentity;
  private toolCallIndex = 0;
  private calls = 0;
  private roleSent = false;
  /** Upstream tool call index -> index in the relayed stream (json mode) */
  private relayedIndexes = new Map<number, number>();
  /** Upstream tool calls collected until the end of stream (xml mode) */
  private relayedCalls = new Map<number, RelayedCall>();

  constructor(
    private readonly format: OutputFormat,
    private readonly converter: CallConverter = new CallConverter({
      namespaceMode: 'leaf',
      nestedValues: 'elements',
    })
  ) {
    this.identity = {
      id: `chatcmpl-${generateId()}`,
      model: 'unknown',
      created: Math.floor(Date.now() / 1000),
    };
  }

  /**
   * Adopt id/model/created of an upstream chunk for every frame that follows
   */
  observe(chunk: Pick<ChatCompletionChunk, 'id' | 'model' | 'created'>): void {
    this.identity = {
      id: chunk.id || this.identity.id,
      model: chunk.model || this.identity.model,
      created: chunk.created || this.identity.created,
    };
  }

  get callsEmitted(): number {
    return this.calls;
  }

  /**
   * Frames for records, in record order
   */
  frames(records: readonly BridgeRecord[]): ChatCompletionChunk[] {
    const frames: ChatCompletionChunk[] = [];
    for (const record of records) {
      if (record.type === 'text') {
        frames.push(this.frame({ content: record.text }));
      } else {
        frames.push(this.frame(this.callDelta(record.call)));
      }
    }
    return frames;
  }

  /**
   * Frames for the role and tool_calls parts of an upstream delta
   */
  relay(delta: Pick<Delta, 'role' | 'tool_calls'>): ChatCompletionChunk[] {
    const frames: ChatCompletionChunk[] = [];

    if (delta.role && !this.roleSent) {
      this.roleSent = true;
      frames.push(this.frame({ role: delta.role }));
    }

    for (const toolCall of delta.tool_calls ?? []) {
      if (this.format === 'json') {
        frames.push(this.frame({ tool_calls: [this.reindex(toolCall)] }));
      } else {
        this.collect(toolCall);
      }
    }

    return frames;
  }

  /**
   * Markup for the upstream tool calls collected in xml mode
   */
  flushRelayed(): ChatCompletionChunk[] {
    const frames: ChatCompletionChunk[] = [];

    for (const relayed of this.relayedCalls.values()) {
      const result = this.converter.fromToolCall(relayed.name, relayed.arguments);
      if (result.kind === 'invalid') {
        logger.warn('Upstream tool call has no usable name, sent as text', {
          reason: result.reason,
        });
        if (relayed.arguments.length > 0) {
          frames.push(this.frame({ content: relayed.arguments }));
        }
        continue;
      }

      this.calls++;
      frames.push(this.frame({ content: this.converter.render(result.call) }));
    }

    this.relayedCalls.clear();
    return frames;
  }

  /**
   * Closing frame carrying the finish reason
   */
  finalFrame(upstreamFinish?: FinishReason): ChatCompletionChunk {
    return this.frame({}, this.finishReason(upstreamFinish));
  }

  finishReason(upstreamFinish?: FinishReason): NonNullable<FinishReason> {
    if (this.format === 'json' && this.calls > 0) {
      return 'tool_calls';
    }
    if (!upstreamFinish || (this.format === 'xml' && upstreamFinish === 'tool_calls')) {
      return 'stop';
    }
    return upstreamFinish;
  }

  private callDelta(call: Call): Delta {
    this.calls++;
    if (this.format === 'xml') {
      return { content: this.converter.render(call) };
    }

    const toolCall = toOpenAIToolCall(call, generateCallId());
    return {
      tool_calls: [
        {
          index: this.toolCallIndex++,
          id: toolCall.id,
          type: 'function',
          function: toolCall.function,
        },
      ],
    };
  }

  private reindex(toolCall: ToolCallDelta): ToolCallDelta {
    let index = this.relayedIndexes.get(toolCall.index);
    if (index === undefined) {
      index = this.toolCallIndex++;
      this.relayedIndexes.set(toolCall.index, index);
      this.calls++;
    }
    return { ...toolCall, index };
  }

  private collect(toolCall: ToolCallDelta): void {
    const relayed = this.relayedCalls.get(toolCall.index) ?? { name: '', arguments: '' };
    relayed.name += toolCall.function?.name ?? '';
    relayed.arguments += toolCall.function?.arguments ?? '';
    this.relayedCalls.set(toolCall.index, relayed);
  }

  private frame(delta: Delta, finishReason: FinishReason = null): ChatCompletionChunk {
    return {
      id: this.identity.id,
      object: 'chat.completion.chunk',
      created: this.identity.created,
      model: this.identity.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
  }
}
