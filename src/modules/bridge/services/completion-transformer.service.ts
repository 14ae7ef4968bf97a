/**
 * Completion Transformer
 * Non-streaming counterpart of the chunk emitter: runs a whole assistant
 * message through one session and rewrites the completion
 */

import type OpenAI from 'openai';
import type { BridgeRecord, Call, OutputFormat, SessionOptions } from '../types';
import { bridgeSessionService } from './bridge-session.service';
import { toOpenAIToolCall } from './call-converter.service';

export interface TransformOptions {
  format: OutputFormat;
  /** Defaults to the bridge configuration */
  session?: SessionOptions;
}

export interface TransformedMessage {
  records: BridgeRecord[];
  content: string;
  calls: Call[];
  /** Channel blocks found in the text; 0 means plain text */
  blocks: number;
}

/**
 * Run raw producer text through a fresh session
 * @param upstreamToolCalls - Calls the model server parsed itself, appended after the bridged ones
 */
export function bridgeMessage(
  raw: string,
  options: TransformOptions,
  upstreamToolCalls: readonly OpenAI.ChatCompletionMessageToolCall[] = []
): TransformedMessage {
  const session = bridgeSessionService.createSession(options.session);
  try {
    const records = [...session.push(raw), ...session.finish()];

    for (const toolCall of upstreamToolCalls) {
      const result = session.converter.fromToolCall(
        toolCall.function.name,
        toolCall.function.arguments
      );
      if (result.kind === 'call') {
        records.push({ type: 'call', call: result.call });
      } else if (toolCall.function.arguments) {
        records.push({ type: 'text', text: toolCall.function.arguments });
      }
    }

    const calls: Call[] = [];
    let content = '';

    for (const record of records) {
      if (record.type === 'text') {
        content += record.text;
      } else {
        calls.push(record.call);
        if (options.format === 'xml') {
          content += session.converter.render(record.call);
        }
      }
    }

    return { records, content, calls, blocks: session.getBlocks().length };
  } finally {
    bridgeSessionService.endSession(session.id);
  }
}

/**
 * Rewrite the first choice of a completion
 * - xml: calls (bridged, then upstream-parsed) rendered into the content, tool_calls removed
 * - json with calls: content null, calls as tool_calls
 * A message without channel blocks is left untouched.
 */
export function transformCompletion(
  completion: OpenAI.ChatCompletion,
  options: TransformOptions
): OpenAI.ChatCompletion {
  const [first, ...rest] = completion.choices;
  if (!first) {
    return completion;
  }

  const { tool_calls: upstreamToolCalls, ...message } = first.message;
  const bridged = bridgeMessage(first.message.content ?? '', options, upstreamToolCalls);
  if (bridged.blocks === 0) {
    return completion;
  }

  let choice: OpenAI.ChatCompletion.Choice;
  if (options.format === 'json' && bridged.calls.length > 0) {
    choice = {
      ...first,
      message: {
        ...message,
        content: null,
        tool_calls: bridged.calls.map((call) => toOpenAIToolCall(call)),
      },
      finish_reason: 'tool_calls',
    };
  } else {
    choice = {
      ...first,
      message: { ...message, content: bridged.content },
      finish_reason: 'stop',
    };
  }

  return { ...completion, choices: [choice, ...rest] };
}
