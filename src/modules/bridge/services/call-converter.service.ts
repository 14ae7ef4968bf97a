/**
 * Call Converter
 * Turns completed commentary blocks into Calls and renders Calls as
 * tag-tree markup (Cline style) or OpenAI tool_calls records
 */

import type OpenAI from 'openai';
import { generateCallId } from '@/shared/utils';
import type {
  Call,
  ChannelBlock,
  ConversionResult,
  ConverterOptions,
  JsonValue,
  NamespaceMode,
  NestedValueMode,
} from '../types';
import { isJsonObject, parseJson, setOwnValue } from '../utils/json';

// ============================================================================
// Payload parsing
// ============================================================================

/**
 * Derive the call name from a recipient such as `functions.write_file`
 */
export function deriveCallName(recipient: string | undefined, mode: NamespaceMode): string {
  const name = (recipient ?? '').trim();
  if (mode === 'keep') {
    return name;
  }
  const separator = Math.max(name.lastIndexOf('.'), name.lastIndexOf('/'));
  return name.slice(separator + 1);
}

function shouldParseJson(payload: string, contentType: string | undefined): boolean {
  if (contentType !== undefined) {
    return contentType === 'json';
  }
  const trimmed = payload.trimStart();
  return trimmed.startsWith('{') || trimmed.startsWith('[');
}

export interface ParsedArguments {
  arguments: Map<string, JsonValue>;
  fallback: boolean;
  /** Parser message when the payload was malformed */
  error?: string;
}

/**
 * Parse a block payload into ordered arguments
 * - JSON object: its entries
 * - other JSON value: single `input` argument
 * - malformed JSON: single `raw` argument holding the payload verbatim (fallback)
 * - plain text: single `raw` argument
 */
export function parseArguments(payload: string, contentType?: string): ParsedArguments {
  const args = new Map<string, JsonValue>();

  if (payload.trim().length === 0) {
    return { arguments: args, fallback: false };
  }

  if (!shouldParseJson(payload, contentType)) {
    args.set('raw', payload);
    return { arguments: args, fallback: false };
  }

  const parsed = parseJson(payload);
  if (!parsed.ok) {
    args.set('raw', payload);
    return { arguments: args, fallback: true, error: parsed.error };
  }

  if (isJsonObject(parsed.value)) {
    for (const [key, value] of Object.entries(parsed.value)) {
      args.set(key, value);
    }
  } else {
    args.set('input', parsed.value);
  }
  return { arguments: args, fallback: false };
}

// ============================================================================
// Rendering
// ============================================================================

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

/**
 * Make a string usable as an element name
 */
export function sanitizeElementName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_.-]/g, '_');
  if (cleaned.length === 0) {
    return '_';
  }
  return /^[A-Za-z_]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

function renderValue(value: JsonValue, nested: NestedValueMode): string {
  if (value === null) return '';
  if (typeof value === 'string') return escapeXml(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (nested === 'json') {
    return escapeXml(JSON.stringify(value));
  }
  if (Array.isArray(value)) {
    return value.map((item) => renderElement('item', item, nested)).join('');
  }
  return Object.entries(value)
    .map(([key, entry]) => renderElement(key, entry, nested))
    .join('');
}

function renderElement(name: string, value: JsonValue, nested: NestedValueMode): string {
  const tag = sanitizeElementName(name);
  return `<${tag}>${renderValue(value, nested)}</${tag}>`;
}

/**
 * Render a call as `<name><arg>value</arg>...</name>`
 */
export function renderTagTree(call: Call, nested: NestedValueMode = 'elements'): string {
  const tag = sanitizeElementName(call.name);
  const children: string[] = [];
  for (const [key, value] of call.arguments) {
    children.push(renderElement(key, value, nested));
  }
  return `<${tag}>${children.join('')}</${tag}>`;
}

export function argumentsToObject(args: Map<string, JsonValue>): { [key: string]: JsonValue } {
  const result: { [key: string]: JsonValue } = {};
  for (const [key, value] of args) {
    setOwnValue(result, key, value);
  }
  return result;
}

/**
 * Plain structured form of a call
 */
export function toStructured(call: Call): { name: string; arguments: { [key: string]: JsonValue } } {
  return { name: call.name, arguments: argumentsToObject(call.arguments) };
}

/**
 * OpenAI message tool call (`arguments` is a JSON string)
 */
export function toOpenAIToolCall(
  call: Call,
  id: string = generateCallId()
): OpenAI.ChatCompletionMessageToolCall {
  return {
    id,
    type: 'function',
    function: {
      name: call.name,
      arguments: JSON.stringify(argumentsToObject(call.arguments)),
    },
  };
}

// ============================================================================
// Converter
// ============================================================================

export class CallConverter {
  constructor(private readonly options: ConverterOptions) {}

  /**
   * Convert a completed call block
   */
  convert(block: ChannelBlock): ConversionResult {
    const name = deriveCallName(block.recipient, this.options.namespaceMode);
    if (!name) {
      return { kind: 'invalid', reason: `empty call name for recipient "${block.recipient ?? ''}"` };
    }

    const parsed = parseArguments(block.payload, block.contentType);
    const call: Call = { name, arguments: parsed.arguments, fallback: parsed.fallback };

    return parsed.error === undefined
      ? { kind: 'call', call }
      : { kind: 'call', call, parseError: parsed.error };
  }

  /**
   * Convert a tool call the model server parsed itself (`arguments` is a JSON string)
   */
  fromToolCall(name: string, args: string): ConversionResult {
    const callName = deriveCallName(name, this.options.namespaceMode);
    if (!callName) {
      return { kind: 'invalid', reason: `empty call name "${name}"` };
    }

    const parsed = parseArguments(args, 'json');
    const call: Call = { name: callName, arguments: parsed.arguments, fallback: parsed.fallback };

    return parsed.error === undefined
      ? { kind: 'call', call }
      : { kind: 'call', call, parseError: parsed.error };
  }

  /**
   * Tag-tree markup, nested values rendered per the converter options
   */
  render(call: Call): string {
    return renderTagTree(call, this.options.nestedValues);
  }
}
