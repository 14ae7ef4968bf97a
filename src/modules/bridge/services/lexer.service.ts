/**
 * Marker Lexer
 * Turns raw text into channel/recipient/content-type/message/end marker tokens and literals
 *
 * Rule for chunked input: when the text from some position to the end of the
 * input is a strict prefix of a marker (or an opened parameterized marker still
 * waiting for its close), that suffix is returned as `tail` instead of literal
 * text. The caller prepends it to the next chunk.
 */

import { isParameterized } from '../config/markers.config';
import type { LexResult, MarkerDefinition, MarkerKind, MarkerTable, Token } from '../types';

type MatchResult =
  | { type: 'token'; token: Token; length: number }
  | { type: 'partial' }
  | { type: 'none' };

function spelling(marker: MarkerDefinition): string {
  return isParameterized(marker) ? marker.open : marker.text;
}

function markerToken(kind: MarkerKind, raw: string, argument?: string): Token {
  switch (kind) {
    case 'start':
      return { type: 'start', raw };
    case 'channel':
      return argument === undefined
        ? { type: 'channel', raw }
        : { type: 'channel', raw, name: argument };
    case 'recipient':
      return argument === undefined
        ? { type: 'recipient', raw }
        : { type: 'recipient', raw, name: argument };
    case 'contentType':
      return argument === undefined
        ? { type: 'contentType', raw }
        : { type: 'contentType', raw, kind: argument };
    case 'message':
      return { type: 'message', raw };
    case 'end':
      return { type: 'end', raw };
  }
}

export class MarkerLexer {
  private readonly markers: MarkerDefinition[];
  private readonly leadChars: Set<string>;
  private readonly maxArgumentLength: number;

  constructor(table: MarkerTable) {
    // Longest spelling first so the longest marker wins at a position
    this.markers = [...table.markers].sort((a, b) => spelling(b).length - spelling(a).length);
    this.leadChars = new Set(this.markers.map((marker) => spelling(marker)[0]));
    this.maxArgumentLength = table.maxArgumentLength;
  }

  /**
   * Tokenize one piece of input
   * @param input - Text to scan (the previous tail already prepended)
   * @param final - No more input follows; partial markers become literal text
   */
  tokenize(input: string, final = false): LexResult {
    const tokens: Token[] = [];
    let literalStart = 0;
    let position = 0;

    const flushLiteral = (end: number): void => {
      if (end > literalStart) {
        tokens.push({ type: 'literal', text: input.slice(literalStart, end) });
      }
    };

    while (position < input.length) {
      if (!this.leadChars.has(input[position])) {
        position++;
        continue;
      }

      const match = this.matchAt(input, position, final);

      if (match.type === 'token') {
        flushLiteral(position);
        tokens.push(match.token);
        position += match.length;
        literalStart = position;
      } else if (match.type === 'partial') {
        flushLiteral(position);
        return { tokens, tail: input.slice(position) };
      } else {
        position++;
      }
    }

    flushLiteral(input.length);
    return { tokens, tail: '' };
  }

  private matchAt(input: string, position: number, final: boolean): MatchResult {
    let partial = false;

    for (const marker of this.markers) {
      if (!isParameterized(marker)) {
        if (input.startsWith(marker.text, position)) {
          // A longer marker may still complete; wait for it
          return partial
            ? { type: 'partial' }
            : {
                type: 'token',
                token: markerToken(marker.kind, marker.text),
                length: marker.text.length,
              };
        }
        if (!final && this.isStrictPrefix(input, position, marker.text)) {
          partial = true;
        }
        continue;
      }

      if (!input.startsWith(marker.open, position)) {
        if (!final && this.isStrictPrefix(input, position, marker.open)) {
          partial = true;
        }
        continue;
      }

      const argumentStart = position + marker.open.length;
      const window = input.slice(
        argumentStart,
        argumentStart + this.maxArgumentLength + marker.close.length
      );
      const closeOffset = window.indexOf(marker.close);

      if (closeOffset === -1) {
        // Still open at the end of input: the close may arrive with the next chunk
        const reachesEnd = argumentStart + window.length === input.length;
        if (
          !final &&
          reachesEnd &&
          window.length < this.maxArgumentLength + marker.close.length &&
          this.isValidArgument(window)
        ) {
          partial = true;
        }
        continue;
      }

      const argument = window.slice(0, closeOffset);
      if (argument.length <= this.maxArgumentLength && this.isValidArgument(argument)) {
        if (partial) {
          return { type: 'partial' };
        }
        const length = marker.open.length + closeOffset + marker.close.length;
        return {
          type: 'token',
          token: markerToken(marker.kind, input.slice(position, position + length), argument.trim()),
          length,
        };
      }
    }

    return partial ? { type: 'partial' } : { type: 'none' };
  }

  /**
   * The input from `position` to its end is a strict, non-empty prefix of `text`
   */
  private isStrictPrefix(input: string, position: number, text: string): boolean {
    const remaining = input.length - position;
    return remaining > 0 && remaining < text.length && text.startsWith(input.slice(position));
  }

  /**
   * Arguments are single-line and never contain the start of another marker
   */
  private isValidArgument(argument: string): boolean {
    if (argument.includes('\n')) {
      return false;
    }
    for (const char of argument) {
      if (this.leadChars.has(char)) {
        return false;
      }
    }
    return true;
  }
}
