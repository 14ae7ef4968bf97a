/**
 * Reassembly Buffer
 * Carries a partially received marker from one network chunk to the next,
 * so the lexer only ever sees markers it can fully interpret.
 */

import type { Token } from '../types';
import { MarkerLexer } from './lexer.service';

export class ReassemblyBuffer {
  private tail = '';
  private flushed = false;

  constructor(private readonly lexer: MarkerLexer) {}

  /**
   * Tokenize a chunk, prepending whatever was held back by the previous call
   */
  feed(chunk: string): Token[] {
    if (this.flushed || chunk.length === 0) {
      return [];
    }

    const result = this.lexer.tokenize(this.tail + chunk);
    this.tail = result.tail;
    return result.tokens;
  }

  /**
   * Interpret the held-back tail as final input (partial markers become literal text).
   * Later calls return nothing.
   */
  flush(): Token[] {
    if (this.flushed) {
      return [];
    }
    this.flushed = true;

    const remaining = this.tail;
    this.tail = '';
    if (!remaining) {
      return [];
    }
    return this.lexer.tokenize(remaining, true).tokens;
  }

  /**
   * Number of characters currently held back
   */
  get pending(): number {
    return this.tail.length;
  }

  get isFlushed(): boolean {
    return this.flushed;
  }
}
