/**
 * Marker Lexer Tests
 * Both vocabularies, hold-back of partial markers, literal text that only looks like markup
 */

import { describe, it, expect } from 'vitest';
import { MarkerLexer } from '@/modules/bridge/services/lexer.service';
import { bracketMarkers, harmonyMarkers } from '@/modules/bridge/config';

describe('MarkerLexer', () => {
  describe('bracket vocabulary', () => {
    const lexer = new MarkerLexer(bracketMarkers);

    it('should tokenize a complete call block', () => {
      const result = lexer.tokenize(
        '<channel:commentary><to:write_file><message>{"path":"a.py"}<end>'
      );

      expect(result.tail).toBe('');
      expect(result.tokens).toEqual([
        { type: 'channel', raw: '<channel:commentary>', name: 'commentary' },
        { type: 'recipient', raw: '<to:write_file>', name: 'write_file' },
        { type: 'message', raw: '<message>' },
        { type: 'literal', text: '{"path":"a.py"}' },
        { type: 'end', raw: '<end>' },
      ]);
    });

    it('should trim marker arguments but keep the raw text', () => {
      const result = lexer.tokenize('<type: json >');

      expect(result.tokens).toEqual([{ type: 'contentType', raw: '<type: json >', kind: 'json' }]);
    });

    it('should hold back a partial fixed marker at the end of input', () => {
      const result = lexer.tokenize('Hello <mess');

      expect(result.tokens).toEqual([{ type: 'literal', text: 'Hello ' }]);
      expect(result.tail).toBe('<mess');
    });

    it('should hold back a parameterized marker waiting for its close', () => {
      const result = lexer.tokenize('x<channel:fin');

      expect(result.tokens).toEqual([{ type: 'literal', text: 'x' }]);
      expect(result.tail).toBe('<channel:fin');
    });

    it('should hold back a lone "<" at the end of input', () => {
      const result = lexer.tokenize('a <');

      expect(result.tokens).toEqual([{ type: 'literal', text: 'a ' }]);
      expect(result.tail).toBe('<');
    });

    it('should emit partial markers as literal text when input is final', () => {
      const result = lexer.tokenize('Hello <chan', true);

      expect(result.tokens).toEqual([{ type: 'literal', text: 'Hello <chan' }]);
      expect(result.tail).toBe('');
    });

    it('should leave ordinary markup and comparisons alone', () => {
      const text = 'if a < b then <b>bold</b>';
      const result = lexer.tokenize(text);

      expect(result.tokens).toEqual([{ type: 'literal', text }]);
      expect(result.tail).toBe('');
    });

    it('should not accept an argument longer than the table allows', () => {
      const text = `<channel:${'x'.repeat(200)}>`;
      const result = lexer.tokenize(text);

      expect(result.tokens).toEqual([{ type: 'literal', text }]);
      expect(result.tail).toBe('');
    });

    it('should not accept an argument spanning lines', () => {
      const result = lexer.tokenize('<to:a\nb>');

      expect(result.tokens).toEqual([{ type: 'literal', text: '<to:a\nb>' }]);
    });

    it('should not hold back an unterminated argument that contains a newline', () => {
      const result = lexer.tokenize('<to:a\nb');

      expect(result.tokens).toEqual([{ type: 'literal', text: '<to:a\nb' }]);
      expect(result.tail).toBe('');
    });
  });

  describe('harmony vocabulary', () => {
    const lexer = new MarkerLexer(harmonyMarkers);

    it('should tokenize a harmony tool call', () => {
      const result = lexer.tokenize(
        '<|start|>assistant<|channel|>commentary to=functions.write_file <|constrain|>json<|message|>{"a":1}<|call|>'
      );

      expect(result.tail).toBe('');
      expect(result.tokens).toEqual([
        { type: 'start', raw: '<|start|>' },
        { type: 'literal', text: 'assistant' },
        { type: 'channel', raw: '<|channel|>' },
        { type: 'literal', text: 'commentary to=functions.write_file ' },
        { type: 'contentType', raw: '<|constrain|>' },
        { type: 'literal', text: 'json' },
        { type: 'message', raw: '<|message|>' },
        { type: 'literal', text: '{"a":1}' },
        { type: 'end', raw: '<|call|>' },
      ]);
    });

    it('should map every terminator to an end token', () => {
      const result = lexer.tokenize('<|end|><|call|><|return|>');

      expect(result.tokens).toEqual([
        { type: 'end', raw: '<|end|>' },
        { type: 'end', raw: '<|call|>' },
        { type: 'end', raw: '<|return|>' },
      ]);
    });

    it('should hold back a partial harmony marker', () => {
      const result = lexer.tokenize('final text<|mess');

      expect(result.tokens).toEqual([{ type: 'literal', text: 'final text' }]);
      expect(result.tail).toBe('<|mess');
    });

    it('should treat bracket spellings as literal text', () => {
      const result = lexer.tokenize('<channel:final><message>');

      expect(result.tokens).toEqual([{ type: 'literal', text: '<channel:final><message>' }]);
    });
  });
});
