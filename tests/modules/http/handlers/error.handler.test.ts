/**
 * Error Handler Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  errorBody,
  handleHttpError,
  handleNotFound,
  sendError,
} from '@/modules/http/handlers/error.handler';
import { FakeResponse } from '../helpers/fake-response';

const route = { method: 'POST', path: '/v1/chat/completions' };

describe('Error Handler', () => {
  it('should build OpenAI-style error bodies', () => {
    expect(errorBody('boom', 'proxy_error')).toEqual({
      error: { message: 'boom', type: 'proxy_error' },
    });
  });

  it('should not send an error once the response has started', () => {
    const res = new FakeResponse();
    res.flushHeaders();

    sendError(res, 500, 'late', 'proxy_error');

    expect(res.statusCode).toBe(200);
    expect(res.body).toBeUndefined();
  });

  it('should answer 404 for unknown routes', () => {
    const res = new FakeResponse();

    handleNotFound({ method: 'GET', path: '/v2/nothing' }, res);

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({
      error: { message: 'Route GET /v2/nothing not found', type: 'not_found' },
    });
  });

  it('should map body parser syntax errors to 400', () => {
    const res = new FakeResponse();
    const next = vi.fn();

    handleHttpError(new SyntaxError('Unexpected token } in JSON'), route, res, next);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: { message: 'Invalid JSON', type: 'bad_request' } });
    expect(next).not.toHaveBeenCalled();
  });

  it('should map oversized bodies to 413', () => {
    const res = new FakeResponse();

    handleHttpError({ status: 413, message: 'request entity too large' }, route, res, vi.fn());

    expect(res.statusCode).toBe(413);
    expect(res.body).toEqual({
      error: { message: 'Request body too large', type: 'bad_request' },
    });
  });

  it('should answer 500 with the error message for anything else', () => {
    const res = new FakeResponse();

    handleHttpError(new Error('unexpected'), route, res, vi.fn());

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: { message: 'unexpected', type: 'proxy_error' } });
  });

  it('should defer to express when headers were already sent', () => {
    const res = new FakeResponse();
    res.flushHeaders();
    const next = vi.fn();
    const error = new Error('mid-stream');

    handleHttpError(error, route, res, next);

    expect(next).toHaveBeenCalledWith(error);
    expect(res.body).toBeUndefined();
  });
});
