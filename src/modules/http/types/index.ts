/**
 * HTTP Module Type Definitions
 * Narrow views of the Express request/response used by the handlers
 */

export interface ApiRequest {
  body?: unknown;
}

export interface RouteInfo {
  method: string;
  path: string;
}

export interface JsonResponse {
  readonly headersSent: boolean;
  status(code: number): this;
  json(body: unknown): unknown;
}

/**
 * Writable side of a server-sent events response
 */
export interface SseTarget {
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  write(chunk: string): boolean;
  end(): void;
  once(event: 'drain' | 'close', listener: () => void): unknown;
  removeListener(event: 'drain' | 'close', listener: () => void): unknown;
}

export interface StreamResponse extends JsonResponse, SseTarget {
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
}

/**
 * OpenAI-style error body
 */
export interface ErrorBody {
  error: {
    message: string;
    type: string;
  };
}
