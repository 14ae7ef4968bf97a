/**
 * In-process stand-in for an Express response
 * Records status, headers, JSON bodies and raw SSE writes
 */

import type { StreamResponse } from '@/modules/http/types';

type Listener = () => void;

export class FakeResponse implements StreamResponse {
  statusCode = 200;
  headers: Record<string, string> = {};
  body: unknown = undefined;
  chunks: string[] = [];
  headersSent = false;
  writableEnded = false;
  destroyed = false;

  /** Return values for upcoming write() calls (true once exhausted) */
  writeResults: boolean[] = [];

  /** Called after every write, lets a test react mid-stream */
  onWrite?: (chunk: string) => void;

  private listeners = new Map<string, Listener[]>();
  private originals = new Map<Listener, Listener>();

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.headersSent = true;
    this.writableEnded = true;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  flushHeaders(): void {
    this.headersSent = true;
  }

  write(chunk: string): boolean {
    this.headersSent = true;
    this.chunks.push(chunk);
    this.onWrite?.(chunk);
    return this.writeResults.shift() ?? true;
  }

  end(): void {
    this.writableEnded = true;
    this.emit('close');
  }

  once(event: 'drain' | 'close', listener: Listener): this {
    const wrapped: Listener = () => {
      this.removeListener(event, wrapped);
      listener();
    };
    this.listeners.set(event, [...(this.listeners.get(event) ?? []), wrapped]);
    this.originals.set(listener, wrapped);
    return this;
  }

  removeListener(event: 'drain' | 'close', listener: Listener): this {
    const target = this.originals.get(listener) ?? listener;
    this.listeners.set(
      event,
      (this.listeners.get(event) ?? []).filter((candidate) => candidate !== target)
    );
    return this;
  }

  emit(event: 'drain' | 'close'): void {
    for (const listener of [...(this.listeners.get(event) ?? [])]) {
      listener();
    }
  }

  listenerCount(event: 'drain' | 'close'): number {
    return (this.listeners.get(event) ?? []).length;
  }

  /**
   * Client goes away
   */
  disconnect(): void {
    this.destroyed = true;
    this.emit('close');
  }

  /**
   * Payloads of the `data:` frames written so far
   */
  dataFrames(): string[] {
    return this.chunks
      .join('')
      .split('\n\n')
      .filter((frame) => frame.startsWith('data: '))
      .map((frame) => frame.slice('data: '.length));
  }
}
