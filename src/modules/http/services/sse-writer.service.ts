/**
 * SSE Writer
 * Writes `data:` frames to a response, waiting for `drain` when the socket buffer is full
 */

import type { SseTarget } from '../types';

export const SSE_DONE = '[DONE]';

export class SseWriter {
  private framesWritten = 0;

  constructor(private readonly target: SseTarget) {}

  /**
   * Client still connected and the response not ended
   */
  get isOpen(): boolean {
    return !this.target.writableEnded && !this.target.destroyed;
  }

  get frames(): number {
    return this.framesWritten;
  }

  /**
   * Send one JSON frame
   * @returns false once the client is gone
   */
  async send(data: unknown): Promise<boolean> {
    return this.write(`data: ${JSON.stringify(data)}\n\n`);
  }

  /**
   * Send the `[DONE]` sentinel and end the response
   */
  async close(): Promise<void> {
    if (!this.isOpen) {
      return;
    }
    await this.write(`data: ${SSE_DONE}\n\n`);
    if (this.isOpen) {
      this.target.end();
    }
  }

  private async write(frame: string): Promise<boolean> {
    if (!this.isOpen) {
      return false;
    }

    this.framesWritten++;
    if (this.target.write(frame)) {
      return true;
    }

    await this.waitForDrain();
    return this.isOpen;
  }

  private waitForDrain(): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        this.target.removeListener('drain', done);
        this.target.removeListener('close', done);
        resolve();
      };
      this.target.once('drain', done);
      this.target.once('close', done);
    });
  }
}
