/**
 * Block Router
 * Decides, from a block's header alone, what becomes of it
 */

import { logger, LogLevel } from '@/shared/utils';
import type { BlockRoute, ChannelBlock } from '../types';

/**
 * Route a block by channel
 * - analysis: suppressed (never reaches the client)
 * - commentary addressed to a recipient: tool call
 * - everything else: passthrough text
 */
export function routeBlock(block: Pick<ChannelBlock, 'channel' | 'recipient' | 'continued'>): BlockRoute {
  const channel = block.channel;
  switch (channel) {
    case 'analysis':
      return 'suppress';
    case 'commentary':
      if (block.continued || !block.recipient?.trim()) {
        return 'passthrough';
      }
      return 'call';
    case 'final':
    case 'unknown':
      return 'passthrough';
    default: {
      const unhandled: never = channel;
      throw new Error(`Unhandled channel: ${String(unhandled)}`);
    }
  }
}

/**
 * Drops suppressed blocks, optionally logging what was dropped
 */
export class BlockSuppressor {
  private suppressed = 0;

  constructor(
    private readonly capture: boolean,
    private readonly previewLength: number
  ) {}

  suppress(block: ChannelBlock, sessionId: string): void {
    this.suppressed++;

    if (this.capture && logger.isLevelEnabled(LogLevel.DEBUG)) {
      logger.debug('Suppressed channel block', {
        sessionId,
        index: block.index,
        channel: block.channelName,
        length: block.payload.length,
        preview: block.payload.slice(0, this.previewLength),
      });
    }
  }

  get count(): number {
    return this.suppressed;
  }
}
