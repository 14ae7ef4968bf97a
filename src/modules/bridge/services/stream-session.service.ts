/**
 * Stream Session
 * One per response stream: buffer -> lexer -> state machine -> router -> converter.
 *
 * Passthrough text is released as soon as it is lexed. Calls are released
 * whole, when their block completes. Suppressed blocks never leave the session.
 */

import { generateId, logger } from '@/shared/utils';
import { bridgeConfig } from '../config/bridge.config';
import type {
  BlockRoute,
  BridgeFault,
  BridgeRecord,
  Call,
  ChannelBlock,
  MachineEvent,
  SessionOptions,
} from '../types';
import { BridgeFaultType } from '../types';
import { BlockSuppressor, routeBlock } from './block-router.service';
import { CallConverter } from './call-converter.service';
import { ChannelStateMachine } from './channel-state-machine.service';
import { MarkerLexer } from './lexer.service';
import { ReassemblyBuffer } from './reassembly-buffer.service';

/**
 * Observer for session activity (used by the session registry for metrics)
 */
export interface SessionListener {
  onBlockCompleted?(block: ChannelBlock, route: BlockRoute): void;
  onCall?(call: Call): void;
  onFault?(fault: BridgeFault): void;
}

export interface SessionStats {
  blocks: number;
  suppressed: number;
  calls: number;
  faults: number;
  textChars: number;
}

export class StreamSession {
  readonly id: string;
  private readonly buffer: ReassemblyBuffer;
  private readonly machine: ChannelStateMachine;
  /** Shared with the emitter so calls render with this session's options */
  readonly converter: CallConverter;
  private readonly suppressor: BlockSuppressor;
  private readonly listener: SessionListener;

  private openRoute?: BlockRoute;
  private emitted: BridgeRecord[] = [];
  private blocks: ChannelBlock[] = [];
  private finished = false;
  private callCount = 0;
  private faultCount = 0;
  private textChars = 0;

  constructor(options: SessionOptions, listener: SessionListener = {}, id: string = generateId()) {
    this.id = id;
    this.buffer = new ReassemblyBuffer(new MarkerLexer(options.markers));
    this.machine = new ChannelStateMachine({ maxBlockChars: options.maxBlockChars });
    this.converter = new CallConverter(options);
    this.suppressor = new BlockSuppressor(options.captureSuppressed, bridgeConfig.logPreviewLength);
    this.listener = listener;
  }

  /**
   * Feed one chunk of producer text; returns the records it released
   */
  push(chunk: string): BridgeRecord[] {
    if (this.finished) {
      logger.warn('Chunk pushed after session finished', {
        sessionId: this.id,
        length: chunk.length,
      });
      return [];
    }

    const tokens = this.buffer.feed(chunk);
    return this.handle(this.machine.consume(tokens));
  }

  /**
   * End of stream: flush held-back text and the open block.
   * Later calls return nothing.
   */
  finish(): BridgeRecord[] {
    if (this.finished) {
      return [];
    }
    this.finished = true;

    const events = this.machine.consume(this.buffer.flush());
    events.push(...this.machine.finish());
    return this.handle(events);
  }

  /**
   * Every record released so far, in order
   */
  getEmitted(): readonly BridgeRecord[] {
    return this.emitted;
  }

  /**
   * Every completed block, suppressed ones included
   */
  getBlocks(): readonly ChannelBlock[] {
    return this.blocks;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get stats(): SessionStats {
    return {
      blocks: this.blocks.length,
      suppressed: this.suppressor.count,
      calls: this.callCount,
      faults: this.faultCount,
      textChars: this.textChars,
    };
  }

  private handle(events: MachineEvent[]): BridgeRecord[] {
    const records: BridgeRecord[] = [];

    for (const event of events) {
      switch (event.type) {
        case 'blockOpened':
          this.openRoute = routeBlock(event.block);
          break;
        case 'blockText':
          if (this.openRoute === 'passthrough') {
            this.emitText(records, event.text);
          }
          break;
        case 'blockCompleted':
          this.completeBlock(records, event.block);
          break;
        case 'looseText':
          if (!event.afterMarkers) {
            this.emitText(records, event.text);
          } else if (event.text.trim().length > 0) {
            logger.debug('Dropped text outside any channel block', {
              sessionId: this.id,
              length: event.text.length,
            });
          }
          break;
      }
    }

    this.emitted.push(...records);
    return records;
  }

  private completeBlock(records: BridgeRecord[], block: ChannelBlock): void {
    const route = this.openRoute ?? routeBlock(block);
    this.openRoute = undefined;
    this.blocks.push(block);

    if (block.closedBy === 'implicit') {
      this.fault(BridgeFaultType.FRAMING, 'Block closed without an end marker', {
        index: block.index,
        channel: block.channelName,
      });
    }

    switch (route) {
      case 'suppress':
        this.suppressor.suppress(block, this.id);
        break;
      case 'call':
        this.completeCall(records, block);
        break;
      case 'passthrough':
        // Text already released as it arrived
        break;
    }

    this.listener.onBlockCompleted?.(block, route);
  }

  private completeCall(records: BridgeRecord[], block: ChannelBlock): void {
    if (block.closedBy === 'limit') {
      this.fault(BridgeFaultType.FRAMING, 'Call block exceeded the size cap, sent as text', {
        index: block.index,
        recipient: block.recipient,
        length: block.payload.length,
      });
      this.emitText(records, block.payload);
      return;
    }

    const result = this.converter.convert(block);
    if (result.kind === 'invalid') {
      this.fault(BridgeFaultType.ROUTING, 'Call block has no usable name, sent as text', {
        index: block.index,
        reason: result.reason,
      });
      this.emitText(records, block.payload);
      return;
    }

    if (result.call.fallback) {
      this.fault(BridgeFaultType.PAYLOAD, 'Malformed call payload, passing it as raw text', {
        index: block.index,
        call: result.call.name,
        error: result.parseError,
      });
    }

    this.callCount++;
    records.push({ type: 'call', call: result.call });
    this.listener.onCall?.(result.call);

    logger.debug('Call extracted', {
      sessionId: this.id,
      call: result.call.name,
      arguments: result.call.arguments.size,
      fallback: result.call.fallback,
    });
  }

  private emitText(records: BridgeRecord[], text: string): void {
    if (text.length === 0) {
      return;
    }
    this.textChars += text.length;

    const last = records[records.length - 1];
    if (last && last.type === 'text') {
      last.text += text;
    } else {
      records.push({ type: 'text', text });
    }
  }

  private fault(type: BridgeFaultType, message: string, meta: Record<string, unknown>): void {
    this.faultCount++;
    const fault: BridgeFault = { type, message, sessionId: this.id, meta };

    if (this.listener.onFault) {
      this.listener.onFault(fault);
    } else {
      logger.warn(message, { sessionId: this.id, faultType: type, ...meta });
    }
  }
}
