/**
 * Channel State Machine
 * Consumes lexer tokens, tracks the open channel and its header fields,
 * accumulates payload text and emits completed ChannelBlocks.
 *
 * States:
 * - idle: no channel open
 * - header: a channel (or role) header is being read, waiting for the message marker
 * - accumulating: literal text goes into the open block's payload
 *
 * Recovery rules:
 * - A channel/start marker while accumulating closes the open block (producer omitted <end>)
 * - At end of stream a non-blank open block is flushed, a blank one is dropped
 * - A payload that reaches maxBlockChars is split into a continuation block
 */

import type { Channel, ChannelBlock, MachineEvent, MachineState, Token } from '../types';

type HeaderField = 'role' | 'channel' | 'recipient' | 'contentType';

interface PendingHeader {
  text: Record<HeaderField, string>;
  cursor: HeaderField;
  hasChannel: boolean;
  channelName?: string;
  recipient?: string;
  contentType?: string;
}

export interface ChannelStateMachineOptions {
  maxBlockChars: number;
  /** Longest header text before the header is abandoned */
  maxHeaderChars?: number;
}

const KNOWN_CHANNELS: readonly Channel[] = ['analysis', 'commentary', 'final'];

const DEFAULT_MAX_HEADER_CHARS = 512;

export function toChannel(name: string): Channel {
  const normalized = name.trim().toLowerCase();
  return KNOWN_CHANNELS.find((channel) => channel === normalized) ?? 'unknown';
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class ChannelStateMachine {
  private state: MachineState = 'idle';
  private header?: PendingHeader;
  private block?: ChannelBlock;
  private blockCount = 0;
  private markersSeen = false;
  private finished = false;
  private readonly maxBlockChars: number;
  private readonly maxHeaderChars: number;

  constructor(options: ChannelStateMachineOptions) {
    this.maxBlockChars = Math.max(1, options.maxBlockChars);
    this.maxHeaderChars = options.maxHeaderChars ?? DEFAULT_MAX_HEADER_CHARS;
  }

  get currentState(): MachineState {
    return this.state;
  }

  /**
   * Block currently receiving payload, if any
   */
  get currentBlock(): Readonly<ChannelBlock> | undefined {
    return this.block;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Advance the machine over tokens in stream order
   */
  consume(tokens: Token[]): MachineEvent[] {
    const events: MachineEvent[] = [];
    if (this.finished) {
      return events;
    }

    for (const token of tokens) {
      switch (this.state) {
        case 'idle':
          this.stepIdle(token, events);
          break;
        case 'header':
          this.stepHeader(token, events);
          break;
        case 'accumulating':
          this.stepAccumulating(token, events);
          break;
      }
      if (token.type !== 'literal') {
        this.markersSeen = true;
      }
    }

    return events;
  }

  /**
   * End of stream: flush a non-blank open block, drop everything else.
   * Later calls return nothing.
   */
  finish(): MachineEvent[] {
    const events: MachineEvent[] = [];
    if (this.finished) {
      return events;
    }
    this.finished = true;

    if (this.state === 'accumulating' && this.block) {
      if (this.block.payload.trim().length > 0) {
        this.completeBlock('stream', events);
      } else {
        this.block = undefined;
      }
    }

    this.header = undefined;
    this.state = 'idle';
    return events;
  }

  private stepIdle(token: Token, events: MachineEvent[]): void {
    switch (token.type) {
      case 'literal':
        events.push({ type: 'looseText', text: token.text, afterMarkers: this.markersSeen });
        return;
      case 'start':
        this.beginHeader('role');
        return;
      case 'channel':
        this.beginHeader('channel');
        this.setChannelName(token.name);
        return;
      case 'recipient':
        this.beginHeader('channel', false);
        this.setField('recipient', token.name);
        return;
      case 'contentType':
        this.beginHeader('channel', false);
        this.setField('contentType', token.kind);
        return;
      case 'message':
        // Message without any header: a channel-less message
        this.beginHeader('channel', false);
        this.openBlock(events);
        return;
      case 'end':
        return;
    }
  }

  private stepHeader(token: Token, events: MachineEvent[]): void {
    const header = this.header;
    if (!header) {
      this.state = 'idle';
      this.stepIdle(token, events);
      return;
    }

    switch (token.type) {
      case 'literal':
        header.text[header.cursor] += token.text;
        if (this.headerLength(header) > this.maxHeaderChars) {
          this.abandonHeader(header, events);
        }
        return;
      case 'start':
        this.beginHeader('role');
        return;
      case 'channel':
        if (header.hasChannel) {
          this.beginHeader('channel');
        } else {
          header.cursor = 'channel';
          header.hasChannel = true;
        }
        this.setChannelName(token.name);
        return;
      case 'recipient':
        this.setField('recipient', token.name);
        return;
      case 'contentType':
        this.setField('contentType', token.kind);
        return;
      case 'message':
        this.openBlock(events);
        return;
      case 'end':
        this.header = undefined;
        this.state = 'idle';
        return;
    }
  }

  private stepAccumulating(token: Token, events: MachineEvent[]): void {
    switch (token.type) {
      case 'literal':
        this.append(token.text, events);
        return;
      case 'channel':
        this.completeBlock('implicit', events);
        this.beginHeader('channel');
        this.setChannelName(token.name);
        return;
      case 'start':
        this.completeBlock('implicit', events);
        this.beginHeader('role');
        return;
      case 'end':
        this.completeBlock('end', events);
        return;
      case 'recipient':
      case 'contentType':
      case 'message':
        // No meaning inside a payload; keep the text as written
        this.append(token.raw, events);
        return;
    }
  }

  private beginHeader(cursor: HeaderField, hasChannel = cursor === 'channel'): void {
    this.header = {
      text: { role: '', channel: '', recipient: '', contentType: '' },
      cursor,
      hasChannel,
    };
    this.state = 'header';
  }

  private setChannelName(name: string | undefined): void {
    if (this.header && name !== undefined) {
      this.header.channelName = name;
    }
  }

  /**
   * A named marker sets the field; a bare one makes the following text its value
   */
  private setField(field: 'recipient' | 'contentType', value: string | undefined): void {
    if (!this.header) {
      return;
    }
    if (value === undefined) {
      this.header.cursor = field;
    } else {
      this.header[field] = value;
    }
  }

  private headerLength(header: PendingHeader): number {
    return (
      header.text.role.length +
      header.text.channel.length +
      header.text.recipient.length +
      header.text.contentType.length
    );
  }

  private abandonHeader(header: PendingHeader, events: MachineEvent[]): void {
    const text =
      header.text.role + header.text.channel + header.text.recipient + header.text.contentType;
    this.header = undefined;
    this.state = 'idle';
    events.push({ type: 'looseText', text, afterMarkers: true });
  }

  private openBlock(events: MachineEvent[]): void {
    const header = this.header;
    this.header = undefined;

    const channelWords = header ? words(header.text.channel) : [];
    const channelName = header?.channelName ?? channelWords.shift() ?? '';
    let recipient = emptyToUndefined(header?.recipient ?? header?.text.recipient);
    let contentType = emptyToUndefined(header?.contentType ?? header?.text.contentType);

    // Harmony style header: `commentary to=functions.x json`
    for (const word of channelWords) {
      if (word.startsWith('to=')) {
        if (recipient === undefined) {
          recipient = emptyToUndefined(word.slice(3));
        }
      } else if (contentType === undefined) {
        contentType = word;
      }
    }

    // Recipient may also sit in the role header: `assistant to=functions.x`
    for (const word of words(header?.text.role ?? '')) {
      if (word.startsWith('to=') && recipient === undefined) {
        recipient = emptyToUndefined(word.slice(3));
      }
    }

    const block: ChannelBlock = {
      index: this.blockCount++,
      channel: toChannel(channelName),
      channelName,
      payload: '',
      complete: false,
      continued: false,
    };
    if (recipient !== undefined) {
      block.recipient = recipient;
    }
    if (contentType !== undefined) {
      block.contentType = contentType.toLowerCase();
    }

    this.block = block;
    this.state = 'accumulating';
    events.push({ type: 'blockOpened', block });
  }

  private append(text: string, events: MachineEvent[]): void {
    let rest = text;

    while (rest.length > 0 && this.block) {
      const block = this.block;
      const room = this.maxBlockChars - block.payload.length;

      if (rest.length <= room) {
        block.payload += rest;
        events.push({ type: 'blockText', block, text: rest });
        return;
      }

      const head = rest.slice(0, room);
      if (head.length > 0) {
        block.payload += head;
        events.push({ type: 'blockText', block, text: head });
      }
      rest = rest.slice(room);

      this.completeBlock('limit', events);
      this.openContinuation(block, events);
    }
  }

  private openContinuation(previous: ChannelBlock, events: MachineEvent[]): void {
    const block: ChannelBlock = {
      index: this.blockCount++,
      channel: previous.channel,
      channelName: previous.channelName,
      payload: '',
      complete: false,
      continued: true,
    };
    if (previous.recipient !== undefined) {
      block.recipient = previous.recipient;
    }
    if (previous.contentType !== undefined) {
      block.contentType = previous.contentType;
    }

    this.block = block;
    this.state = 'accumulating';
    events.push({ type: 'blockOpened', block });
  }

  private completeBlock(closedBy: NonNullable<ChannelBlock['closedBy']>, events: MachineEvent[]): void {
    const block = this.block;
    if (!block) {
      return;
    }
    block.complete = true;
    block.closedBy = closedBy;
    this.block = undefined;
    this.state = 'idle';
    events.push({ type: 'blockCompleted', block });
  }
}
