// src/channel/channel.ts
import { EventEmitter } from 'node:events';
import { Rights, UNCONSTRAINED_HANDLE } from '../wire/index.ts';
import type { HandleMetadata, Iovec } from '../wire/index.ts';
import type { HandleTable } from './handle-table.ts';

export const CHANNEL_MAX_MSG_BYTES = 65_536;
export const CHANNEL_MAX_MSG_HANDLES = 64;

export type ChannelErrorCode = 'PEER_CLOSED' | 'BAD_STATE' | 'OUT_OF_RANGE' | 'BAD_HANDLE';

export class ChannelError extends Error {
  constructor(
    readonly code: ChannelErrorCode,
    message: string,
  ) {
    super(`${code}: ${message}`);
    this.name = 'ChannelError';
  }
}

export interface ChannelMessage {
  bytes: Uint8Array;
  handles: number[];
  handleMetadata: HandleMetadata[];
}

interface ChannelEvents {
  readable: [];
  'peer-closed': [];
}

/**
 * One end of a message channel. A write moves its handles into the message:
 * they belong to the message until the peer reads it, and are closed if the
 * write fails or the message is never read.
 */
export class ChannelEnd extends EventEmitter<ChannelEvents> {
  private peer: ChannelEnd | undefined;
  private readonly queue: ChannelMessage[] = [];
  private closed = false;
  private peerClosed = false;

  constructor(private readonly table: HandleTable) {
    super();
  }

  /** @internal */
  link(peer: ChannelEnd): void {
    this.peer = peer;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  write(iovecs: readonly Iovec[], handles: readonly number[], handleMetadata: readonly HandleMetadata[]): void {
    const fail = (code: ChannelErrorCode, message: string): never => {
      for (const raw of handles) {
        if (this.table.isOpen(raw)) this.table.close(raw);
      }
      throw new ChannelError(code, message);
    };

    if (this.closed) fail('BAD_STATE', 'channel end is closed');
    const peer = this.peer;
    if (!peer || this.peerClosed) return fail('PEER_CLOSED', 'peer end is closed');
    if (handles.length > CHANNEL_MAX_MSG_HANDLES) fail('OUT_OF_RANGE', `${handles.length} handles exceed ${CHANNEL_MAX_MSG_HANDLES}`);
    if (handleMetadata.length !== handles.length) fail('OUT_OF_RANGE', 'handle metadata does not match handles');
    const checked: Array<{ raw: number; actual: HandleMetadata; rights: number }> = [];
    handles.forEach((raw, i) => {
      const actual = this.table.metadata(raw);
      if (!actual) return fail('BAD_HANDLE', `handle ${raw} is not open`);
      const claimed: HandleMetadata = handleMetadata[i] ?? UNCONSTRAINED_HANDLE;
      if (claimed.objectType !== 'none' && claimed.objectType !== actual.objectType) {
        fail('BAD_HANDLE', `handle ${raw} is ${actual.objectType}, not ${claimed.objectType}`);
      }
      const rights = claimed.rights === Rights.SAME_RIGHTS ? actual.rights : claimed.rights;
      if ((rights & ~actual.rights) !== 0) {
        fail('BAD_HANDLE', `handle ${raw} lacks rights 0x${(rights & ~actual.rights).toString(16)}`);
      }
      checked.push({ raw, actual, rights });
    });

    const size = iovecs.reduce((total, iovec) => total + iovec.length, 0);
    if (size > CHANNEL_MAX_MSG_BYTES) fail('OUT_OF_RANGE', `${size} bytes exceed ${CHANNEL_MAX_MSG_BYTES}`);
    const bytes = new Uint8Array(size);
    let offset = 0;
    for (const iovec of iovecs) {
      bytes.set(iovec, offset);
      offset += iovec.length;
    }

    // The reader is told what the table holds after the requested reduction,
    // never the writer's own description of a handle.
    const moved: number[] = [];
    const movedMetadata: HandleMetadata[] = [];
    for (const { raw, actual, rights } of checked) {
      const next = rights === actual.rights ? raw : this.table.replace(raw, rights);
      if (next === undefined) throw new ChannelError('BAD_HANDLE', `handle ${raw} rights could not be reduced`);
      moved.push(next);
      movedMetadata.push({ objectType: actual.objectType, rights });
    }

    peer.enqueue({ bytes, handles: moved, handleMetadata: movedMetadata });
  }

  /** Returns the next message, or null when none is queued yet. */
  read(): ChannelMessage | null {
    if (this.closed) throw new ChannelError('BAD_STATE', 'channel end is closed');
    const next = this.queue.shift();
    if (next) return next;
    if (this.peerClosed) throw new ChannelError('PEER_CLOSED', 'peer end is closed');
    return null;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const message of this.queue.splice(0)) {
      for (const raw of message.handles) this.table.close(raw);
    }
    this.peer?.onPeerClosed();
    this.peer = undefined;
  }

  private enqueue(message: ChannelMessage): void {
    this.queue.push(message);
    this.emit('readable');
  }

  private onPeerClosed(): void {
    this.peerClosed = true;
    this.emit('peer-closed');
  }
}

export function createChannelPair(table: HandleTable): [ChannelEnd, ChannelEnd] {
  const left = new ChannelEnd(table);
  const right = new ChannelEnd(table);
  left.link(right);
  right.link(left);
  return [left, right];
}
