// src/channel/endpoint.ts
import {
  WireError,
  createEpitaph,
  createHeader,
  epitaphMessage,
  isEpitaph,
  messageType,
  readHeader,
  Position,
  TRANSACTION_HEADER_SIZE,
  wireDecode,
  wireEncode,
} from '../wire/index.ts';
import type {
  CodingConfig,
  HandleMetadata,
  HeaderOptions,
  Iovec,
  Message,
  WireErrorCode,
  WireType,
} from '../wire/index.ts';
import { CHANNEL_MAX_MSG_BYTES, CHANNEL_MAX_MSG_HANDLES } from './channel.ts';
import type { ChannelEnd } from './channel.ts';
import type { WarnSink } from './handle-table.ts';

// Status values carried in epitaphs, one per error code.
export const EPITAPH_STATUS: Record<WireErrorCode, number> = {
  INVALID_ARGS: -10,
  BUFFER_TOO_SMALL: -15,
  OUT_OF_RANGE: -14,
  INVALID_ENVELOPE: -21,
  RECURSION_DEPTH_EXCEEDED: -21,
  EXTRA_BYTES: -21,
  EXTRA_HANDLES: -21,
  VALIDATION: -21,
};

export interface MessageEndpointOptions {
  config: CodingConfig;
  iovecCapacity?: number;
  /** Transaction id of the first message sent; ids wrap past 0xffff_ffff back to 1. */
  firstTxid?: number;
  warn?: WarnSink;
}

const MAX_TXID = 0xffff_ffff;

/**
 * Sends and receives transactional messages over one channel end. Outgoing
 * messages reuse a single backing buffer sized to the channel limit.
 *
 * A message that fails to decode is fatal to the channel: an epitaph carrying
 * the failure status is sent and the end is closed.
 */
export class MessageEndpoint {
  private readonly backing = new Uint8Array(CHANNEL_MAX_MSG_BYTES);
  private readonly iovecCapacity: number;
  private readonly warn: WarnSink;
  private nextTxid: number;
  private epitaph: number | undefined;

  constructor(
    private readonly channel: ChannelEnd,
    private readonly options: MessageEndpointOptions,
  ) {
    this.iovecCapacity = options.iovecCapacity ?? 16;
    this.warn = options.warn ?? console.warn;
    const firstTxid = options.firstTxid ?? 1;
    if (!Number.isInteger(firstTxid) || firstTxid < 1 || firstTxid > MAX_TXID) {
      throw new RangeError(`firstTxid must be between 1 and ${MAX_TXID}, got ${firstTxid}`);
    }
    this.nextTxid = firstTxid;
  }

  /** Status from an epitaph the peer sent before closing, if one arrived. */
  get peerEpitaph(): number | undefined {
    return this.epitaph;
  }

  /** Encodes and writes one message; returns the transaction id used. */
  send<T>(ordinal: bigint, body: WireType<T>, value: T, header: HeaderOptions = {}): number {
    const txid = header.txid ?? this.takeTxid();
    const iovecs: Iovec[] = [];
    const handles: number[] = [];
    const handleMetadata: HandleMetadata[] = [];
    const result = wireEncode({
      value: { header: createHeader(ordinal, { ...header, txid }), body: value },
      type: messageType(body),
      config: this.options.config,
      iovecs,
      iovecCapacity: this.iovecCapacity,
      handles,
      handleMetadata,
      handleCapacity: CHANNEL_MAX_MSG_HANDLES,
      backing: this.backing,
    });
    if (!result.ok) throw new WireError(result.error);
    this.channel.write(iovecs, handles, handleMetadata);
    return txid;
  }

  /**
   * Reads and decodes the next message, or returns null if none is queued.
   * An epitaph from the peer is recorded and reported as null.
   */
  receive<T>(body: WireType<T>): Message<T> | null {
    const incoming = this.channel.read();
    if (!incoming) return null;

    if (incoming.bytes.length >= TRANSACTION_HEADER_SIZE) {
      const header = readHeader(new Position(incoming.bytes, 0, TRANSACTION_HEADER_SIZE));
      if (isEpitaph(header)) return this.receiveEpitaph(incoming.bytes, incoming.handles, incoming.handleMetadata);
    }

    const result = wireDecode({
      type: messageType(body),
      config: this.options.config,
      bytes: incoming.bytes,
      handles: incoming.handles,
      handleMetadata: incoming.handleMetadata,
    });
    if (!result.ok) {
      this.warn(`[channel] closing after undecodable message: ${result.error.message}`);
      this.closeWithEpitaph(EPITAPH_STATUS[result.error.code]);
      throw new WireError(result.error);
    }
    return result.value;
  }

  /** Sends an epitaph with `status` and closes the channel end. */
  closeWithEpitaph(status: number): void {
    if (this.channel.isClosed) return;
    const iovecs: Iovec[] = [];
    const result = wireEncode({
      value: createEpitaph(status),
      type: epitaphMessage,
      config: this.options.config,
      iovecs,
      iovecCapacity: this.iovecCapacity,
      handleCapacity: 0,
      backing: this.backing,
    });
    try {
      if (result.ok) this.channel.write(iovecs, [], []);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      this.warn(`[channel] epitaph not delivered: ${msg}`);
    } finally {
      this.channel.close();
    }
  }

  close(): void {
    this.channel.close();
  }

  private receiveEpitaph(
    bytes: Uint8Array,
    handles: number[],
    handleMetadata: HandleMetadata[],
  ): null {
    const result = wireDecode({
      type: epitaphMessage,
      config: this.options.config,
      bytes,
      handles,
      handleMetadata,
    });
    if (!result.ok) {
      this.warn(`[channel] closing after malformed epitaph: ${result.error.message}`);
      this.channel.close();
      throw new WireError(result.error);
    }
    this.epitaph = result.value.body;
    return null;
  }

  // Zero is never used as a transaction id.
  private takeTxid(): number {
    const txid = this.nextTxid;
    this.nextTxid = txid >= MAX_TXID ? 1 : txid + 1;
    return txid;
  }
}
