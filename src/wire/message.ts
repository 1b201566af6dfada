// src/wire/message.ts
import type { Decoder } from './decoder.ts';
import type { Encoder } from './encoder.ts';
import { ErrorMessages } from './errors.ts';
import type { Position } from './position.ts';
import type { AnyRecursionDepth } from './recursion.ts';
import type { WireType } from './wire-type.ts';

export const TRANSACTION_HEADER_SIZE = 16;
export const MAGIC_NUMBER_INITIAL = 1;
export const AT_REST_FLAG_WIRE_FORMAT_V2 = 0x0002;
export const DYNAMIC_FLAG_FLEXIBLE = 0x80;
export const EPITAPH_ORDINAL = 0xffff_ffff_ffff_ffffn;

export interface TransactionHeader {
  txid: number;
  atRestFlags: number;
  dynamicFlags: number;
  magic: number;
  ordinal: bigint;
}

export interface Message<T> {
  header: TransactionHeader;
  body: T;
}

export interface HeaderOptions {
  txid?: number;
  flexible?: boolean;
}

export function createHeader(ordinal: bigint, options: HeaderOptions = {}): TransactionHeader {
  return {
    txid: options.txid ?? 0,
    atRestFlags: AT_REST_FLAG_WIRE_FORMAT_V2,
    dynamicFlags: options.flexible ? DYNAMIC_FLAG_FLEXIBLE : 0,
    magic: MAGIC_NUMBER_INITIAL,
    ordinal,
  };
}

export function isFlexible(header: TransactionHeader): boolean {
  return (header.dynamicFlags & DYNAMIC_FLAG_FLEXIBLE) !== 0;
}

export function isEpitaph(header: TransactionHeader): boolean {
  return header.ordinal === EPITAPH_ORDINAL;
}

/** Reads the header fields without judging them; see `validateHeader`. */
export function readHeader(position: Position): TransactionHeader {
  return {
    txid: position.readUint32(0),
    atRestFlags: position.readUint16(4),
    dynamicFlags: position.readUint8(6),
    magic: position.readUint8(7),
    ordinal: position.readUint64(8),
  };
}

export function writeHeader(position: Position, header: TransactionHeader): void {
  position.writeUint32(0, header.txid);
  position.writeUint16(4, header.atRestFlags);
  position.writeUint8(6, header.dynamicFlags);
  position.writeUint8(7, header.magic);
  position.writeUint64(8, header.ordinal);
}

/** Returns the reason a header cannot be decoded, or undefined if it can. */
export function validateHeader(header: TransactionHeader): string | undefined {
  if (header.magic !== MAGIC_NUMBER_INITIAL) return ErrorMessages.INVALID_MAGIC;
  if ((header.atRestFlags & AT_REST_FLAG_WIRE_FORMAT_V2) === 0) return ErrorMessages.UNSUPPORTED_WIRE_FORMAT;
  return undefined;
}

export const transactionHeader: WireType<TransactionHeader> = {
  inlineSize: TRANSACTION_HEADER_SIZE,
  inlineAlign: 8,
  encode(_encoder: Encoder, value: TransactionHeader, position: Position): void {
    writeHeader(position, value);
  },
  decode(decoder: Decoder, position: Position): TransactionHeader | undefined {
    const header = readHeader(position);
    const problem = validateHeader(header);
    if (problem) {
      decoder.setError('VALIDATION', problem);
      return undefined;
    }
    return header;
  },
};

/** A header followed by `body`, laid out as a single root object. */
export function messageType<T>(body: WireType<T>): WireType<Message<T>> {
  return {
    inlineSize: TRANSACTION_HEADER_SIZE + body.inlineSize,
    inlineAlign: 8,
    recursive: body.recursive,
    encode(encoder: Encoder, value: Message<T>, position: Position, depth: AnyRecursionDepth): void {
      transactionHeader.encode(encoder, value.header, position.sub(0, TRANSACTION_HEADER_SIZE), depth);
      body.encode(encoder, value.body, position.sub(TRANSACTION_HEADER_SIZE, body.inlineSize), depth);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): Message<T> | undefined {
      const header = transactionHeader.decode(decoder, position.sub(0, TRANSACTION_HEADER_SIZE), depth);
      if (!header) return undefined;
      const decoded = body.decode(decoder, position.sub(TRANSACTION_HEADER_SIZE, body.inlineSize), depth);
      if (decoded === undefined) return undefined;
      return { header, body: decoded };
    },
  };
}

// int32 status, padded to the alignment.
const epitaphBody: WireType<number> = {
  inlineSize: 8,
  inlineAlign: 8,
  encode(_encoder: Encoder, value: number, position: Position): void {
    position.writeInt32(0, value);
  },
  decode(decoder: Decoder, position: Position): number | undefined {
    if (!position.isZero(4, 4)) {
      decoder.setError('VALIDATION', ErrorMessages.NON_ZERO_PADDING);
      return undefined;
    }
    return position.readInt32(0);
  },
};

export const epitaphMessage = messageType(epitaphBody);

export function createEpitaph(status: number): Message<number> {
  return { header: createHeader(EPITAPH_ORDINAL), body: status };
}
