// src/wire/persistent.ts
import { Buffer } from 'node:buffer';
import type { CodingConfig } from './coding-config.ts';
import type { Decoder } from './decoder.ts';
import type { Encoder } from './encoder.ts';
import { ErrorMessages } from './errors.ts';
import {
  AT_REST_FLAG_WIRE_FORMAT_V2,
  MAGIC_NUMBER_INITIAL,
  TRANSACTION_HEADER_SIZE,
  transactionHeader,
} from './message.ts';
import type { Position } from './position.ts';
import type { AnyRecursionDepth } from './recursion.ts';
import { wireDecode, wireEncode } from './transcode.ts';
import type { DecodeResult } from './transcode.ts';
import type { Iovec, WireErrorInfo } from './types.ts';
import type { WireType } from './wire-type.ts';

export const PERSISTENT_HEADER_SIZE = 8;

const DEFAULT_BACKING_SIZE = 65_536;

/**
 * Header of a message stored outside any transaction: a zero byte, the magic
 * number, the at-rest flags, then four reserved zero bytes.
 */
export interface PersistentHeader {
  magic: number;
  atRestFlags: number;
}

export interface PersistentMessage<T> {
  header: PersistentHeader;
  body: T;
}

export type PersistentEncodeResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: WireErrorInfo };

export interface PersistentEncodeOptions {
  config: CodingConfig;
  backing?: Uint8Array;
}

export function createPersistentHeader(): PersistentHeader {
  return { magic: MAGIC_NUMBER_INITIAL, atRestFlags: AT_REST_FLAG_WIRE_FORMAT_V2 };
}

export function validatePersistentHeader(header: PersistentHeader): string | undefined {
  if (header.magic !== MAGIC_NUMBER_INITIAL) return ErrorMessages.INVALID_MAGIC;
  if ((header.atRestFlags & AT_REST_FLAG_WIRE_FORMAT_V2) === 0) return ErrorMessages.UNSUPPORTED_WIRE_FORMAT;
  return undefined;
}

export const persistentHeader: WireType<PersistentHeader> = {
  inlineSize: PERSISTENT_HEADER_SIZE,
  inlineAlign: 8,
  encode(_encoder: Encoder, value: PersistentHeader, position: Position): void {
    position.writeUint8(0, 0);
    position.writeUint8(1, value.magic);
    position.writeUint16(2, value.atRestFlags);
    position.writeUint32(4, 0);
  },
  decode(decoder: Decoder, position: Position): PersistentHeader | undefined {
    if (position.readUint8(0) !== 0 || !position.isZero(4, 4)) {
      decoder.setError('VALIDATION', ErrorMessages.INVALID_PERSISTENT_HEADER);
      return undefined;
    }
    const header = { magic: position.readUint8(1), atRestFlags: position.readUint16(2) };
    const problem = validatePersistentHeader(header);
    if (problem) {
      decoder.setError('VALIDATION', problem);
      return undefined;
    }
    return header;
  },
};

export function persistentMessage<T>(body: WireType<T>): WireType<PersistentMessage<T>> {
  return {
    inlineSize: PERSISTENT_HEADER_SIZE + body.inlineSize,
    inlineAlign: 8,
    recursive: body.recursive,
    encode(encoder: Encoder, value: PersistentMessage<T>, position: Position, depth: AnyRecursionDepth): void {
      persistentHeader.encode(encoder, value.header, position.sub(0, PERSISTENT_HEADER_SIZE), depth);
      body.encode(encoder, value.body, position.sub(PERSISTENT_HEADER_SIZE, body.inlineSize), depth);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): PersistentMessage<T> | undefined {
      const header = persistentHeader.decode(decoder, position.sub(0, PERSISTENT_HEADER_SIZE), depth);
      if (!header) return undefined;
      const decoded = body.decode(decoder, position.sub(PERSISTENT_HEADER_SIZE, body.inlineSize), depth);
      if (decoded === undefined) return undefined;
      return { header, body: decoded };
    },
  };
}

/**
 * Encodes `value` behind a persistent header into one contiguous buffer.
 * Persistent messages carry no handles; a handle in `value` fails the encode.
 */
export function encodePersistent<T>(type: WireType<T>, value: T, options: PersistentEncodeOptions): PersistentEncodeResult {
  const iovecs: Iovec[] = [];
  const result = wireEncode({
    value: { header: createPersistentHeader(), body: value },
    type: persistentMessage(type),
    config: options.config,
    iovecs,
    iovecCapacity: 64,
    handleCapacity: 0,
    backing: options.backing ?? new Uint8Array(DEFAULT_BACKING_SIZE),
  });
  if (!result.ok) return result;
  return { ok: true, bytes: Buffer.concat(iovecs) };
}

function readStoredHeader(bytes: Uint8Array, config: CodingConfig): DecodeResult<PersistentHeader> {
  // Byte 7 is reserved in the current header and holds the magic number in
  // the older 16-byte layout, which shares the transaction header's fields.
  if (bytes[7] === 0) {
    return wireDecode({ type: persistentHeader, config, bytes: bytes.subarray(0, PERSISTENT_HEADER_SIZE) });
  }
  if (bytes[7] !== MAGIC_NUMBER_INITIAL) {
    return { ok: false, error: { code: 'VALIDATION', message: ErrorMessages.INVALID_PERSISTENT_HEADER } };
  }
  if (bytes.length < TRANSACTION_HEADER_SIZE) {
    return { ok: false, error: { code: 'OUT_OF_RANGE', message: ErrorMessages.MESSAGE_TOO_SHORT } };
  }
  const legacy = wireDecode({ type: transactionHeader, config, bytes: bytes.subarray(0, TRANSACTION_HEADER_SIZE) });
  if (!legacy.ok) return legacy;
  return { ok: true, value: { magic: legacy.value.magic, atRestFlags: legacy.value.atRestFlags } };
}

/** Decodes a message written by `encodePersistent`, or one stored with the older 16-byte header. */
export function decodePersistent<T>(type: WireType<T>, bytes: Uint8Array, config: CodingConfig): DecodeResult<T> {
  if (bytes.length < PERSISTENT_HEADER_SIZE) {
    return { ok: false, error: { code: 'OUT_OF_RANGE', message: ErrorMessages.MESSAGE_TOO_SHORT } };
  }
  const header = readStoredHeader(bytes, config);
  if (!header.ok) return header;
  const headerSize = bytes[7] === 0 ? PERSISTENT_HEADER_SIZE : TRANSACTION_HEADER_SIZE;
  return wireDecode({ type, config, bytes: bytes.subarray(headerSize) });
}
