// src/types/string.ts
import { Buffer, isUtf8 } from 'node:buffer';
import { ErrorMessages } from '../wire/index.ts';
import type { AnyRecursionDepth, Decoder, Encoder, Position, WireType } from '../wire/index.ts';
import { VECTOR_HEADER_SIZE, decodeVectorHeader, encodeVectorHeader, required } from './shared.ts';

/** Payloads at least this long are gathered from the caller's memory instead of copied. */
export const GATHER_THRESHOLD = 64;

export interface StringOptions {
  maxBytes?: number;
}

export interface BytesOptions {
  maxCount?: number;
}

// Writes the body of a byte vector whose header is already in place.
function encodeByteBody(encoder: Encoder, bytes: Uint8Array, depth: AnyRecursionDepth): void {
  const inner = depth.add(encoder);
  if (!inner.isValid()) return;
  if (bytes.length >= GATHER_THRESHOLD && encoder.gatherExternal(bytes)) return;
  const body = encoder.alloc(bytes.length);
  if (!body) return;
  body.writeBytes(0, bytes);
}

function decodeByteBody(decoder: Decoder, count: number, depth: AnyRecursionDepth): Uint8Array | undefined {
  const inner = depth.add(decoder);
  if (!inner.isValid()) return undefined;
  const body = decoder.alloc(count);
  if (!body) return undefined;
  return body.readBytes(0, count);
}

function optionalBytes(maxCount: number): WireType<Uint8Array | null> {
  return {
    inlineSize: VECTOR_HEADER_SIZE,
    inlineAlign: 8,
    encode(encoder: Encoder, value: Uint8Array | null, position: Position, depth: AnyRecursionDepth): void {
      if (value === null) {
        encodeVectorHeader(position, null);
        return;
      }
      if (value.length > maxCount) {
        encoder.setError('VALIDATION', ErrorMessages.VECTOR_TOO_LONG);
        return;
      }
      encodeVectorHeader(position, value.length);
      encodeByteBody(encoder, value, depth);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): Uint8Array | null | undefined {
      const header = decodeVectorHeader(decoder, position);
      if (!header) return undefined;
      if (!header.present) return null;
      if (header.count > maxCount) {
        decoder.setError('VALIDATION', ErrorMessages.VECTOR_TOO_LONG);
        return undefined;
      }
      return decodeByteBody(decoder, header.count, depth);
    },
  };
}

function optionalString(maxBytes: number): WireType<string | null> {
  return {
    inlineSize: VECTOR_HEADER_SIZE,
    inlineAlign: 8,
    encode(encoder: Encoder, value: string | null, position: Position, depth: AnyRecursionDepth): void {
      if (value === null) {
        encodeVectorHeader(position, null);
        return;
      }
      const bytes = Buffer.from(value, 'utf8');
      if (bytes.length > maxBytes) {
        encoder.setError('VALIDATION', ErrorMessages.STRING_TOO_LONG);
        return;
      }
      encodeVectorHeader(position, bytes.length);
      encodeByteBody(encoder, bytes, depth);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): string | null | undefined {
      const header = decodeVectorHeader(decoder, position);
      if (!header) return undefined;
      if (!header.present) return null;
      if (header.count > maxBytes) {
        decoder.setError('VALIDATION', ErrorMessages.STRING_TOO_LONG);
        return undefined;
      }
      const bytes = decodeByteBody(decoder, header.count, depth);
      if (!bytes) return undefined;
      if (!isUtf8(bytes)) {
        decoder.setError('VALIDATION', ErrorMessages.INVALID_UTF8);
        return undefined;
      }
      return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
    },
  };
}

export function string(options?: StringOptions & { nullable?: false }): WireType<string>;
export function string(options: StringOptions & { nullable: true }): WireType<string | null>;
export function string(
  options: StringOptions & { nullable?: boolean } = {},
): WireType<string> | WireType<string | null> {
  const inner = optionalString(options.maxBytes ?? Number.MAX_SAFE_INTEGER);
  return options.nullable ? inner : required(inner);
}

/** A byte vector; large payloads are sent without copying. */
export function bytes(options?: BytesOptions & { nullable?: false }): WireType<Uint8Array>;
export function bytes(options: BytesOptions & { nullable: true }): WireType<Uint8Array | null>;
export function bytes(
  options: BytesOptions & { nullable?: boolean } = {},
): WireType<Uint8Array> | WireType<Uint8Array | null> {
  const inner = optionalBytes(options.maxCount ?? Number.MAX_SAFE_INTEGER);
  return options.nullable ? inner : required(inner);
}
