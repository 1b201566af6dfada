// src/types/shared.ts
import { ALLOC_ABSENT_U64, ALLOC_PRESENT_U64, ErrorMessages } from '../wire/index.ts';
import type { Decoder, Encoder, Position, WireType } from '../wire/index.ts';

export const VECTOR_HEADER_SIZE = 16;

export interface VectorHeader {
  count: number;
  present: boolean;
}

/** count u64 + presence u64, shared by vectors, strings and tables. */
export function encodeVectorHeader(position: Position, count: number | null): void {
  position.writeUint64(0, BigInt(count ?? 0));
  position.writeUint64(8, count === null ? ALLOC_ABSENT_U64 : ALLOC_PRESENT_U64);
}

export function decodeVectorHeader(decoder: Decoder, position: Position): VectorHeader | undefined {
  const count = position.readUint64(0);
  const presence = position.readUint64(8);
  if (presence === ALLOC_ABSENT_U64) {
    if (count !== 0n) {
      decoder.setError('VALIDATION', ErrorMessages.INVALID_PRESENCE);
      return undefined;
    }
    return { count: 0, present: false };
  }
  if (presence !== ALLOC_PRESENT_U64) {
    decoder.setError('VALIDATION', ErrorMessages.INVALID_PRESENCE);
    return undefined;
  }
  // Anything this large cannot fit in the message anyway.
  if (count > BigInt(decoder.numBytes)) {
    decoder.setError('OUT_OF_RANGE', ErrorMessages.MESSAGE_TOO_SHORT);
    return undefined;
  }
  return { count: Number(count), present: true };
}

/** Narrows a nullable wire type to one that rejects absent values on decode. */
export function required<T>(inner: WireType<T | null>): WireType<T> {
  return {
    get inlineSize() {
      return inner.inlineSize;
    },
    get inlineAlign() {
      return inner.inlineAlign;
    },
    get recursive() {
      return inner.recursive;
    },
    encode(encoder: Encoder, value: T, position, depth): void {
      inner.encode(encoder, value, position, depth);
    },
    decode(decoder: Decoder, position, depth): T | undefined {
      const value = inner.decode(decoder, position, depth);
      if (value === null) {
        decoder.setError('VALIDATION', ErrorMessages.NULL_NON_NULLABLE);
        return undefined;
      }
      return value;
    },
  };
}
