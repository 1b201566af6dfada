// src/types/box.ts
import { ALLOC_ABSENT_U64, ALLOC_PRESENT_U64, ErrorMessages } from '../wire/index.ts';
import type { AnyRecursionDepth, Decoder, Encoder, Position, WireType } from '../wire/index.ts';

/** An optional struct stored out of line behind a u64 presence marker. */
export function box<T>(inner: WireType<T>): WireType<T | null> {
  return {
    inlineSize: 8,
    inlineAlign: 8,
    recursive: inner.recursive,
    encode(encoder: Encoder, value: T | null, position: Position, depth: AnyRecursionDepth): void {
      if (value === null) {
        position.writeUint64(0, ALLOC_ABSENT_U64);
        return;
      }
      position.writeUint64(0, ALLOC_PRESENT_U64);
      const next = depth.add(encoder);
      if (!next.isValid()) return;
      const body = encoder.alloc(inner.inlineSize);
      if (!body) return;
      inner.encode(encoder, value, body, next);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): T | null | undefined {
      const presence = position.readUint64(0);
      if (presence === ALLOC_ABSENT_U64) return null;
      if (presence !== ALLOC_PRESENT_U64) {
        decoder.setError('VALIDATION', ErrorMessages.INVALID_PRESENCE);
        return undefined;
      }
      const next = depth.add(decoder);
      if (!next.isValid()) return undefined;
      const body = decoder.alloc(inner.inlineSize);
      if (!body) return undefined;
      return inner.decode(decoder, body, next);
    },
  };
}
