// src/types/lazy.ts
import type { AnyRecursionDepth, Decoder, Encoder, Position, WireType } from '../wire/index.ts';

/**
 * Defers to a type that is not defined yet, for self-referential shapes.
 * Anything built around a lazy type counts as recursive.
 */
export function lazy<T>(resolve: () => WireType<T>): WireType<T> {
  let cached: WireType<T> | undefined;
  const target = (): WireType<T> => (cached ??= resolve());
  return {
    recursive: true,
    get inlineSize() {
      return target().inlineSize;
    },
    get inlineAlign() {
      return target().inlineAlign;
    },
    encode(encoder: Encoder, value: T, position: Position, depth: AnyRecursionDepth): void {
      target().encode(encoder, value, position, depth);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): T | undefined {
      return target().decode(decoder, position, depth);
    },
  };
}
