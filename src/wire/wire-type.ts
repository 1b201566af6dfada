// src/wire/wire-type.ts
import type { Decoder } from './decoder.ts';
import type { Encoder } from './encoder.ts';
import type { Position } from './position.ts';
import type { AnyRecursionDepth } from './recursion.ts';

/**
 * The per-type transcode contract. `encode` writes `value` into the inline
 * slot at `position` and allocates any out-of-line parts through the encoder;
 * `decode` reads the inline slot back. A decode returns `undefined` only after
 * recording an error on the decoder; absent optional values are `null`.
 */
export interface WireType<T> {
  readonly inlineSize: number;
  readonly inlineAlign: number;
  /**
   * Set when the type can contain itself. Recursive types are always
   * transcoded with depth accounting.
   */
  readonly recursive?: boolean;
  encode(encoder: Encoder, value: T, position: Position, depth: AnyRecursionDepth): void;
  decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): T | undefined;
}

export function anyRecursive(types: Iterable<WireType<unknown>>): boolean {
  for (const type of types) {
    if (type.recursive) return true;
  }
  return false;
}

export type Infer<W> = W extends WireType<infer T> ? T : never;
