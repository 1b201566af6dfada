// src/types/bits.ts
import { ErrorMessages } from '../wire/index.ts';
import type { AnyRecursionDepth, Decoder, Encoder, Position, WireType } from '../wire/index.ts';
import { uint32 } from './primitives.ts';

export type BitsValues = Record<string, number>;

export interface BitsOptions {
  /** Strict bits reject members outside `values`; flexible ones keep them. Defaults to true. */
  strict?: boolean;
  /** Unsigned integer type of at most 32 bits. Defaults to uint32. */
  underlying?: WireType<number>;
}

/** Union of every member of `values`. */
export function allBits(values: BitsValues): number {
  return Object.values(values).reduce((mask, bit) => (mask | bit) >>> 0, 0);
}

export function bits(values: BitsValues, options: BitsOptions = {}): WireType<number> {
  const strict = options.strict ?? true;
  const underlying = options.underlying ?? uint32;
  const known = allBits(values);
  const unknownOf = (value: number): number => (value & ~known) >>> 0;

  return {
    inlineSize: underlying.inlineSize,
    inlineAlign: underlying.inlineAlign,
    encode(encoder: Encoder, value: number, position: Position, depth: AnyRecursionDepth): void {
      if (strict && unknownOf(value) !== 0) {
        encoder.setError('VALIDATION', `${ErrorMessages.INVALID_BITS}: 0x${unknownOf(value).toString(16)}`);
        return;
      }
      underlying.encode(encoder, value, position, depth);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): number | undefined {
      const value = underlying.decode(decoder, position, depth);
      if (value === undefined) return undefined;
      if (strict && unknownOf(value) !== 0) {
        decoder.setError('VALIDATION', `${ErrorMessages.INVALID_BITS}: 0x${unknownOf(value).toString(16)}`);
        return undefined;
      }
      return value;
    },
  };
}
