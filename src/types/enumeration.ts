// src/types/enumeration.ts
import { ErrorMessages } from '../wire/index.ts';
import type { AnyRecursionDepth, Decoder, Encoder, Position, WireType } from '../wire/index.ts';
import { uint32 } from './primitives.ts';

export type EnumValues = Record<string, number>;

export interface EnumOptions {
  /** Integer type the members are stored as. Defaults to uint32. */
  underlying?: WireType<number>;
}

function isMember<V extends EnumValues>(known: ReadonlySet<number>, value: number): value is V[keyof V] {
  return known.has(value);
}

function enumImpl<V extends EnumValues>(values: V, strict: boolean, underlying: WireType<number>): WireType<number> {
  const known = new Set(Object.values(values));
  return {
    inlineSize: underlying.inlineSize,
    inlineAlign: underlying.inlineAlign,
    encode(encoder: Encoder, value: number, position: Position, depth: AnyRecursionDepth): void {
      if (strict && !known.has(value)) {
        encoder.setError('VALIDATION', `${ErrorMessages.UNKNOWN_ENUM_VALUE}: ${value}`);
        return;
      }
      underlying.encode(encoder, value, position, depth);
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): number | undefined {
      const value = underlying.decode(decoder, position, depth);
      if (value === undefined) return undefined;
      if (strict && !known.has(value)) {
        decoder.setError('VALIDATION', `${ErrorMessages.UNKNOWN_ENUM_VALUE}: ${value}`);
        return undefined;
      }
      return value;
    },
  };
}

/**
 * Strict enums reject values outside `values` in both directions; flexible
 * ones carry any value of the underlying type.
 */
export function enumeration<V extends EnumValues>(
  values: V,
  options?: EnumOptions & { strict?: true },
): WireType<V[keyof V]>;
export function enumeration<V extends EnumValues>(
  values: V,
  options: EnumOptions & { strict: false },
): WireType<number>;
export function enumeration<V extends EnumValues>(
  values: V,
  options: EnumOptions & { strict?: boolean } = {},
): WireType<V[keyof V]> | WireType<number> {
  const underlying = options.underlying ?? uint32;
  if (options.strict === false) return enumImpl(values, false, underlying);

  const inner = enumImpl(values, true, underlying);
  const known = new Set(Object.values(values));
  return {
    inlineSize: inner.inlineSize,
    inlineAlign: inner.inlineAlign,
    encode: (encoder: Encoder, value: V[keyof V], position: Position, depth: AnyRecursionDepth) => inner.encode(encoder, value, position, depth),
    decode(decoder, position, depth): V[keyof V] | undefined {
      const value = inner.decode(decoder, position, depth);
      if (value === undefined || !isMember<V>(known, value)) return undefined;
      return value;
    },
  };
}
