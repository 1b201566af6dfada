// src/types/union.ts
import {
  ErrorMessages,
  anyRecursive,
  decodeEnvelope,
  decodeUnknownEnvelope,
  encodeEnvelope,
  encodeUnknownEnvelope,
} from '../wire/index.ts';
import type {
  AnyRecursionDepth,
  Decoder,
  Encoder,
  Infer,
  Position,
  UnknownData,
  WireType,
} from '../wire/index.ts';
import { required } from './shared.ts';
import { UNKNOWN_KEY, memberSlots } from './table.ts';
import type { Members } from './table.ts';

export type UnionVariant<M extends Members> = {
  [K in keyof M & string]: { tag: K; value: Infer<M[K]['type']> };
}[keyof M & string];

export interface UnknownVariant {
  tag: typeof UNKNOWN_KEY;
  ordinal: bigint;
  data: UnknownData;
}

export type UnionValue<M extends Members> = UnionVariant<M> | UnknownVariant;

export interface UnionOptions {
  /** Flexible unions accept ordinals they do not know and keep their payload. */
  flexible?: boolean;
  resource?: boolean;
}

const UNION_SIZE = 16;

function isUnknownVariant<M extends Members>(value: UnionValue<M>): value is UnknownVariant {
  return value.tag === UNKNOWN_KEY;
}

function isUnionVariant<M extends Members>(members: M, value: { tag: string; value: unknown }): value is UnionVariant<M> {
  return value.tag !== UNKNOWN_KEY && Object.hasOwn(members, value.tag);
}

function optionalUnion<M extends Members>(members: M, options: UnionOptions): WireType<UnionValue<M> | null> {
  const slots = memberSlots(members);
  const byOrdinal = new Map(slots.map((slot) => [BigInt(slot.ordinal), slot]));
  const byName = new Map(slots.map((slot) => [slot.name, slot]));
  const flexible = options.flexible ?? false;
  const resource = options.resource ?? false;

  return {
    inlineSize: UNION_SIZE,
    inlineAlign: 8,
    recursive: anyRecursive(slots.map((slot) => slot.type)),

    encode(encoder: Encoder, value: UnionValue<M> | null, position: Position, depth: AnyRecursionDepth): void {
      const envelope = position.sub(8, 8);
      if (value === null) {
        position.fill(0, UNION_SIZE);
        return;
      }
      if (isUnknownVariant(value)) {
        if (!flexible || byOrdinal.has(value.ordinal) || value.ordinal === 0n) {
          encoder.setError('VALIDATION', `${ErrorMessages.UNKNOWN_UNION_TAG}: ${value.ordinal}`);
          return;
        }
        position.writeUint64(0, value.ordinal);
        encodeUnknownEnvelope(encoder, value.data, envelope, depth);
        return;
      }
      const slot = byName.get(value.tag);
      if (!slot) {
        encoder.setError('VALIDATION', `${ErrorMessages.UNKNOWN_UNION_TAG}: ${value.tag}`);
        return;
      }
      position.writeUint64(0, BigInt(slot.ordinal));
      const payload: unknown = value.value;
      encodeEnvelope(encoder, slot.type, payload, envelope, depth);
    },

    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): UnionValue<M> | null | undefined {
      const ordinal = position.readUint64(0);
      const envelope = position.sub(8, 8);
      if (ordinal === 0n) {
        if (!envelope.isZero(0, 8)) {
          decoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_PRESENCE);
          return undefined;
        }
        return null;
      }

      const slot = byOrdinal.get(ordinal);
      if (slot) {
        const payload = decodeEnvelope(decoder, slot.type, envelope, depth);
        if (payload === undefined) return undefined;
        if (payload === null) {
          decoder.setError('VALIDATION', ErrorMessages.NULL_NON_NULLABLE);
          return undefined;
        }
        const variant = { tag: slot.name, value: payload };
        return isUnionVariant(members, variant) ? variant : undefined;
      }

      if (!flexible) {
        decoder.setError('VALIDATION', `${ErrorMessages.UNKNOWN_UNION_TAG}: ${ordinal}`);
        return undefined;
      }
      const data = decodeUnknownEnvelope(decoder, envelope, depth);
      if (data === undefined) return undefined;
      if (data === null) {
        decoder.setError('VALIDATION', ErrorMessages.NULL_NON_NULLABLE);
        return undefined;
      }
      if (!resource && data.handles.length > 0) {
        decoder.setError('VALIDATION', ErrorMessages.CANNOT_STORE_UNKNOWN_HANDLES);
        return undefined;
      }
      return { tag: UNKNOWN_KEY, ordinal, data };
    },
  };
}

/** Ordinal (u64) followed by one envelope holding the selected variant. */
export function union<M extends Members>(
  members: M,
  options?: UnionOptions & { nullable?: false },
): WireType<UnionValue<M>>;
export function union<M extends Members>(
  members: M,
  options: UnionOptions & { nullable: true },
): WireType<UnionValue<M> | null>;
export function union<M extends Members>(
  members: M,
  options: UnionOptions & { nullable?: boolean } = {},
): WireType<UnionValue<M>> | WireType<UnionValue<M> | null> {
  const inner = optionalUnion(members, options);
  return options.nullable ? inner : required(inner);
}
