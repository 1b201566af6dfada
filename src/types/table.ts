// src/types/table.ts
import {
  ErrorMessages,
  anyRecursive,
  ENVELOPE_SIZE,
  decodeEnvelope,
  decodeUnknownEnvelope,
  encodeEnvelope,
  encodeUnknownEnvelope,
  skipUnknownEnvelope,
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
import { VECTOR_HEADER_SIZE, decodeVectorHeader, encodeVectorHeader } from './shared.ts';

export const UNKNOWN_KEY = '$unknown';

export interface Member {
  ordinal: number;
  type: WireType<unknown>;
}

export type Members = Record<string, Member>;

export interface UnknownField {
  ordinal: number;
  data: UnknownData;
}

export type TableValue<M extends Members> =
  & { [K in keyof M]?: Infer<M[K]['type']> }
  & { $unknown?: UnknownField[] };

export interface TableOptions {
  /** What to do with envelopes whose ordinal has no member. Defaults to `skip`. */
  unknown?: 'skip' | 'preserve';
  /** Resource tables may keep the handles of preserved unknown fields. */
  resource?: boolean;
}

interface Slot<N extends string> {
  name: N;
  ordinal: number;
  type: WireType<unknown>;
}

function isMemberName<M extends Members>(members: M, name: string): name is keyof M & string {
  return Object.hasOwn(members, name);
}

/** Validates the member list and returns it sorted by ordinal. */
export function memberSlots<M extends Members>(members: M): Slot<keyof M & string>[] {
  const slots: Slot<keyof M & string>[] = [];
  const seen = new Set<number>();
  for (const name of Object.keys(members)) {
    if (!isMemberName(members, name)) continue;
    if (name === UNKNOWN_KEY) throw new Error(`Member name ${UNKNOWN_KEY} is reserved`);
    const { ordinal, type } = members[name];
    if (!Number.isInteger(ordinal) || ordinal < 1) {
      throw new Error(`Member ${name}: ordinal must be a positive integer, got ${ordinal}`);
    }
    if (seen.has(ordinal)) throw new Error(`Member ${name}: duplicate ordinal ${ordinal}`);
    seen.add(ordinal);
    slots.push({ name, ordinal, type });
  }
  return slots.sort((a, b) => a.ordinal - b.ordinal);
}

function isTableValue<M extends Members>(members: M, value: unknown): value is TableValue<M> {
  if (typeof value !== 'object' || value === null) return false;
  return Object.keys(value).every((key) => key === UNKNOWN_KEY || Object.hasOwn(members, key));
}

type Pending =
  | { ordinal: number; kind: 'known'; type: WireType<unknown>; value: unknown }
  | { ordinal: number; kind: 'unknown'; data: UnknownData };

/**
 * A table is a vector of envelopes indexed by ordinal - 1. Only members that
 * are set take up out-of-line space; the vector is as long as the highest
 * ordinal present.
 */
export function table<M extends Members>(members: M, options: TableOptions = {}): WireType<TableValue<M>> {
  const slots = memberSlots(members);
  const byOrdinal = new Map(slots.map((slot) => [slot.ordinal, slot]));
  const preserve = options.unknown === 'preserve';
  const resource = options.resource ?? false;

  return {
    inlineSize: VECTOR_HEADER_SIZE,
    inlineAlign: 8,
    recursive: anyRecursive(slots.map((slot) => slot.type)),

    encode(encoder: Encoder, value: TableValue<M>, position: Position, depth: AnyRecursionDepth): void {
      const pending: Pending[] = [];
      for (const slot of slots) {
        const fieldValue: unknown = value[slot.name];
        if (fieldValue === undefined || fieldValue === null) continue;
        pending.push({ ordinal: slot.ordinal, kind: 'known', type: slot.type, value: fieldValue });
      }
      for (const field of value.$unknown ?? []) {
        const clash = byOrdinal.has(field.ordinal) || pending.some((p) => p.ordinal === field.ordinal);
        if (!Number.isInteger(field.ordinal) || field.ordinal < 1 || clash) {
          encoder.setError('VALIDATION', `${ErrorMessages.INVALID_TABLE_ORDINAL}: ${field.ordinal}`);
          return;
        }
        pending.push({ ordinal: field.ordinal, kind: 'unknown', data: field.data });
      }
      pending.sort((a, b) => a.ordinal - b.ordinal);

      const count = pending.reduce((max, entry) => Math.max(max, entry.ordinal), 0);
      encodeVectorHeader(position, count);
      const inner = depth.add(encoder);
      if (!inner.isValid()) return;
      const envelopes = encoder.alloc(count * ENVELOPE_SIZE);
      if (!envelopes) return;

      for (const entry of pending) {
        if (encoder.hasError()) return;
        const at = envelopes.sub((entry.ordinal - 1) * ENVELOPE_SIZE, ENVELOPE_SIZE);
        if (entry.kind === 'known') {
          encodeEnvelope(encoder, entry.type, entry.value, at, inner);
        } else {
          encodeUnknownEnvelope(encoder, entry.data, at, inner);
        }
      }
    },

    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): TableValue<M> | undefined {
      const header = decodeVectorHeader(decoder, position);
      if (!header) return undefined;
      if (!header.present) {
        decoder.setError('VALIDATION', ErrorMessages.NULL_NON_NULLABLE);
        return undefined;
      }
      const inner = depth.add(decoder);
      if (!inner.isValid()) return undefined;
      const envelopes = decoder.alloc(header.count * ENVELOPE_SIZE);
      if (!envelopes) return undefined;

      const out: Record<string, unknown> = {};
      const unknown: UnknownField[] = [];
      for (let ordinal = 1; ordinal <= header.count; ordinal++) {
        const at = envelopes.sub((ordinal - 1) * ENVELOPE_SIZE, ENVELOPE_SIZE);
        const slot = byOrdinal.get(ordinal);
        if (slot) {
          const fieldValue = decodeEnvelope(decoder, slot.type, at, inner);
          if (fieldValue === undefined) return undefined;
          if (fieldValue !== null) out[slot.name] = fieldValue;
        } else if (!preserve) {
          if (!skipUnknownEnvelope(decoder, at, inner)) return undefined;
        } else {
          const data = decodeUnknownEnvelope(decoder, at, inner);
          if (data === undefined) return undefined;
          if (data === null) continue;
          if (!resource && data.handles.length > 0) {
            decoder.setError('VALIDATION', ErrorMessages.CANNOT_STORE_UNKNOWN_HANDLES);
            return undefined;
          }
          unknown.push({ ordinal, data });
        }
      }
      if (unknown.length > 0) out[UNKNOWN_KEY] = unknown;
      return isTableValue(members, out) ? out : undefined;
    },
  };
}
