// src/types/struct.ts
import { ErrorMessages, anyRecursive, roundUpToAlign } from '../wire/index.ts';
import type { AnyRecursionDepth, Decoder, Encoder, Infer, Position, WireType } from '../wire/index.ts';

export type StructFields = Record<string, WireType<unknown>>;

export type StructValue<F extends StructFields> = { [K in keyof F]: Infer<F[K]> };

interface FieldSlot<N extends string> {
  name: N;
  type: WireType<unknown>;
  offset: number;
  // Padding between the end of this field and the next one (or the end).
  paddingAfter: number;
}

export interface StructType<F extends StructFields> extends WireType<StructValue<F>> {
  readonly fields: F;
  offsetOf(name: keyof F & string): number;
}

function isFieldName<F extends StructFields>(fields: F, name: string): name is keyof F & string {
  return Object.hasOwn(fields, name);
}

function layout<F extends StructFields>(
  fields: F,
): { slots: FieldSlot<keyof F & string>[]; size: number; align: number } {
  const slots: FieldSlot<keyof F & string>[] = [];
  let cursor = 0;
  let align = 1;
  for (const name of Object.keys(fields)) {
    if (!isFieldName(fields, name)) continue;
    const type = fields[name];
    const offset = roundUpToAlign(cursor, type.inlineAlign);
    const previous = slots[slots.length - 1];
    if (previous) previous.paddingAfter = offset - cursor;
    slots.push({ name, type, offset, paddingAfter: 0 });
    cursor = offset + type.inlineSize;
    align = Math.max(align, type.inlineAlign);
  }
  if (slots.length === 0) return { slots, size: 1, align: 1 };
  const size = roundUpToAlign(cursor, align);
  const last = slots[slots.length - 1];
  if (last) last.paddingAfter = size - cursor;
  return { slots, size, align };
}

function isStructValue<F extends StructFields>(fields: F, value: unknown): value is StructValue<F> {
  if (typeof value !== 'object' || value === null) return false;
  return Object.keys(fields).every((name) => name in value);
}

/**
 * C-like layout: each field at its natural alignment, the whole rounded up to
 * the largest alignment. Padding is written as zero and must read back as
 * zero. A struct with no fields occupies one zero byte.
 */
export function struct<F extends StructFields>(fields: F): StructType<F> {
  const { slots, size, align } = layout(fields);
  const offsets = new Map(slots.map((slot) => [slot.name, slot.offset]));

  return {
    fields,
    inlineSize: size,
    inlineAlign: align,
    recursive: anyRecursive(Object.values(fields)),

    offsetOf(name) {
      const offset = offsets.get(name);
      if (offset === undefined) throw new Error(`Unknown struct field: ${name}`);
      return offset;
    },

    encode(encoder: Encoder, value: StructValue<F>, position: Position, depth: AnyRecursionDepth): void {
      if (slots.length === 0) {
        position.writeUint8(0, 0);
        return;
      }
      for (const slot of slots) {
        if (encoder.hasError()) return;
        const fieldValue: unknown = value[slot.name];
        slot.type.encode(encoder, fieldValue, position.sub(slot.offset, slot.type.inlineSize), depth);
        position.fill(slot.offset + slot.type.inlineSize, slot.paddingAfter);
      }
    },

    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): StructValue<F> | undefined {
      if (slots.length === 0) {
        if (position.readUint8(0) !== 0) {
          decoder.setError('VALIDATION', ErrorMessages.NON_ZERO_PADDING);
          return undefined;
        }
        const empty: Record<string, unknown> = {};
        return isStructValue(fields, empty) ? empty : undefined;
      }
      const out: Record<string, unknown> = {};
      for (const slot of slots) {
        if (!position.isZero(slot.offset + slot.type.inlineSize, slot.paddingAfter)) {
          decoder.setError('VALIDATION', ErrorMessages.NON_ZERO_PADDING);
          return undefined;
        }
        const fieldValue = slot.type.decode(decoder, position.sub(slot.offset, slot.type.inlineSize), depth);
        if (fieldValue === undefined) return undefined;
        out[slot.name] = fieldValue;
      }
      return isStructValue(fields, out) ? out : undefined;
    },
  };
}
