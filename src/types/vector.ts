// src/types/vector.ts
import { ErrorMessages } from '../wire/index.ts';
import type { AnyRecursionDepth, Decoder, Encoder, Position, WireType } from '../wire/index.ts';
import { VECTOR_HEADER_SIZE, decodeVectorHeader, encodeVectorHeader, required } from './shared.ts';

export interface VectorOptions {
  maxCount?: number;
}

/** Fixed-length sequence laid out inline, element after element. */
export function array<T>(element: WireType<T>, length: number): WireType<T[]> {
  return {
    inlineSize: element.inlineSize * length,
    inlineAlign: element.inlineAlign,
    recursive: element.recursive,
    encode(encoder: Encoder, value: T[], position: Position, depth: AnyRecursionDepth): void {
      if (value.length !== length) {
        encoder.setError('VALIDATION', ErrorMessages.ARRAY_LENGTH_MISMATCH);
        return;
      }
      value.forEach((item, i) => {
        if (encoder.hasError()) return;
        element.encode(encoder, item, position.sub(i * element.inlineSize, element.inlineSize), depth);
      });
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): T[] | undefined {
      const out: T[] = [];
      for (let i = 0; i < length; i++) {
        const item = element.decode(decoder, position.sub(i * element.inlineSize, element.inlineSize), depth);
        if (item === undefined) return undefined;
        out.push(item);
      }
      return out;
    },
  };
}

function optionalVector<T>(element: WireType<T>, maxCount: number): WireType<T[] | null> {
  return {
    inlineSize: VECTOR_HEADER_SIZE,
    inlineAlign: 8,
    recursive: element.recursive,
    encode(encoder: Encoder, value: T[] | null, position: Position, depth: AnyRecursionDepth): void {
      if (value === null) {
        encodeVectorHeader(position, null);
        return;
      }
      if (value.length > maxCount) {
        encoder.setError('VALIDATION', ErrorMessages.VECTOR_TOO_LONG);
        return;
      }
      encodeVectorHeader(position, value.length);
      const inner = depth.add(encoder);
      if (!inner.isValid()) return;
      const body = encoder.alloc(value.length * element.inlineSize);
      if (!body) return;
      value.forEach((item, i) => {
        if (encoder.hasError()) return;
        element.encode(encoder, item, body.sub(i * element.inlineSize, element.inlineSize), inner);
      });
    },
    decode(decoder: Decoder, position: Position, depth: AnyRecursionDepth): T[] | null | undefined {
      const header = decodeVectorHeader(decoder, position);
      if (!header) return undefined;
      if (!header.present) return null;
      if (header.count > maxCount) {
        decoder.setError('VALIDATION', ErrorMessages.VECTOR_TOO_LONG);
        return undefined;
      }
      const inner = depth.add(decoder);
      if (!inner.isValid()) return undefined;
      const body = decoder.alloc(header.count * element.inlineSize);
      if (!body) return undefined;
      const out: T[] = [];
      for (let i = 0; i < header.count; i++) {
        const item = element.decode(decoder, body.sub(i * element.inlineSize, element.inlineSize), inner);
        if (item === undefined) return undefined;
        out.push(item);
      }
      return out;
    },
  };
}

export function vector<T>(element: WireType<T>, options?: VectorOptions & { nullable?: false }): WireType<T[]>;
export function vector<T>(element: WireType<T>, options: VectorOptions & { nullable: true }): WireType<T[] | null>;
export function vector<T>(
  element: WireType<T>,
  options: VectorOptions & { nullable?: boolean } = {},
): WireType<T[]> | WireType<T[] | null> {
  const inner = optionalVector(element, options.maxCount ?? Number.MAX_SAFE_INTEGER);
  return options.nullable ? inner : required(inner);
}
