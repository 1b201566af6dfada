// src/wire/envelope.ts
import type { Decoder } from './decoder.ts';
import type { Encoder } from './encoder.ts';
import { ErrorMessages } from './errors.ts';
import type { OwnedHandle } from './handle.ts';
import type { Position } from './position.ts';
import type { AnyRecursionDepth } from './recursion.ts';
import { ENVELOPE_INLINE_CAPACITY, UNCONSTRAINED_HANDLE, WIRE_ALIGNMENT } from './types.ts';
import type { WireType } from './wire-type.ts';

const MAX_ENVELOPE_HANDLES = 0xffff;

export interface EnvelopeHeader {
  numBytes: number;
  numHandles: number;
  flags: number;
  inlined: boolean;
  present: boolean;
}

/** Bytes and handles of a field this side of the wire has no schema for. */
export interface UnknownData {
  bytes: Uint8Array;
  handles: OwnedHandle[];
  inlined: boolean;
}

/**
 * Reads and validates the 8-byte envelope at `position`. `flags` must be 0 or
 * exactly the inlining mask; an out-of-line byte count must be aligned.
 */
export function decodeEnvelopeHeader(decoder: Decoder, position: Position): EnvelopeHeader | undefined {
  if (decoder.hasError()) return undefined;
  const numBytes = position.readUint32(0);
  const numHandles = position.readUint16(4);
  const flags = position.readUint16(6);

  if (flags !== 0 && flags !== decoder.inliningMask) {
    decoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_INLINE_BIT);
    return undefined;
  }
  const inlined = flags !== 0;
  if (!inlined && numBytes % WIRE_ALIGNMENT !== 0) {
    decoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_NUM_BYTES);
    return undefined;
  }
  return {
    numBytes,
    numHandles,
    flags,
    inlined,
    present: inlined || numBytes !== 0 || numHandles !== 0,
  };
}

/**
 * Steps over an envelope whose contents are not understood: the out-of-line
 * payload is claimed without being read and its handles are closed.
 */
export function skipUnknownEnvelope(decoder: Decoder, position: Position, depth: AnyRecursionDepth): boolean {
  const header = decodeEnvelopeHeader(decoder, position);
  if (!header) return false;
  if (!header.present) return true;

  if (!header.inlined) {
    const inner = depth.add(decoder);
    if (!inner.isValid()) return false;
    if (!decoder.alloc(header.numBytes)) return false;
  }
  return decoder.closeNextNHandles(header.numHandles);
}

/** Like `skipUnknownEnvelope`, but keeps the payload so it can be re-encoded. */
export function decodeUnknownEnvelope(
  decoder: Decoder,
  position: Position,
  depth: AnyRecursionDepth,
): UnknownData | null | undefined {
  const header = decodeEnvelopeHeader(decoder, position);
  if (!header) return undefined;
  if (!header.present) return null;

  let bytes: Uint8Array;
  if (header.inlined) {
    bytes = position.readBytes(0, ENVELOPE_INLINE_CAPACITY);
  } else {
    const inner = depth.add(decoder);
    if (!inner.isValid()) return undefined;
    const payload = decoder.alloc(header.numBytes);
    if (!payload) return undefined;
    bytes = payload.readBytes(0, header.numBytes);
  }

  const handles: OwnedHandle[] = [];
  for (let i = 0; i < header.numHandles; i++) {
    const handle = decoder.takeHandle(UNCONSTRAINED_HANDLE);
    if (!handle) return undefined;
    handles.push(handle);
  }
  return { bytes, handles, inlined: header.inlined };
}

export function encodeUnknownEnvelope(
  encoder: Encoder,
  data: UnknownData,
  position: Position,
  depth: AnyRecursionDepth,
): void {
  if (encoder.hasError()) return;
  if (data.handles.length > MAX_ENVELOPE_HANDLES) {
    encoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_NUM_HANDLES);
    return;
  }

  if (data.inlined) {
    if (data.bytes.length !== ENVELOPE_INLINE_CAPACITY) {
      encoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_NUM_BYTES);
      return;
    }
    position.writeBytes(0, data.bytes);
    position.writeUint16(4, data.handles.length);
    position.writeUint16(6, encoder.inliningMask);
  } else {
    if (data.bytes.length % WIRE_ALIGNMENT !== 0) {
      encoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_NUM_BYTES);
      return;
    }
    const inner = depth.add(encoder);
    if (!inner.isValid()) return;
    const payload = encoder.alloc(data.bytes.length);
    if (!payload) return;
    payload.writeBytes(0, data.bytes);
    position.writeUint32(0, data.bytes.length);
    position.writeUint16(4, data.handles.length);
    position.writeUint16(6, 0);
  }

  for (const handle of data.handles) {
    if (!encoder.encodeHandle(handle, UNCONSTRAINED_HANDLE)) return;
  }
}

/**
 * Encodes `value` behind the envelope at `position`. Payloads of four bytes or
 * less live in the envelope itself; larger ones go out of line and the header
 * is back-filled with what the nested encode produced.
 */
export function encodeEnvelope<T>(
  encoder: Encoder,
  type: WireType<T>,
  value: T | null,
  position: Position,
  depth: AnyRecursionDepth,
): void {
  if (encoder.hasError()) return;
  if (value === null) {
    position.fill(0, 8);
    return;
  }

  const handlesBefore = encoder.currentHandleCount;
  if (type.inlineSize <= ENVELOPE_INLINE_CAPACITY) {
    position.fill(0, ENVELOPE_INLINE_CAPACITY);
    type.encode(encoder, value, position.sub(0, type.inlineSize), depth);
    if (!writeHandleCount(encoder, position, handlesBefore)) return;
    position.writeUint16(6, encoder.inliningMask);
    return;
  }

  const inner = depth.add(encoder);
  if (!inner.isValid()) return;
  const bytesBefore = encoder.currentLength;
  const payload = encoder.alloc(type.inlineSize);
  if (!payload) return;
  type.encode(encoder, value, payload, inner);
  if (encoder.hasError()) return;
  position.writeUint32(0, encoder.currentLength - bytesBefore);
  if (!writeHandleCount(encoder, position, handlesBefore)) return;
  position.writeUint16(6, 0);
}

/**
 * Decodes the envelope at `position` with `type`, checking that the payload
 * used exactly the bytes and handles the header announced.
 */
export function decodeEnvelope<T>(
  decoder: Decoder,
  type: WireType<T>,
  position: Position,
  depth: AnyRecursionDepth,
): T | null | undefined {
  const header = decodeEnvelopeHeader(decoder, position);
  if (!header) return undefined;
  if (!header.present) return null;

  if (header.inlined !== type.inlineSize <= ENVELOPE_INLINE_CAPACITY) {
    decoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_INLINE_BIT);
    return undefined;
  }

  const handlesBefore = decoder.currentHandleCount;
  let value: T | undefined;
  if (header.inlined) {
    if (!position.isZero(type.inlineSize, ENVELOPE_INLINE_CAPACITY - type.inlineSize)) {
      decoder.setError('VALIDATION', ErrorMessages.NON_ZERO_PADDING);
      return undefined;
    }
    value = type.decode(decoder, position.sub(0, type.inlineSize), depth);
  } else {
    const inner = depth.add(decoder);
    if (!inner.isValid()) return undefined;
    const bytesBefore = decoder.currentLength;
    const payload = decoder.alloc(type.inlineSize);
    if (!payload) return undefined;
    value = type.decode(decoder, payload, inner);
    if (value !== undefined && decoder.currentLength - bytesBefore !== header.numBytes) {
      decoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_NUM_BYTES);
      return undefined;
    }
  }
  if (value === undefined) return undefined;

  if (decoder.currentHandleCount - handlesBefore !== header.numHandles) {
    decoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_NUM_HANDLES);
    return undefined;
  }
  return value;
}

function writeHandleCount(encoder: Encoder, position: Position, handlesBefore: number): boolean {
  if (encoder.hasError()) return false;
  const count = encoder.currentHandleCount - handlesBefore;
  if (count > MAX_ENVELOPE_HANDLES) {
    encoder.setError('INVALID_ENVELOPE', ErrorMessages.INVALID_NUM_HANDLES);
    return false;
  }
  position.writeUint16(4, count);
  return true;
}
