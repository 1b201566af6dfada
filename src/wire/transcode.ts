// src/wire/transcode.ts
import type { CodingConfig } from './coding-config.ts';
import { Decoder } from './decoder.ts';
import type { DecodeFinish } from './decoder.ts';
import { Encoder } from './encoder.ts';
import type { EncodeFinish } from './encoder.ts';
import { ErrorMessages } from './errors.ts';
import { RecursionDepth } from './recursion.ts';
import type { AnyRecursionDepth } from './recursion.ts';
import type { HandleMetadata, Iovec, WireErrorInfo } from './types.ts';
import type { WireType } from './wire-type.ts';

/**
 * `unchecked` skips depth accounting. It is refused for types marked
 * `recursive`, whose nesting only the message bounds.
 */
export type RecursionMode = 'checked' | 'unchecked';

export interface WireEncodeArgs<T> {
  value: T | null | undefined;
  type: WireType<T>;
  config: CodingConfig;
  iovecs: Iovec[] | null | undefined;
  iovecCapacity: number;
  handles?: number[] | null;
  handleMetadata?: HandleMetadata[] | null;
  handleCapacity: number;
  backing: Uint8Array | null | undefined;
  recursion?: RecursionMode;
}

export interface WireDecodeArgs<T> {
  type: WireType<T>;
  config: CodingConfig;
  bytes: Uint8Array | null | undefined;
  handles?: readonly number[] | null;
  handleMetadata?: readonly HandleMetadata[] | null;
  /** Defaults to the length of `handles`. */
  numHandles?: number;
  recursion?: RecursionMode;
}

export type EncodeResult = EncodeFinish;
export type DecodeResult<T> = DecodeFinish<T>;

function invalidArgs(message: string): { ok: false; error: WireErrorInfo } {
  return { ok: false, error: { code: 'INVALID_ARGS', message } };
}

function rootDepth(mode: RecursionMode | undefined): AnyRecursionDepth {
  return mode === 'unchecked' ? RecursionDepth.unchecked() : RecursionDepth.initial();
}

/**
 * Encodes `value` as one message into the caller's iovec and handle arrays.
 * On failure the output arrays are left empty and `value` still owns all of
 * its handles; on success the handles have moved into `handles`.
 */
export function wireEncode<T>(args: WireEncodeArgs<T>): EncodeResult {
  const { value, iovecs, backing } = args;
  if (value === null || value === undefined) return invalidArgs(ErrorMessages.NULL_VALUE);
  if (!iovecs) return invalidArgs(ErrorMessages.NULL_IOVECS);
  let handles = args.handles;
  let handleMetadata = args.handleMetadata;
  if (args.handleCapacity > 0 && (!handles || !handleMetadata)) {
    return invalidArgs(ErrorMessages.NULL_HANDLES);
  }
  if (!backing) return invalidArgs(ErrorMessages.NULL_BACKING);
  if (args.recursion === 'unchecked' && args.type.recursive) {
    return invalidArgs(ErrorMessages.UNCHECKED_RECURSIVE_TYPE);
  }
  handles ??= [];
  handleMetadata ??= [];

  const encoder = new Encoder(args.config, {
    iovecs,
    iovecCapacity: args.iovecCapacity,
    handles,
    handleMetadata,
    handleCapacity: args.handleCapacity,
    backing,
  });
  const position = encoder.alloc(args.type.inlineSize);
  if (position) {
    args.type.encode(encoder, value, position, rootDepth(args.recursion));
  }
  return encoder.finish();
}

/**
 * Decodes one message. Every byte and handle must be consumed; on any failure
 * all handles of the message are closed, whether or not the walk reached them.
 */
export function wireDecode<T>(args: WireDecodeArgs<T>): DecodeResult<T> {
  const { bytes, handles, handleMetadata } = args;
  const numHandles = args.numHandles ?? handles?.length ?? 0;
  if (numHandles > 0 && (!handles || !handleMetadata)) {
    return invalidArgs(ErrorMessages.NULL_INPUT_HANDLES);
  }
  if (handles && numHandles > handles.length) {
    return invalidArgs(ErrorMessages.HANDLE_COUNT_MISMATCH);
  }
  const received = handles ? handles.slice(0, numHandles) : [];
  if (!bytes) {
    for (const raw of received) args.config.handles.close(raw);
    return invalidArgs(ErrorMessages.NULL_BYTES);
  }
  if (args.recursion === 'unchecked' && args.type.recursive) {
    for (const raw of received) args.config.handles.close(raw);
    return invalidArgs(ErrorMessages.UNCHECKED_RECURSIVE_TYPE);
  }

  const decoder = new Decoder(args.config, {
    bytes,
    handles: received,
    handleMetadata: handleMetadata ?? [],
  });
  const position = decoder.alloc(args.type.inlineSize);
  const value = position
    ? args.type.decode(decoder, position, rootDepth(args.recursion))
    : undefined;
  decoder.checkExactness();
  return decoder.finish(value);
}
