// src/wire/encoder.ts
import { Arena } from './allocator.ts';
import { CoderBase } from './coder.ts';
import { isHandleMetadata } from './coding-config.ts';
import type { CodingConfig } from './coding-config.ts';
import { ErrorMessages } from './errors.ts';
import type { OwnedHandle } from './handle.ts';
import { Position } from './position.ts';
import { WIRE_ALIGNMENT, roundUpToAlign } from './types.ts';
import type { HandleAttributes, HandleMetadata, Iovec, WireErrorInfo } from './types.ts';

export interface EncoderOutputs {
  iovecs: Iovec[];
  iovecCapacity: number;
  handles: number[];
  handleMetadata: HandleMetadata[];
  handleCapacity: number;
  backing: Uint8Array;
}

export type EncodeFinish =
  | { ok: true; byteCount: number; iovecCount: number; handleCount: number }
  | { ok: false; error: WireErrorInfo };

const ZERO_PADDING = new Uint8Array(WIRE_ALIGNMENT);

/**
 * Writes one message as a scatter-gather list. Arena allocations that follow
 * one another share an iovec; gathered external extents get their own.
 *
 * Handles are staged, not moved: the caller's value keeps ownership until
 * `finish` reports success.
 */
export class Encoder extends CoderBase {
  private readonly arena: Arena;
  private readonly out: EncoderOutputs;
  private readonly staged = new Set<OwnedHandle>();
  private length = 0;
  // Index of the iovec that the next contiguous arena extent can extend.
  private openIovec = -1;
  private openIovecStart = 0;

  constructor(config: CodingConfig, outputs: EncoderOutputs) {
    super(config);
    this.out = outputs;
    this.arena = new Arena(outputs.backing);
    outputs.iovecs.length = 0;
    outputs.handles.length = 0;
    outputs.handleMetadata.length = 0;
  }

  /** Bytes of message produced so far, gathered extents included. */
  get currentLength(): number {
    return this.length;
  }

  get currentHandleCount(): number {
    return this.out.handles.length;
  }

  alloc(size: number): Position | undefined {
    if (this.hasError()) return undefined;
    const extent = this.arena.alloc(size);
    if (!extent) {
      this.setError('BUFFER_TOO_SMALL', ErrorMessages.BACKING_TOO_SMALL);
      return undefined;
    }
    if (extent.length > 0 && !this.appendArenaExtent(extent.start, extent.length)) {
      return undefined;
    }
    const position = new Position(this.arena.buffer, extent.start, size, this.length);
    this.length += extent.length;
    return position;
  }

  /**
   * Gathers `bytes` into the message without copying them, followed by zero
   * padding up to the wire alignment. Returns false, with no error recorded,
   * when there are not enough iovecs left; the caller then copies instead.
   */
  gatherExternal(bytes: Uint8Array): boolean {
    if (this.hasError() || bytes.length === 0) return false;
    const padding = roundUpToAlign(bytes.length) - bytes.length;
    // Room for the extent, its padding and the arena iovec that follows.
    const needed = padding > 0 ? 3 : 2;
    if (this.out.iovecCapacity - this.out.iovecs.length < needed) return false;

    this.out.iovecs.push(bytes);
    if (padding > 0) this.out.iovecs.push(ZERO_PADDING.subarray(0, padding));
    this.length += bytes.length + padding;
    this.openIovec = -1;
    return true;
  }

  encodeHandle(handle: OwnedHandle, attributes: HandleAttributes): boolean {
    if (this.hasError()) return false;
    if (!handle.isValid || this.staged.has(handle)) {
      this.setError('VALIDATION', ErrorMessages.INVALID_HANDLE);
      return false;
    }
    if (this.out.handles.length >= this.out.handleCapacity) {
      this.setError('BUFFER_TOO_SMALL', ErrorMessages.TOO_MANY_HANDLES);
      return false;
    }
    const metadata = this.config.encodeProcessHandle(attributes);
    if (!isHandleMetadata(metadata)) {
      this.setErrorInfo(metadata);
      return false;
    }
    this.out.handles.push(handle.value);
    this.out.handleMetadata.push(metadata);
    this.staged.add(handle);
    return true;
  }

  finish(): EncodeFinish {
    const error = this.error;
    if (error) {
      this.out.iovecs.length = 0;
      this.out.handles.length = 0;
      this.out.handleMetadata.length = 0;
      return { ok: false, error };
    }
    for (const handle of this.staged) handle.release();
    this.staged.clear();
    return {
      ok: true,
      byteCount: this.length,
      iovecCount: this.out.iovecs.length,
      handleCount: this.out.handles.length,
    };
  }

  private appendArenaExtent(start: number, length: number): boolean {
    const buffer = this.arena.buffer;
    const open = this.openIovec >= 0 ? this.out.iovecs[this.openIovec] : undefined;
    if (open !== undefined && this.openIovecStart + open.length === start) {
      this.out.iovecs[this.openIovec] = buffer.subarray(this.openIovecStart, start + length);
      return true;
    }
    if (this.out.iovecs.length >= this.out.iovecCapacity) {
      this.setError('BUFFER_TOO_SMALL', ErrorMessages.TOO_MANY_IOVECS);
      return false;
    }
    this.openIovec = this.out.iovecs.length;
    this.openIovecStart = start;
    this.out.iovecs.push(buffer.subarray(start, start + length));
    return true;
  }
}
