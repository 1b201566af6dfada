// src/wire/decoder.ts
import { CoderBase } from './coder.ts';
import type { CodingConfig } from './coding-config.ts';
import { ErrorMessages } from './errors.ts';
import { OwnedHandle } from './handle.ts';
import { Position } from './position.ts';
import { UNCONSTRAINED_HANDLE, roundUpToAlign } from './types.ts';
import type { HandleAttributes, HandleMetadata, WireErrorInfo } from './types.ts';

export interface DecoderInputs {
  bytes: Uint8Array;
  handles: readonly number[];
  handleMetadata: readonly HandleMetadata[];
}

export type DecodeFinish<T> =
  | { ok: true; value: T }
  | { ok: false; error: WireErrorInfo };

const UNKNOWN_METADATA: HandleMetadata = {
  objectType: UNCONSTRAINED_HANDLE.objectType,
  rights: UNCONSTRAINED_HANDLE.rights,
};

/**
 * Reads one received message. The decoder borrows the byte and handle arrays;
 * it remembers every handle it hands out so that a failed decode can close
 * them together with the ones never reached.
 */
export class Decoder extends CoderBase {
  private readonly input: DecoderInputs;
  private length = 0;
  private handleCursor = 0;
  private readonly taken: OwnedHandle[] = [];

  constructor(config: CodingConfig, inputs: DecoderInputs) {
    super(config);
    this.input = inputs;
  }

  get numBytes(): number {
    return this.input.bytes.length;
  }

  get numHandles(): number {
    return this.input.handles.length;
  }

  get currentLength(): number {
    return this.length;
  }

  get currentHandleCount(): number {
    return this.handleCursor;
  }

  /** Claims the next `size` bytes, rounded up to the wire alignment. */
  alloc(size: number): Position | undefined {
    if (this.hasError()) return undefined;
    const padded = roundUpToAlign(size);
    if (padded > this.numBytes - this.length) {
      this.setError('OUT_OF_RANGE', ErrorMessages.MESSAGE_TOO_SHORT);
      return undefined;
    }
    const start = this.length;
    const block = new Position(this.input.bytes, start, padded);
    if (!block.isZero(size, padded - size)) {
      this.setError('VALIDATION', ErrorMessages.NON_ZERO_PADDING);
      return undefined;
    }
    this.length += padded;
    return block.sub(0, size);
  }

  /** Takes ownership of the next handle after checking it against `expected`. */
  takeHandle(expected: HandleAttributes = UNCONSTRAINED_HANDLE): OwnedHandle | undefined {
    if (this.hasError()) return undefined;
    if (this.handleCursor >= this.numHandles) {
      this.setError('OUT_OF_RANGE', ErrorMessages.TOO_FEW_HANDLES);
      return undefined;
    }
    const index = this.handleCursor++;
    const raw = this.rawAt(index);
    const metadata = this.input.handleMetadata[index] ?? UNKNOWN_METADATA;
    const outcome = this.config.decodeProcessHandle(raw, metadata, expected);
    if (!outcome.ok) {
      this.config.handles.close(raw);
      this.setErrorInfo(outcome.error);
      return undefined;
    }
    const handle = new OwnedHandle(outcome.raw, this.config.handles);
    this.taken.push(handle);
    return handle;
  }

  /** Consumes and closes the next `count` handles, e.g. for a skipped field. */
  closeNextNHandles(count: number): boolean {
    if (this.hasError()) return false;
    if (count > this.numHandles - this.handleCursor) {
      this.setError('OUT_OF_RANGE', ErrorMessages.TOO_FEW_HANDLES);
      return false;
    }
    for (let i = 0; i < count; i++) {
      this.config.handles.close(this.rawAt(this.handleCursor++));
    }
    return true;
  }

  /** Records an error if any byte or handle of the message went unread. */
  checkExactness(): void {
    if (this.length !== this.numBytes) {
      this.setError('EXTRA_BYTES', ErrorMessages.NOT_ALL_BYTES);
    }
    if (this.handleCursor !== this.numHandles) {
      this.setError('EXTRA_HANDLES', ErrorMessages.NOT_ALL_HANDLES);
    }
  }

  finish<T>(value: T | undefined): DecodeFinish<T> {
    const error = this.error;
    if (error || value === undefined) {
      this.closeAll();
      return {
        ok: false,
        error: error ?? { code: 'VALIDATION', message: 'decode produced no value' },
      };
    }
    return { ok: true, value };
  }

  private closeAll(): void {
    for (const handle of this.taken) handle.close();
    this.taken.length = 0;
    while (this.handleCursor < this.numHandles) {
      this.config.handles.close(this.rawAt(this.handleCursor++));
    }
  }

  private rawAt(index: number): number {
    const raw = this.input.handles[index];
    if (raw === undefined) {
      throw new RangeError(`handle index ${index} outside ${this.numHandles} handles`);
    }
    return raw;
  }
}
