// src/wire/allocator.ts
import { roundUpToAlign } from './types.ts';

export interface ArenaExtent {
  /** Start of the extent in the backing buffer. */
  start: number;
  /** Bytes reserved, already rounded up to the wire alignment. */
  length: number;
}

/**
 * Bump allocator over a caller-supplied buffer. Every extent is zero-filled
 * and starts on an 8-byte boundary relative to the buffer start.
 */
export class Arena {
  private cursor = 0;

  constructor(readonly buffer: Uint8Array) {}

  get used(): number {
    return this.cursor;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  alloc(size: number): ArenaExtent | undefined {
    const length = roundUpToAlign(size);
    if (length > this.buffer.length - this.cursor) return undefined;
    const start = this.cursor;
    this.buffer.fill(0, start, start + length);
    this.cursor += length;
    return { start, length };
  }
}
