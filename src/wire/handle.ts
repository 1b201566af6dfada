// src/wire/handle.ts
import { HANDLE_INVALID } from './types.ts';
import type { HandleSpace } from './types.ts';

/**
 * Move-only owner of a raw handle. Exactly one OwnedHandle refers to a raw
 * value at a time: `take()` transfers ownership, `release()` gives it up
 * without closing, and `close()` returns it to the handle space once.
 */
export class OwnedHandle {
  private raw: number;

  constructor(raw: number, private readonly space: HandleSpace) {
    this.raw = raw;
  }

  static invalid(space: HandleSpace): OwnedHandle {
    return new OwnedHandle(HANDLE_INVALID, space);
  }

  get value(): number {
    return this.raw;
  }

  get isValid(): boolean {
    return this.raw !== HANDLE_INVALID;
  }

  take(): OwnedHandle {
    const moved = new OwnedHandle(this.raw, this.space);
    this.raw = HANDLE_INVALID;
    return moved;
  }

  release(): number {
    const raw = this.raw;
    this.raw = HANDLE_INVALID;
    return raw;
  }

  close(): void {
    if (this.raw === HANDLE_INVALID) return;
    const raw = this.raw;
    this.raw = HANDLE_INVALID;
    this.space.close(raw);
  }
}
