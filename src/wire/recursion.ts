// src/wire/recursion.ts
import { ErrorMessages } from './errors.ts';
import type { WireErrorCode } from './types.ts';

export interface DepthLimited {
  readonly maxDepth: number;
  setError(code: WireErrorCode, message: string): void;
}

const INVALID_DEPTH = -1;

/**
 * Nesting depth threaded by value through a recursive transcode. `add` never
 * mutates; it returns the depth to pass down, or the invalid sentinel once the
 * coder's limit is crossed. Call sites check `isValid()` straight after `add`.
 *
 * The unchecked flavour is for shapes whose nesting is bounded by construction
 * and must not be used for self-referential types.
 */
export class RecursionDepth<Checked extends boolean = true> {
  private static readonly UNCHECKED = new RecursionDepth(false, 0);

  private constructor(
    readonly checked: Checked,
    readonly depth: number,
  ) {}

  static initial(): RecursionDepth<true> {
    return new RecursionDepth(true, 0);
  }

  static unchecked(): RecursionDepth<false> {
    return RecursionDepth.UNCHECKED;
  }

  isValid(): boolean {
    return this.depth !== INVALID_DEPTH;
  }

  add(coder: DepthLimited, diff = 1): RecursionDepth<Checked> {
    if (!this.checked) return this;
    if (!this.isValid()) return this;
    const next = this.depth + diff;
    if (next > coder.maxDepth) {
      coder.setError('RECURSION_DEPTH_EXCEEDED', ErrorMessages.RECURSION_DEPTH_EXCEEDED);
      return new RecursionDepth(this.checked, INVALID_DEPTH);
    }
    return new RecursionDepth(this.checked, next);
  }
}

export type AnyRecursionDepth = RecursionDepth<boolean>;
