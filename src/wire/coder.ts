// src/wire/coder.ts
import type { CodingConfig } from './coding-config.ts';
import type { DepthLimited } from './recursion.ts';
import type { WireErrorCode, WireErrorInfo } from './types.ts';

/**
 * State shared by the encoder and decoder: the config and the sticky
 * first-error slot. Once an error is recorded every later `setError` is a
 * no-op and the coder refuses further allocation.
 */
export abstract class CoderBase implements DepthLimited {
  private firstError: WireErrorInfo | undefined;

  constructor(readonly config: CodingConfig) {}

  get maxDepth(): number {
    return this.config.profile.maxDepth;
  }

  get inliningMask(): number {
    return this.config.profile.inliningMask;
  }

  get error(): WireErrorInfo | undefined {
    return this.firstError;
  }

  hasError(): boolean {
    return this.firstError !== undefined;
  }

  setError(code: WireErrorCode, message: string): void {
    if (this.firstError) return;
    this.firstError = { code, message };
  }

  setErrorInfo(info: WireErrorInfo): void {
    this.setError(info.code, info.message);
  }
}
