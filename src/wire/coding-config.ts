// src/wire/coding-config.ts
import {
  DEFAULT_INLINING_MASK,
  DEFAULT_MAX_DEPTH,
  Rights,
} from './types.ts';
import type { HandleAttributes, HandleMetadata, HandleSpace, WireErrorInfo } from './types.ts';
import { ErrorMessages } from './errors.ts';

export interface WireProfile {
  maxDepth: number;
  inliningMask: number;
}

export const DEFAULT_WIRE_PROFILE: WireProfile = {
  maxDepth: DEFAULT_MAX_DEPTH,
  inliningMask: DEFAULT_INLINING_MASK,
};

export type DecodeHandleOutcome =
  | { ok: true; raw: number }
  | { ok: false; error: WireErrorInfo };

/**
 * Static per-message metadata handed to a transcode. The engine reads it and
 * passes it down to wire types; it never mutates it.
 */
export interface CodingConfig {
  readonly profile: Readonly<WireProfile>;
  readonly handles: HandleSpace;
  /** Produces the metadata sent alongside an outgoing handle. */
  encodeProcessHandle(attributes: HandleAttributes): HandleMetadata | WireErrorInfo;
  /** Validates an incoming handle against what the field expects. */
  decodeProcessHandle(raw: number, received: HandleMetadata, expected: HandleAttributes): DecodeHandleOutcome;
}

export interface CodingConfigOptions {
  handles: HandleSpace;
  profile?: Partial<WireProfile>;
}

function isErrorInfo(value: HandleMetadata | WireErrorInfo): value is WireErrorInfo {
  return 'code' in value;
}

export function isHandleMetadata(value: HandleMetadata | WireErrorInfo): value is HandleMetadata {
  return !isErrorInfo(value);
}

/**
 * Handle processing for channel transports: subtype must match unless either
 * side is unconstrained, and received rights must cover the expected ones.
 * Surplus rights are dropped through the handle space.
 */
export function createCodingConfig(options: CodingConfigOptions): CodingConfig {
  const profile: WireProfile = { ...DEFAULT_WIRE_PROFILE, ...options.profile };
  if (!Number.isInteger(profile.maxDepth) || profile.maxDepth < 0) {
    throw new Error(`maxDepth must be a non-negative integer, got ${profile.maxDepth}`);
  }
  if (!Number.isInteger(profile.inliningMask) || profile.inliningMask <= 0 || profile.inliningMask > 0xffff) {
    throw new Error(`inliningMask must be a nonzero 16-bit value, got ${profile.inliningMask}`);
  }
  const handles = options.handles;

  return {
    profile: Object.freeze(profile),
    handles,

    encodeProcessHandle(attributes) {
      return { objectType: attributes.objectType, rights: attributes.rights };
    },

    decodeProcessHandle(raw, received, expected) {
      if (
        expected.objectType !== 'none'
        && received.objectType !== 'none'
        && expected.objectType !== received.objectType
      ) {
        return {
          ok: false,
          error: {
            code: 'VALIDATION',
            message: `${ErrorMessages.WRONG_SUBTYPE}: expected ${expected.objectType}, received ${received.objectType}`,
          },
        };
      }

      // Received rights are always concrete; SAME_RIGHTS is only an expectation.
      if (expected.rights === Rights.SAME_RIGHTS || expected.rights === received.rights) {
        return { ok: true, raw };
      }

      if ((received.rights & expected.rights) !== expected.rights) {
        const missing = expected.rights & ~received.rights;
        return {
          ok: false,
          error: { code: 'VALIDATION', message: `${ErrorMessages.MISSING_RIGHTS}: 0x${missing.toString(16)}` },
        };
      }

      const reduced = handles.replace(raw, expected.rights);
      if (reduced === undefined) {
        return { ok: false, error: { code: 'VALIDATION', message: ErrorMessages.RIGHTS_REPLACE_FAILED } };
      }
      return { ok: true, raw: reduced };
    },
  };
}
