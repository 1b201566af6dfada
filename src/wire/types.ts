// src/wire/types.ts

/** Every allocation in a message starts on this boundary. */
export const WIRE_ALIGNMENT = 8;

export const ENVELOPE_SIZE = 8;

/** Largest payload that fits in an envelope's leading word. */
export const ENVELOPE_INLINE_CAPACITY = 4;

export const DEFAULT_MAX_DEPTH = 32;
export const DEFAULT_INLINING_MASK = 1;

export const ALLOC_PRESENT_U64 = 0xffff_ffff_ffff_ffffn;
export const ALLOC_ABSENT_U64 = 0n;
export const ALLOC_PRESENT_U32 = 0xffff_ffff;
export const ALLOC_ABSENT_U32 = 0;

export const HANDLE_INVALID = 0;

export type WireErrorCode =
  | 'INVALID_ARGS'
  | 'BUFFER_TOO_SMALL'
  | 'OUT_OF_RANGE'
  | 'INVALID_ENVELOPE'
  | 'RECURSION_DEPTH_EXCEEDED'
  | 'EXTRA_BYTES'
  | 'EXTRA_HANDLES'
  | 'VALIDATION';

export interface WireErrorInfo {
  code: WireErrorCode;
  message: string;
}

// Kernel object types a handle may refer to. NONE disables subtype checks.
export type ObjectType = 'none' | 'channel' | 'event' | 'vmo' | 'socket' | 'port' | 'timer';

export const Rights = {
  NONE: 0,
  DUPLICATE: 1 << 0,
  TRANSFER: 1 << 1,
  READ: 1 << 2,
  WRITE: 1 << 3,
  SIGNAL: 1 << 4,
  WAIT: 1 << 5,
  // Sentinel meaning "whatever the handle already carries".
  SAME_RIGHTS: 0x8000_0000,
} as const;

export const DEFAULT_CHANNEL_RIGHTS =
  Rights.TRANSFER | Rights.READ | Rights.WRITE | Rights.SIGNAL | Rights.WAIT;

export interface HandleMetadata {
  objectType: ObjectType;
  rights: number;
}

/** What a wire type expects of the next handle it takes or sends. */
export interface HandleAttributes {
  objectType: ObjectType;
  rights: number;
}

export const UNCONSTRAINED_HANDLE: HandleAttributes = {
  objectType: 'none',
  rights: Rights.SAME_RIGHTS,
};

/** Owner of raw handle values: the kernel, or something standing in for it. */
export interface HandleSpace {
  close(raw: number): boolean;
  /** Returns a new raw handle carrying `rights`; the old one is consumed. */
  replace(raw: number, rights: number): number | undefined;
}

/** One extent of the scatter-gather output. */
export type Iovec = Uint8Array;

export function roundUpToAlign(size: number, align = WIRE_ALIGNMENT): number {
  return Math.ceil(size / align) * align;
}
