// src/wire/errors.ts
import type { WireErrorCode, WireErrorInfo } from './types.ts';

export const ErrorMessages = {
  NULL_VALUE: 'value to encode is null',
  NULL_IOVECS: 'iovec output array is null',
  NULL_HANDLES: 'handle output array is null but handle capacity is nonzero',
  NULL_BACKING: 'backing buffer is null',
  NULL_BYTES: 'byte buffer is null',
  NULL_INPUT_HANDLES: 'handle array is null but handle count is nonzero',
  HANDLE_COUNT_MISMATCH: 'handle count exceeds the handle array',
  BACKING_TOO_SMALL: 'backing buffer too small',
  UNCHECKED_RECURSIVE_TYPE: 'depth accounting cannot be skipped for a recursive type',
  TOO_MANY_IOVECS: 'too many iovecs',
  TOO_MANY_HANDLES: 'too many handles',
  MESSAGE_TOO_SHORT: 'message is too short',
  TOO_FEW_HANDLES: 'message has too few handles',
  INVALID_NUM_BYTES: 'invalid envelope byte count',
  INVALID_NUM_HANDLES: 'invalid envelope handle count',
  INVALID_INLINE_BIT: 'invalid inline bit',
  INVALID_PRESENCE: 'invalid presence indicator',
  NON_ZERO_PADDING: 'non-zero padding bytes',
  RECURSION_DEPTH_EXCEEDED: 'recursion depth exceeded',
  NOT_ALL_BYTES: 'not all bytes consumed',
  NOT_ALL_HANDLES: 'not all handles consumed',
  INVALID_HANDLE: 'invalid handle',
  NULL_NON_NULLABLE: 'non-nullable value is absent',
  WRONG_SUBTYPE: 'incorrect handle subtype',
  MISSING_RIGHTS: 'handle is missing expected rights',
  RIGHTS_REPLACE_FAILED: 'failed to reduce handle rights',
  INVALID_UTF8: 'string is not valid UTF-8',
  STRING_TOO_LONG: 'string exceeds maximum length',
  VECTOR_TOO_LONG: 'vector exceeds maximum count',
  UNKNOWN_UNION_TAG: 'unknown union ordinal',
  UNKNOWN_ENUM_VALUE: 'unknown enum value',
  INVALID_BITS: 'unknown bits set',
  INVALID_BOOL: 'invalid boolean',
  INTEGER_OUT_OF_RANGE: 'integer out of range',
  ARRAY_LENGTH_MISMATCH: 'array length does not match its declared size',
  INVALID_TABLE_ORDINAL: 'table ordinal out of range',
  CANNOT_STORE_UNKNOWN_HANDLES: 'unknown field carries handles that cannot be stored',
  INVALID_MAGIC: 'incompatible magic number',
  UNSUPPORTED_WIRE_FORMAT: 'unsupported wire format',
  INVALID_PERSISTENT_HEADER: 'invalid persistent header',
} as const;

export class WireError extends Error {
  readonly code: WireErrorCode;

  constructor(info: WireErrorInfo) {
    super(`${info.code}: ${info.message}`);
    this.name = 'WireError';
    this.code = info.code;
  }
}

export function isWireError(err: unknown): err is WireError {
  return err instanceof WireError;
}
