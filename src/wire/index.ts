export { Position } from './position.ts';
export { RecursionDepth } from './recursion.ts';
export type { AnyRecursionDepth, DepthLimited } from './recursion.ts';
export { Arena } from './allocator.ts';
export { CoderBase } from './coder.ts';
export { Encoder } from './encoder.ts';
export type { EncoderOutputs, EncodeFinish } from './encoder.ts';
export { Decoder } from './decoder.ts';
export type { DecoderInputs, DecodeFinish } from './decoder.ts';
export { OwnedHandle } from './handle.ts';
export { WireError, ErrorMessages, isWireError } from './errors.ts';
export { createCodingConfig, DEFAULT_WIRE_PROFILE, isHandleMetadata } from './coding-config.ts';
export type { CodingConfig, CodingConfigOptions, DecodeHandleOutcome, WireProfile } from './coding-config.ts';
export {
  decodeEnvelope,
  decodeEnvelopeHeader,
  decodeUnknownEnvelope,
  encodeEnvelope,
  encodeUnknownEnvelope,
  skipUnknownEnvelope,
} from './envelope.ts';
export type { EnvelopeHeader, UnknownData } from './envelope.ts';
export { wireDecode, wireEncode } from './transcode.ts';
export type { DecodeResult, EncodeResult, RecursionMode, WireDecodeArgs, WireEncodeArgs } from './transcode.ts';
export {
  AT_REST_FLAG_WIRE_FORMAT_V2,
  DYNAMIC_FLAG_FLEXIBLE,
  EPITAPH_ORDINAL,
  MAGIC_NUMBER_INITIAL,
  TRANSACTION_HEADER_SIZE,
  createEpitaph,
  createHeader,
  epitaphMessage,
  isEpitaph,
  isFlexible,
  messageType,
  readHeader,
  transactionHeader,
  validateHeader,
  writeHeader,
} from './message.ts';
export type { HeaderOptions, Message, TransactionHeader } from './message.ts';
export { anyRecursive } from './wire-type.ts';
export {
  PERSISTENT_HEADER_SIZE,
  createPersistentHeader,
  decodePersistent,
  encodePersistent,
  persistentHeader,
  persistentMessage,
  validatePersistentHeader,
} from './persistent.ts';
export type {
  PersistentEncodeOptions,
  PersistentEncodeResult,
  PersistentHeader,
  PersistentMessage,
} from './persistent.ts';
export type { Infer, WireType } from './wire-type.ts';
export * from './types.ts';
