// src/test-support/harness.ts
import { HandleTable } from '../channel/handle-table.ts';
import { createCodingConfig, wireDecode, wireEncode } from '../wire/index.ts';
import type {
  CodingConfig,
  DecodeResult,
  HandleMetadata,
  Iovec,
  WireErrorInfo,
  WireProfile,
  WireType,
} from '../wire/index.ts';

export interface Encoded {
  bytes: Uint8Array;
  iovecs: Iovec[];
  handles: number[];
  handleMetadata: HandleMetadata[];
}

export interface Harness {
  table: HandleTable;
  config: CodingConfig;
  warnings: string[];
}

export function createHarness(profile: Partial<WireProfile> = {}): Harness {
  const warnings: string[] = [];
  const table = new HandleTable((message) => warnings.push(message));
  return { table, config: createCodingConfig({ handles: table, profile }), warnings };
}

export function concatIovecs(iovecs: readonly Iovec[]): Uint8Array {
  const total = iovecs.reduce((sum, iovec) => sum + iovec.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const iovec of iovecs) {
    out.set(iovec, offset);
    offset += iovec.length;
  }
  return out;
}

export interface EncodeOptions {
  backingSize?: number;
  iovecCapacity?: number;
  handleCapacity?: number;
}

export function tryEncode<T>(
  config: CodingConfig,
  type: WireType<T>,
  value: T,
  options: EncodeOptions = {},
): { ok: true; encoded: Encoded } | { ok: false; error: WireErrorInfo; encoded: Encoded } {
  const iovecs: Iovec[] = [];
  const handles: number[] = [];
  const handleMetadata: HandleMetadata[] = [];
  const result = wireEncode({
    value,
    type,
    config,
    iovecs,
    iovecCapacity: options.iovecCapacity ?? 64,
    handles,
    handleMetadata,
    handleCapacity: options.handleCapacity ?? 64,
    backing: new Uint8Array(options.backingSize ?? 4096),
  });
  const encoded = { bytes: concatIovecs(iovecs), iovecs, handles, handleMetadata };
  return result.ok ? { ok: true, encoded } : { ok: false, error: result.error, encoded };
}

/** Encodes and throws if the engine reports an error. */
export function encodeValue<T>(config: CodingConfig, type: WireType<T>, value: T, options?: EncodeOptions): Encoded {
  const result = tryEncode(config, type, value, options);
  if (!result.ok) throw new Error(`encode failed: ${result.error.code}: ${result.error.message}`);
  return result.encoded;
}

export function decodeValue<T>(
  config: CodingConfig,
  type: WireType<T>,
  message: { bytes: Uint8Array; handles?: number[]; handleMetadata?: HandleMetadata[] },
): DecodeResult<T> {
  return wireDecode({
    type,
    config,
    bytes: message.bytes,
    handles: message.handles ?? [],
    handleMetadata: message.handleMetadata ?? [],
  });
}

export function hex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}
