#!/usr/bin/env -S node --import tsx
import { pathToFileURL } from 'node:url';
import { HandleTable } from '../channel/index.ts';
import { loadCodingPolicy } from '../config/index.ts';
import {
  DEFAULT_INLINING_MASK,
  Decoder,
  ENVELOPE_SIZE,
  Position,
  TRANSACTION_HEADER_SIZE,
  createCodingConfig,
  decodeEnvelopeHeader,
  isEpitaph,
  isFlexible,
  readHeader,
  roundUpToAlign,
  validateHeader,
} from '../wire/index.ts';

export type CommandSpec =
  | { kind: 'help' }
  | { kind: 'header'; bytes: Uint8Array }
  | { kind: 'envelopes'; bytes: Uint8Array; offset: number }
  | { kind: 'profile'; policyPath: string; typeName: string };

export interface GlobalOptions {
  inliningMask: number;
  args: string[];
}

export interface HeaderReport {
  txid: number;
  atRestFlags: string;
  dynamicFlags: string;
  magic: number;
  ordinal: string;
  flexible: boolean;
  epitaph: boolean;
  problem: string | null;
}

export interface EnvelopeReport {
  ordinal: number;
  present: boolean;
  inline: boolean;
  numBytes: number;
  numHandles: number;
  inlineBytes?: string;
}

export interface EnvelopesReport {
  count: number;
  envelopes: EnvelopeReport[];
  error: string | null;
}

export const HELP_TEXT = `handlewire - inspect wire-format messages

Usage:
  handlewire [--inlining-mask <n>] header <hex>
  handlewire [--inlining-mask <n>] envelopes <hex> [--offset <n>]
  handlewire profile <policy.yaml> <typeName>

header     decode the 16-byte transaction header at the start of a message
envelopes  list the envelopes of the table whose header sits at --offset
           (default 0); its envelope array is expected right after it
profile    print the wire profile a coding policy assigns to a type name
`;

export function printHelp(out: (line: string) => void = console.log): void {
  out(HELP_TEXT);
}

function parseInteger(raw: string | undefined, label: string): number {
  if (!raw || raw.startsWith('-')) throw new Error(`${label} requires a numeric value`);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) throw new Error(`${label} must be a non-negative integer`);
  return value;
}

export function parseHex(raw: string): Uint8Array {
  const digits = raw.replace(/\s+/g, '').replace(/^0x/i, '');
  if (digits.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(digits)) {
    throw new Error('message must be an even number of hex digits');
  }
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

export function parseGlobalArgs(argv: string[]): GlobalOptions {
  const args: string[] = [];
  let inliningMask = DEFAULT_INLINING_MASK;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (typeof arg !== 'string') continue;
    if (arg === '--inlining-mask') {
      inliningMask = parseInteger(argv[i + 1], '--inlining-mask');
      i += 1;
      continue;
    }
    args.push(arg);
  }
  return { inliningMask, args };
}

export function parseCommand(args: string[]): CommandSpec {
  const command = args[0];
  switch (command) {
    case 'header': {
      if (!args[1]) throw new Error('header requires <hex>');
      return { kind: 'header', bytes: parseHex(args[1]) };
    }
    case 'envelopes': {
      if (!args[1]) throw new Error('envelopes requires <hex> [--offset <n>]');
      let offset = 0;
      const flags = args.slice(2);
      for (let i = 0; i < flags.length; i++) {
        const flag = flags[i];
        if (flag !== '--offset') throw new Error(`Unknown envelopes flag: ${flag}`);
        offset = parseInteger(flags[i + 1], 'envelopes --offset');
        i += 1;
      }
      return { kind: 'envelopes', bytes: parseHex(args[1]), offset };
    }
    case 'profile': {
      const policyPath = args[1];
      const typeName = args[2];
      if (!policyPath || !typeName) throw new Error('profile requires <policy.yaml> <typeName>');
      return { kind: 'profile', policyPath, typeName };
    }
    case '--help':
    case '-h':
    case undefined:
      return { kind: 'help' };
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

export function describeHeader(bytes: Uint8Array): HeaderReport {
  if (bytes.length < TRANSACTION_HEADER_SIZE) {
    throw new Error(`message has ${bytes.length} bytes, a header needs ${TRANSACTION_HEADER_SIZE}`);
  }
  const header = readHeader(new Position(bytes, 0, TRANSACTION_HEADER_SIZE));
  return {
    txid: header.txid,
    atRestFlags: `0x${header.atRestFlags.toString(16).padStart(4, '0')}`,
    dynamicFlags: `0x${header.dynamicFlags.toString(16).padStart(2, '0')}`,
    magic: header.magic,
    ordinal: `0x${header.ordinal.toString(16)}`,
    flexible: isFlexible(header),
    epitaph: isEpitaph(header),
    problem: validateHeader(header) ?? null,
  };
}

/**
 * Reads the table header at `offset` and each envelope of the array that
 * follows it. Stops at the first malformed envelope and reports why.
 */
export function describeEnvelopes(bytes: Uint8Array, offset: number, inliningMask = DEFAULT_INLINING_MASK): EnvelopesReport {
  const config = createCodingConfig({ handles: new HandleTable(), profile: { inliningMask } });
  const decoder = new Decoder(config, { bytes, handles: [], handleMetadata: [] });
  if (offset + 16 > bytes.length) throw new Error(`no table header at offset ${offset}`);
  const tableHeader = new Position(bytes, offset, 16);
  const count = tableHeader.readUint64(0);
  const start = roundUpToAlign(offset + 16);
  const available = BigInt(Math.floor(Math.max(0, bytes.length - start) / ENVELOPE_SIZE));
  if (count > available) {
    return { count: Number(count), envelopes: [], error: `table claims ${count} envelopes, message holds ${available}` };
  }

  const envelopes: EnvelopeReport[] = [];
  for (let i = 0; i < Number(count); i++) {
    const at = new Position(bytes, start + i * ENVELOPE_SIZE, ENVELOPE_SIZE);
    const header = decodeEnvelopeHeader(decoder, at);
    if (!header) {
      return { count: Number(count), envelopes, error: `envelope ${i + 1}: ${decoder.error?.message ?? 'unreadable'}` };
    }
    const report: EnvelopeReport = {
      ordinal: i + 1,
      present: header.present,
      inline: header.inlined,
      numBytes: header.numBytes,
      numHandles: header.numHandles,
    };
    if (header.inlined) report.inlineBytes = toHex(at.viewBytes(0, 4));
    envelopes.push(report);
  }
  return { count: Number(count), envelopes, error: null };
}

export async function runCli(
  argv: string[] = process.argv.slice(2),
  out: (line: string) => void = console.log,
): Promise<void> {
  const { inliningMask, args } = parseGlobalArgs(argv);
  const spec = parseCommand(args);
  switch (spec.kind) {
    case 'help':
      printHelp(out);
      return;
    case 'header':
      out(JSON.stringify(describeHeader(spec.bytes), null, 2));
      return;
    case 'envelopes': {
      const report = describeEnvelopes(spec.bytes, spec.offset, inliningMask);
      out(JSON.stringify(report, null, 2));
      if (report.error) throw new Error(report.error);
      return;
    }
    case 'profile': {
      const resolved = loadCodingPolicy(spec.policyPath).resolve(spec.typeName);
      out(JSON.stringify(resolved, null, 2));
      return;
    }
  }
}

function isDirectRun(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  return import.meta.url === pathToFileURL(argv1).href;
}

if (isDirectRun()) {
  runCli().catch((err) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exit(1);
  });
}
