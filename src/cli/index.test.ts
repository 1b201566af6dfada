// src/cli/index.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as path from 'node:path';
import * as url from 'node:url';
import {
  HELP_TEXT,
  describeEnvelopes,
  describeHeader,
  parseCommand,
  parseGlobalArgs,
  parseHex,
  runCli,
} from './index.ts';

const DIR = path.dirname(url.fileURLToPath(import.meta.url));
const POLICY = path.join(DIR, '..', 'config', 'fixtures', 'policy-valid.yaml');

const HEADER_HEX = '07000000' + '0200' + '80' + '01' + '3412000000000000';
const TABLE_HEX =
  '0200000000000000' + 'ffffffffffffffff'
  + '0500000000000100'
  + '0800000000000000'
  + '0000000000000000';

function collect(): { lines: string[]; out: (line: string) => void } {
  const lines: string[] = [];
  return { lines, out: (line) => lines.push(line) };
}

describe('cli/index', () => {
  it('parseGlobalArgs extracts --inlining-mask and preserves remaining args', () => {
    const parsed = parseGlobalArgs(['--inlining-mask', '2', 'envelopes', '00']);
    assert.equal(parsed.inliningMask, 2);
    assert.deepEqual(parsed.args, ['envelopes', '00']);
  });

  it('parseGlobalArgs rejects a missing mask value', () => {
    assert.throws(() => parseGlobalArgs(['--inlining-mask']), /--inlining-mask requires a numeric value/);
  });

  it('parseCommand reads the envelopes offset', () => {
    assert.deepEqual(parseCommand(['envelopes', '0x00ff', '--offset', '8']), {
      kind: 'envelopes',
      bytes: new Uint8Array([0, 255]),
      offset: 8,
    });
  });

  it('parseCommand falls back to help and rejects unknown commands', () => {
    assert.deepEqual(parseCommand([]), { kind: 'help' });
    assert.throws(() => parseCommand(['frob']), /Unknown command: frob/);
    assert.throws(() => parseCommand(['profile', 'only-a-path']), /profile requires <policy.yaml> <typeName>/);
  });

  it('parseHex ignores whitespace and rejects odd digit counts', () => {
    assert.deepEqual(parseHex('de ad\nbe ef'), new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
    assert.throws(() => parseHex('abc'), /even number of hex digits/);
    assert.throws(() => parseHex('zz'), /even number of hex digits/);
  });

  it('describeHeader decodes every header field', () => {
    assert.deepEqual(describeHeader(parseHex(HEADER_HEX)), {
      txid: 7,
      atRestFlags: '0x0002',
      dynamicFlags: '0x80',
      magic: 1,
      ordinal: '0x1234',
      flexible: true,
      epitaph: false,
      problem: null,
    });
  });

  it('describeHeader reports an incompatible magic number', () => {
    const bytes = parseHex(HEADER_HEX);
    bytes[7] = 9;
    assert.equal(describeHeader(bytes).problem, 'incompatible magic number');
    assert.throws(() => describeHeader(new Uint8Array(4)), /message has 4 bytes, a header needs 16/);
  });

  it('describeEnvelopes lists inline and out-of-line envelopes', () => {
    assert.deepEqual(describeEnvelopes(parseHex(TABLE_HEX), 0), {
      count: 2,
      envelopes: [
        { ordinal: 1, present: true, inline: true, numBytes: 5, numHandles: 0, inlineBytes: '05000000' },
        { ordinal: 2, present: true, inline: false, numBytes: 8, numHandles: 0 },
      ],
      error: null,
    });
  });

  it('describeEnvelopes stops at a malformed envelope', () => {
    const bytes = parseHex(TABLE_HEX);
    bytes[22] = 2;
    const report = describeEnvelopes(bytes, 0);
    assert.equal(report.error, 'envelope 1: invalid inline bit');
    assert.deepEqual(report.envelopes, []);
    assert.equal(describeEnvelopes(bytes, 0, 2).error, null);
  });

  it('describeEnvelopes refuses a count the message cannot hold', () => {
    const bytes = parseHex(TABLE_HEX);
    bytes[0] = 9;
    assert.equal(describeEnvelopes(bytes, 0).error, 'table claims 9 envelopes, message holds 3');
  });

  it('runCli prints help', async () => {
    const { lines, out } = collect();
    await runCli([], out);
    assert.deepEqual(lines, [HELP_TEXT]);
  });

  it('runCli prints the header report as JSON', async () => {
    const { lines, out } = collect();
    await runCli(['header', HEADER_HEX], out);
    assert.equal(lines.length, 1);
    assert.equal(JSON.parse(lines[0] ?? '').ordinal, '0x1234');
  });

  it('runCli resolves a profile from a policy file', async () => {
    const { lines, out } = collect();
    await runCli(['profile', POLICY, 'example.tree.Node'], out);
    assert.deepEqual(JSON.parse(lines[0] ?? ''), {
      name: 'deep-trees',
      profile: { maxDepth: 64, inliningMask: 1 },
    });
  });

  it('runCli fails after printing a report with an error', async () => {
    const bytes = parseHex(TABLE_HEX);
    bytes[22] = 2;
    const { lines, out } = collect();
    await assert.rejects(
      runCli(['envelopes', Buffer.from(bytes).toString('hex')], out),
      /envelope 1: invalid inline bit/,
    );
    assert.equal(lines.length, 1);
  });
});
