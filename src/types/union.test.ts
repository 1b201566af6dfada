// src/types/union.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createHarness, decodeValue, encodeValue, hex, tryEncode } from '../test-support/harness.ts';
import { uint32 } from './primitives.ts';
import { string } from './string.ts';
import { struct } from './struct.ts';
import { union } from './union.ts';

const members = {
  num: { ordinal: 1, type: uint32 },
  text: { ordinal: 2, type: string() },
};
const strict = union(members);
const flexible = union(members, { flexible: true });

function fromHex(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'hex'));
}

describe('union', () => {
  it('writes the ordinal followed by an inlined envelope', () => {
    const { config } = createHarness();
    const encoded = encodeValue(config, strict, { tag: 'num', value: 7 });
    assert.equal(hex(encoded.bytes), '0100000000000000' + '0700000000000100');
    assert.deepEqual(decodeValue(config, strict, encoded), { ok: true, value: { tag: 'num', value: 7 } });
  });

  it('puts larger variants out of line', () => {
    const { config } = createHarness();
    const encoded = encodeValue(config, strict, { tag: 'text', value: 'hi' });
    assert.equal(
      hex(encoded.bytes),
      '0200000000000000' + '1800000000000000'
        + '0200000000000000' + 'ffffffffffffffff' + '6869000000000000',
    );
  });

  it('rejects ordinals a strict union does not know', () => {
    const { config } = createHarness();
    const bytes = fromHex('0300000000000000' + '0900000000000100');
    assert.deepEqual(decodeValue(config, strict, { bytes }), {
      ok: false,
      error: { code: 'VALIDATION', message: 'unknown union ordinal: 3' },
    });
  });

  it('keeps an unknown variant of a flexible union and re-encodes it', () => {
    const { config } = createHarness();
    const bytes = fromHex('0300000000000000' + '0900000000000100');
    const decoded = decodeValue(config, flexible, { bytes });
    assert.ok(decoded.ok);
    const value = decoded.value;
    assert.equal(value.tag, '$unknown');
    assert.equal(value.tag === '$unknown' && value.ordinal, 3n);
    assert.equal(hex(encodeValue(config, flexible, value).bytes), hex(bytes));
  });

  it('refuses to encode an unknown variant through a strict union', () => {
    const { config } = createHarness();
    const data = { bytes: new Uint8Array([9, 0, 0, 0]), handles: [], inlined: true };
    const result = tryEncode(config, strict, { tag: '$unknown', ordinal: 3n, data });
    assert.deepEqual(result.ok ? undefined : result.error, {
      code: 'VALIDATION',
      message: 'unknown union ordinal: 3',
    });
  });

  it('treats ordinal zero as absent', () => {
    const { config } = createHarness();
    const holder = struct({ u: union(members, { nullable: true }) });
    const encoded = encodeValue(config, holder, { u: null });
    assert.equal(hex(encoded.bytes), '00'.repeat(16));
    assert.deepEqual(decodeValue(config, holder, encoded), { ok: true, value: { u: null } });
    assert.deepEqual(decodeValue(config, strict, encoded), {
      ok: false,
      error: { code: 'VALIDATION', message: 'non-nullable value is absent' },
    });
  });

  it('rejects ordinal zero with a non-empty envelope', () => {
    const { config } = createHarness();
    const bytes = fromHex('0000000000000000' + '0000000000000100');
    assert.deepEqual(decodeValue(config, union(members, { nullable: true }), { bytes }), {
      ok: false,
      error: { code: 'INVALID_ENVELOPE', message: 'invalid presence indicator' },
    });
  });

  it('rejects a known ordinal with an empty envelope', () => {
    const { config } = createHarness();
    const bytes = fromHex('0100000000000000' + '0000000000000000');
    assert.deepEqual(decodeValue(config, strict, { bytes }), {
      ok: false,
      error: { code: 'VALIDATION', message: 'non-nullable value is absent' },
    });
  });
});
