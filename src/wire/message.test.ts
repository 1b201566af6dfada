// src/wire/message.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { uint32 } from '../types/primitives.ts';
import { createHarness, decodeValue, encodeValue, hex } from '../test-support/harness.ts';
import {
  EPITAPH_ORDINAL,
  createEpitaph,
  createHeader,
  epitaphMessage,
  isEpitaph,
  isFlexible,
  messageType,
  validateHeader,
} from './message.ts';

const request = messageType(uint32);

describe('transaction header', () => {
  it('writes txid, flags, magic and ordinal in order before the body', () => {
    const { config } = createHarness();
    const encoded = encodeValue(config, request, {
      header: createHeader(0x1234n, { txid: 7, flexible: true }),
      body: 42,
    });
    assert.equal(
      hex(encoded.bytes),
      '07000000' + '0200' + '80' + '01' + '3412000000000000' + '2a000000' + '00000000',
    );
  });

  it('reads back what it wrote', () => {
    const { config } = createHarness();
    const header = createHeader(99n, { txid: 3 });
    const encoded = encodeValue(config, request, { header, body: 5 });
    const result = decodeValue(config, request, encoded);
    assert.deepEqual(result, { ok: true, value: { header, body: 5 } });
    assert.equal(result.ok && isFlexible(result.value.header), false);
  });

  it('rejects an unknown magic number', () => {
    const { config } = createHarness();
    const encoded = encodeValue(config, request, { header: createHeader(1n), body: 0 });
    encoded.bytes[7] = 2;
    assert.deepEqual(decodeValue(config, request, encoded), {
      ok: false,
      error: { code: 'VALIDATION', message: 'incompatible magic number' },
    });
  });

  it('rejects a message without the v2 wire format flag', () => {
    const { config } = createHarness();
    const encoded = encodeValue(config, request, { header: createHeader(1n), body: 0 });
    encoded.bytes[4] = 0;
    assert.deepEqual(decodeValue(config, request, encoded), {
      ok: false,
      error: { code: 'VALIDATION', message: 'unsupported wire format' },
    });
  });

  it('validates a header on its own', () => {
    assert.equal(validateHeader(createHeader(1n)), undefined);
    assert.equal(validateHeader({ ...createHeader(1n), magic: 0 }), 'incompatible magic number');
  });
});

describe('epitaph', () => {
  it('carries a status under the reserved ordinal', () => {
    const { config } = createHarness();
    const encoded = encodeValue(config, epitaphMessage, createEpitaph(-21));
    assert.equal(
      hex(encoded.bytes),
      '00000000' + '0200' + '00' + '01' + 'ffffffffffffffff' + 'ebffffff' + '00000000',
    );
    const result = decodeValue(config, epitaphMessage, encoded);
    assert.ok(result.ok);
    assert.equal(result.value.body, -21);
    assert.equal(isEpitaph(result.value.header), true);
    assert.equal(result.value.header.ordinal, EPITAPH_ORDINAL);
  });

  it('rejects non-zero padding after the status', () => {
    const { config } = createHarness();
    const encoded = encodeValue(config, epitaphMessage, createEpitaph(-1));
    encoded.bytes[20] = 1;
    assert.deepEqual(decodeValue(config, epitaphMessage, encoded), {
      ok: false,
      error: { code: 'VALIDATION', message: 'non-zero padding bytes' },
    });
  });
});
