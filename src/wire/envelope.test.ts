// src/wire/envelope.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { uint16, uint32, uint64 } from '../types/primitives.ts';
import { concatIovecs, createHarness, hex } from '../test-support/harness.ts';
import type { Harness } from '../test-support/harness.ts';
import { Decoder } from './decoder.ts';
import { Encoder } from './encoder.ts';
import type { EncoderOutputs } from './encoder.ts';
import {
  decodeEnvelope,
  decodeEnvelopeHeader,
  decodeUnknownEnvelope,
  encodeEnvelope,
  encodeUnknownEnvelope,
  skipUnknownEnvelope,
} from './envelope.ts';
import { RecursionDepth } from './recursion.ts';

function envelopeBytes(numBytes: number, numHandles: number, flags: number, payload: number[] = []): Uint8Array {
  const bytes = new Uint8Array(8 + payload.length);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, numBytes, true);
  view.setUint16(4, numHandles, true);
  view.setUint16(6, flags, true);
  bytes.set(payload, 8);
  return bytes;
}

function decoderFor(harness: Harness, bytes: Uint8Array, handles: number[] = []): Decoder {
  return new Decoder(harness.config, { bytes, handles, handleMetadata: [] });
}

function outputs(): EncoderOutputs {
  return { iovecs: [], iovecCapacity: 8, handles: [], handleMetadata: [], handleCapacity: 8, backing: new Uint8Array(256) };
}

describe('decodeEnvelopeHeader', () => {
  it('rejects every flags value other than 0 and the inlining mask', () => {
    const harness = createHarness();
    for (const flags of [2, 3, 0x10, 0x8000, 0xffff]) {
      for (const [numBytes, numHandles] of [[0, 0], [8, 0], [16, 3], [4, 1]] as const) {
        const decoder = decoderFor(harness, envelopeBytes(numBytes, numHandles, flags));
        const root = decoder.alloc(8);
        assert.ok(root);
        assert.equal(decodeEnvelopeHeader(decoder, root), undefined);
        assert.deepEqual(decoder.error, { code: 'INVALID_ENVELOPE', message: 'invalid inline bit' });
      }
    }
  });

  it('follows a configured inlining mask', () => {
    const harness = createHarness({ inliningMask: 2 });
    const decoder = decoderFor(harness, envelopeBytes(0, 0, 2, []));
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(decodeEnvelopeHeader(decoder, root)?.inlined, true);
  });

  it('rejects an unaligned out-of-line byte count', () => {
    const harness = createHarness();
    const decoder = decoderFor(harness, envelopeBytes(12, 0, 0));
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(decodeEnvelopeHeader(decoder, root), undefined);
    assert.deepEqual(decoder.error, { code: 'INVALID_ENVELOPE', message: 'invalid envelope byte count' });
  });

  it('treats an all-zero envelope as absent', () => {
    const harness = createHarness();
    const decoder = decoderFor(harness, envelopeBytes(0, 0, 0));
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.deepEqual(decodeEnvelopeHeader(decoder, root), {
      numBytes: 0,
      numHandles: 0,
      flags: 0,
      inlined: false,
      present: false,
    });
  });
});

describe('skipUnknownEnvelope', () => {
  it('steps over an out-of-line payload and closes its handles', () => {
    const harness = createHarness();
    const raw = harness.table.create('event');
    const decoder = decoderFor(harness, envelopeBytes(16, 1, 0, new Array<number>(16).fill(9)), [raw]);
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(skipUnknownEnvelope(decoder, root, RecursionDepth.initial()), true);
    assert.equal(decoder.currentLength, 24);
    assert.equal(decoder.currentHandleCount, 1);
    assert.equal(harness.table.closeCount(raw), 1);
  });

  it('ignores an inline payload', () => {
    const harness = createHarness();
    const bytes = envelopeBytes(0, 0, 1);
    bytes.set([0xde, 0xad, 0xbe, 0xef], 0);
    const decoder = decoderFor(harness, bytes);
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(skipUnknownEnvelope(decoder, root, RecursionDepth.initial()), true);
    assert.equal(decoder.currentLength, 8);
  });

  it('fails when the envelope claims more handles than remain', () => {
    const harness = createHarness();
    const raw = harness.table.create('event');
    const decoder = decoderFor(harness, envelopeBytes(0, 2, 0), [raw]);
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(skipUnknownEnvelope(decoder, root, RecursionDepth.initial()), false);
    assert.deepEqual(decoder.error, { code: 'OUT_OF_RANGE', message: 'message has too few handles' });
    assert.equal(harness.table.isOpen(raw), true);
  });

  it('charges depth for an out-of-line payload', () => {
    const harness = createHarness({ maxDepth: 0 });
    const decoder = decoderFor(harness, envelopeBytes(8, 0, 0, new Array<number>(8).fill(0)));
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(skipUnknownEnvelope(decoder, root, RecursionDepth.initial()), false);
    assert.equal(decoder.error?.code, 'RECURSION_DEPTH_EXCEEDED');
  });
});

describe('decodeEnvelope', () => {
  it('reads an inlined payload from the envelope itself', () => {
    const harness = createHarness();
    const bytes = envelopeBytes(0, 0, 1);
    bytes.set([0x2a, 0, 0, 0], 0);
    const decoder = decoderFor(harness, bytes);
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(decodeEnvelope(decoder, uint32, root, RecursionDepth.initial()), 42);
  });

  it('rejects an inlined payload that is too large to inline', () => {
    const harness = createHarness();
    const decoder = decoderFor(harness, envelopeBytes(0, 0, 1));
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(decodeEnvelope(decoder, uint64, root, RecursionDepth.initial()), undefined);
    assert.deepEqual(decoder.error, { code: 'INVALID_ENVELOPE', message: 'invalid inline bit' });
  });

  it('rejects a byte count that does not match the payload', () => {
    const harness = createHarness();
    const decoder = decoderFor(harness, envelopeBytes(16, 0, 0, new Array<number>(16).fill(0)));
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(decodeEnvelope(decoder, uint64, root, RecursionDepth.initial()), undefined);
    assert.deepEqual(decoder.error, { code: 'INVALID_ENVELOPE', message: 'invalid envelope byte count' });
  });

  it('rejects a handle count that does not match the payload', () => {
    const harness = createHarness();
    const raw = harness.table.create('event');
    const decoder = decoderFor(harness, envelopeBytes(8, 1, 0, new Array<number>(8).fill(0)), [raw]);
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(decodeEnvelope(decoder, uint64, root, RecursionDepth.initial()), undefined);
    assert.deepEqual(decoder.error, { code: 'INVALID_ENVELOPE', message: 'invalid envelope handle count' });
  });

  it('returns null for an absent envelope', () => {
    const harness = createHarness();
    const decoder = decoderFor(harness, envelopeBytes(0, 0, 0));
    const root = decoder.alloc(8);
    assert.ok(root);
    assert.equal(decodeEnvelope(decoder, uint64, root, RecursionDepth.initial()), null);
  });
});

describe('encodeEnvelope', () => {
  it('inlines payloads of four bytes or less', () => {
    const harness = createHarness();
    const out = outputs();
    const encoder = new Encoder(harness.config, out);
    const root = encoder.alloc(8);
    assert.ok(root);
    encodeEnvelope(encoder, uint16, 0xbeef, root, RecursionDepth.initial());
    assert.equal(encoder.finish().ok, true);
    assert.equal(hex(concatIovecs(out.iovecs)), 'efbe000000000100');
  });

  it('back-fills the header of an out-of-line payload', () => {
    const harness = createHarness();
    const out = outputs();
    const encoder = new Encoder(harness.config, out);
    const root = encoder.alloc(8);
    assert.ok(root);
    encodeEnvelope(encoder, uint64, 7n, root, RecursionDepth.initial());
    assert.deepEqual(encoder.finish(), { ok: true, byteCount: 16, iovecCount: 1, handleCount: 0 });
    assert.equal(hex(concatIovecs(out.iovecs)), '0800000000000000' + '0700000000000000');
  });

  it('writes an absent envelope for null', () => {
    const harness = createHarness();
    const out = outputs();
    const encoder = new Encoder(harness.config, out);
    const root = encoder.alloc(8);
    assert.ok(root);
    encodeEnvelope(encoder, uint64, null, root, RecursionDepth.initial());
    assert.equal(hex(concatIovecs(out.iovecs)), '0000000000000000');
  });
});

describe('unknown envelope preservation', () => {
  it('re-encodes preserved bytes and handles unchanged', () => {
    const harness = createHarness();
    const raw = harness.table.create('event');
    const payload = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16];
    const original = envelopeBytes(16, 1, 0, payload);
    const decoder = decoderFor(harness, original, [raw]);
    const root = decoder.alloc(8);
    assert.ok(root);
    const data = decodeUnknownEnvelope(decoder, root, RecursionDepth.initial());
    assert.ok(data);
    assert.equal(data.inlined, false);
    assert.deepEqual([...data.bytes], payload);
    assert.equal(data.handles[0]?.value, raw);

    const out = outputs();
    const encoder = new Encoder(harness.config, out);
    const target = encoder.alloc(8);
    assert.ok(target);
    encodeUnknownEnvelope(encoder, data, target, RecursionDepth.initial());
    assert.equal(encoder.finish().ok, true);
    assert.equal(hex(concatIovecs(out.iovecs)), hex(original));
    assert.deepEqual(out.handles, [raw]);
    assert.equal(data.handles[0]?.isValid, false);
  });

  it('keeps an inlined payload inline', () => {
    const harness = createHarness();
    const original = envelopeBytes(0, 0, 1);
    original.set([9, 8, 7, 6], 0);
    const decoder = decoderFor(harness, original);
    const root = decoder.alloc(8);
    assert.ok(root);
    const data = decodeUnknownEnvelope(decoder, root, RecursionDepth.initial());
    assert.ok(data);
    assert.equal(data.inlined, true);

    const out = outputs();
    const encoder = new Encoder(harness.config, out);
    const target = encoder.alloc(8);
    assert.ok(target);
    encodeUnknownEnvelope(encoder, data, target, RecursionDepth.initial());
    assert.equal(hex(concatIovecs(out.iovecs)), '0908070600000100');
  });
});
