// src/channel/endpoint.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { OwnedHandle, Rights } from '../wire/index.ts';
import { handle, string, struct, uint32, uint8 } from '../types/index.ts';
import { createHarness } from '../test-support/harness.ts';
import { createChannelPair } from './channel.ts';
import { MessageEndpoint } from './endpoint.ts';

function connected(firstTxid?: number) {
  const harness = createHarness();
  const [leftEnd, rightEnd] = createChannelPair(harness.table);
  const warnings: string[] = [];
  const warn = (msg: string) => {
    warnings.push(msg);
  };
  const left = new MessageEndpoint(leftEnd, { config: harness.config, warn, firstTxid });
  const right = new MessageEndpoint(rightEnd, { config: harness.config, warn });
  return { ...harness, leftEnd, rightEnd, left, right, warnings };
}

describe('MessageEndpoint', () => {
  it('sends a header and body that the peer decodes', () => {
    const { left, right } = connected();
    assert.strictEqual(left.send(5n, uint32, 42), 1);
    assert.strictEqual(left.send(6n, uint32, 43, { flexible: true }), 2);

    assert.deepStrictEqual(right.receive(uint32), {
      header: { txid: 1, atRestFlags: 2, dynamicFlags: 0, magic: 1, ordinal: 5n },
      body: 42,
    });
    assert.strictEqual(right.receive(uint32)?.header.dynamicFlags, 0x80);
    assert.strictEqual(right.receive(uint32), null);
  });

  it('moves handles across with the message', () => {
    const { left, right, table } = connected();
    const raw = table.create('event');
    const owned = new OwnedHandle(raw, table);
    const body = struct({ h: handle({ objectType: 'event' }) });
    left.send(1n, body, { h: owned }, { txid: 77 });
    assert.strictEqual(owned.isValid, false);

    const message = right.receive(body);
    assert.ok(message);
    assert.strictEqual(message.header.txid, 77);
    assert.strictEqual(message.body.h.value, raw);
    assert.strictEqual(table.isOpen(raw), true);
  });

  it('throws without writing when the body cannot be encoded', () => {
    const { left, rightEnd } = connected();
    assert.throws(() => left.send(1n, uint8, 300), {
      name: 'WireError',
      code: 'VALIDATION',
      message: 'VALIDATION: integer out of range: 300',
    });
    assert.strictEqual(rightEnd.pending, 0);
  });

  it('answers an undecodable message with an epitaph and closes', () => {
    const { left, right, rightEnd, warnings } = connected();
    left.send(1n, string(), 'hi');

    assert.throws(() => right.receive(uint32), { name: 'WireError', code: 'EXTRA_BYTES' });
    assert.deepStrictEqual(warnings, ['[channel] closing after undecodable message: not all bytes consumed']);
    assert.strictEqual(rightEnd.isClosed, true);

    assert.strictEqual(left.receive(uint32), null);
    assert.strictEqual(left.peerEpitaph, -21);
    assert.throws(() => left.receive(uint32), { name: 'ChannelError', code: 'PEER_CLOSED' });
  });

  it('closes the handles of a message it rejects', () => {
    const { left, right, table } = connected();
    const raw = table.create('event');
    left.send(1n, struct({ h: handle() }), { h: new OwnedHandle(raw, table) });

    assert.throws(() => right.receive(uint32), { code: 'EXTRA_HANDLES' });
    assert.strictEqual(table.closeCount(raw), 1);
  });

  it('only sends one epitaph', () => {
    const { left, right } = connected();
    right.closeWithEpitaph(-14);
    right.closeWithEpitaph(-21);
    assert.strictEqual(left.receive(uint32), null);
    assert.strictEqual(left.peerEpitaph, -14);
  });

  it('refuses a handle sent under a type it does not have', () => {
    const { left, rightEnd, table } = connected();
    const raw = table.create('event', Rights.TRANSFER);
    const body = struct({ h: handle({ objectType: 'channel' }) });
    assert.throws(() => left.send(1n, body, { h: new OwnedHandle(raw, table) }), {
      name: 'ChannelError',
      code: 'BAD_HANDLE',
      message: `BAD_HANDLE: handle ${raw} is event, not channel`,
    });
    assert.strictEqual(table.isOpen(raw), false);
    assert.strictEqual(rightEnd.pending, 0);
  });

  it('checks received handles against what the table holds', () => {
    const { left, right, table } = connected();
    const raw = table.create('event', Rights.TRANSFER);
    left.send(1n, struct({ h: handle() }), { h: new OwnedHandle(raw, table) });

    const expected = struct({ h: handle({ objectType: 'channel', rights: Rights.READ | Rights.WRITE }) });
    assert.throws(() => right.receive(expected), {
      name: 'WireError',
      code: 'VALIDATION',
      message: 'VALIDATION: incorrect handle subtype: expected channel, received event',
    });
    assert.strictEqual(table.closeCount(raw), 1);
  });

  it('rejects a received handle lacking the expected rights', () => {
    const { left, right, table } = connected();
    const raw = table.create('event', Rights.TRANSFER);
    left.send(1n, struct({ h: handle() }), { h: new OwnedHandle(raw, table) });

    const expected = struct({ h: handle({ objectType: 'event', rights: Rights.READ }) });
    assert.throws(() => right.receive(expected), {
      code: 'VALIDATION',
      message: 'VALIDATION: handle is missing expected rights: 0x4',
    });
    assert.strictEqual(table.isOpen(raw), false);
  });

  it('delivers handles reduced to the rights the sender declared', () => {
    const { left, right, table } = connected();
    const raw = table.create('vmo', Rights.TRANSFER | Rights.READ | Rights.WRITE);
    const body = struct({ h: handle({ objectType: 'vmo', rights: Rights.TRANSFER | Rights.READ }) });
    left.send(1n, body, { h: new OwnedHandle(raw, table) });
    assert.strictEqual(table.isOpen(raw), false);

    const message = right.receive(body);
    assert.ok(message);
    assert.deepStrictEqual(table.metadata(message.body.h.value), {
      objectType: 'vmo',
      rights: Rights.TRANSFER | Rights.READ,
    });
  });

  it('closes after a malformed epitaph', () => {
    const { leftEnd, right, rightEnd, warnings } = connected();
    const bytes = new Uint8Array(16);
    bytes[4] = 0x02;
    bytes[7] = 1;
    bytes.fill(0xff, 8);
    leftEnd.write([bytes], [], []);

    assert.throws(() => right.receive(uint32), { name: 'WireError', code: 'OUT_OF_RANGE' });
    assert.deepStrictEqual(warnings, ['[channel] closing after malformed epitaph: message is too short']);
    assert.strictEqual(rightEnd.isClosed, true);
  });

  it('wraps transaction ids past 32 bits and never uses zero', () => {
    const { left, right } = connected(0xffff_ffff);
    assert.strictEqual(left.send(1n, uint32, 1), 0xffff_ffff);
    assert.strictEqual(left.send(1n, uint32, 2), 1);
    assert.strictEqual(right.receive(uint32)?.header.txid, 0xffff_ffff);
    assert.strictEqual(right.receive(uint32)?.header.txid, 1);
  });

  it('rejects a first transaction id outside 1..0xffffffff', () => {
    const { leftEnd, config } = connected();
    assert.throws(() => new MessageEndpoint(leftEnd, { config, firstTxid: 0 }), RangeError);
  });
});
