import { describe, it, expect } from 'vitest';
import { HandshakeProtocol, resolveOutcome } from '../src/framers/handshake-protocol.js';
import { LineFramer } from '../src/framers/line-framer.js';
import {
  GaugeNotConnectedError,
  GaugeTimeoutError,
  GaugeUnknownResponseError,
  GaugeWrongCommandError,
} from '../src/errors.js';
import { ACK, FakeTransport, NAK } from './helpers/fake-transport.js';

function setup(transport: FakeTransport): HandshakeProtocol {
  return new HandshakeProtocol(new LineFramer(transport, { timeout: 50 }));
}

describe('HandshakeProtocol', () => {
  it('sends the command, answers ACK with ENQ and returns the payload', async () => {
    const transport = new FakeTransport().feed(ACK, 'PR1,7.5e-3\r\n');
    const protocol = setup(transport);

    const outcome = await protocol.exchange('PR1');

    expect(outcome).toEqual({ state: 'COMPLETE', payload: 'PR1,7.5e-3' });
    expect(transport.writtenText).toEqual(['PR1\r\n', '\x05']);
    expect(protocol.state).toBe('COMPLETE');
  });

  it('reads a payload that arrives in the same chunk as the ACK', async () => {
    const transport = new FakeTransport().feed('\x06\r\n3\r\n');
    expect(await setup(transport).exchange('UNI')).toEqual({ state: 'COMPLETE', payload: '3' });
  });

  it('ends in REJECTED on NAK and never sends ENQ', async () => {
    const transport = new FakeTransport().feed(NAK);
    const outcome = await setup(transport).exchange('XYZ');

    expect(outcome).toEqual({ state: 'REJECTED', raw: new Uint8Array([0x15]) });
    expect(transport.writtenText).toEqual(['XYZ\r\n']);
  });

  it('ends in UNKNOWN_ACK on any other handshake', async () => {
    const transport = new FakeTransport().feed([0x99, 0x0d, 0x0a]);
    const outcome = await setup(transport).exchange('PR1');

    expect(outcome).toEqual({ state: 'UNKNOWN_ACK', raw: new Uint8Array([0x99]) });
    expect(transport.written).toHaveLength(1);
  });

  it('ends in TIMED_OUT when no handshake arrives', async () => {
    const protocol = setup(new FakeTransport());
    expect(await protocol.exchange('TMP')).toEqual({ state: 'TIMED_OUT' });
    expect(protocol.state).toBe('TIMED_OUT');
  });

  it('ends in PAYLOAD_FAILED when the payload never arrives', async () => {
    const outcome = await setup(new FakeTransport().feed(ACK)).exchange('TMP');

    expect(outcome.state).toBe('PAYLOAD_FAILED');
    if (outcome.state === 'PAYLOAD_FAILED') {
      expect(outcome.reason).toBeInstanceOf(GaugeTimeoutError);
    }
  });

  it('ends in PAYLOAD_FAILED when the peer closes after ACK', async () => {
    const transport = new FakeTransport().feed(ACK);
    transport.close();
    expect((await setup(transport).exchange('AYT')).state).toBe('PAYLOAD_FAILED');
  });

  it('drops a late reply before sending the next command', async () => {
    const transport = new FakeTransport();
    const protocol = setup(transport);
    expect((await protocol.exchange('PR1')).state).toBe('TIMED_OUT');

    transport.feed(ACK, '0,1.0000E-03\r\n');
    transport.replyOnWrite('PR2\r\n', ACK, '0,5.0000E-01\r\n');

    expect(await protocol.exchange('PR2')).toEqual({ state: 'COMPLETE', payload: '0,5.0000E-01' });
    expect(transport.flushCalls).toBe(1);
    expect(transport.writtenText).toEqual(['PR1\r\n', 'PR2\r\n', '\x05']);
  });

  it('drops a partial payload left by a failed exchange', async () => {
    const transport = new FakeTransport().feed(ACK, '0,1.0');
    const protocol = setup(transport);
    expect((await protocol.exchange('PR1')).state).toBe('PAYLOAD_FAILED');

    transport.replyOnWrite('TMP\r\n', ACK, '25\r\n');

    expect(await protocol.exchange('TMP')).toEqual({ state: 'COMPLETE', payload: '25' });
  });

  it('keeps queued replies after complete and rejected exchanges', async () => {
    const transport = new FakeTransport().feed(ACK, '1\r\n', NAK, ACK, '3\r\n');
    const protocol = setup(transport);

    expect(await protocol.exchange('UNI')).toEqual({ state: 'COMPLETE', payload: '1' });
    expect((await protocol.exchange('XYZ')).state).toBe('REJECTED');
    expect(await protocol.exchange('UNI')).toEqual({ state: 'COMPLETE', payload: '3' });
    expect(transport.flushCalls).toBe(0);
  });

  it('propagates a failed command write', async () => {
    await expect(setup(new FakeTransport({ open: false })).exchange('PR1')).rejects.toBeInstanceOf(
      GaugeNotConnectedError
    );
  });
});

describe('resolveOutcome()', () => {
  it('passes a payload through', () => {
    expect(resolveOutcome({ state: 'COMPLETE', payload: '25' }, 'TMP')).toEqual({
      ok: true,
      value: '25',
    });
  });

  it('maps silence to an absent value', () => {
    expect(resolveOutcome({ state: 'TIMED_OUT' }, 'TMP')).toEqual({ ok: true, value: null });
    expect(
      resolveOutcome({ state: 'PAYLOAD_FAILED', reason: new GaugeTimeoutError() }, 'TMP')
    ).toEqual({ ok: true, value: null });
  });

  it('maps NAK to GaugeWrongCommandError', () => {
    const result = resolveOutcome({ state: 'REJECTED', raw: new Uint8Array([0x15]) }, 'PR9');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(GaugeWrongCommandError);
      expect(result.error.message).toBe('Controller rejected command "PR9" (NAK)');
    }
  });

  it('maps an unknown handshake to GaugeUnknownResponseError with the raw bytes', () => {
    const result = resolveOutcome({ state: 'UNKNOWN_ACK', raw: new Uint8Array([0x99]) }, 'PR1');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(GaugeUnknownResponseError);
      expect(result.error.message).toBe('Unknown handshake response: 0x99');
    }
  });
});
