// src/framers/handshake-protocol.ts
import { CONTROL_BYTES, TERMINATOR } from '../constants/constants.js';
import {
  GaugeConnectionError,
  GaugeTimeoutError,
  GaugeUnknownResponseError,
  GaugeWrongCommandError,
  type ProtocolFault,
} from '../errors.js';
import { NOOP_LOGGER } from '../logger.js';
import type {
  HandshakeOutcome,
  HandshakeState,
  LoggerInstance,
  Result,
} from '../types/gauge-types.js';
import { asciiToBytes, bytesToAscii, concatUint8Arrays, toHex, trimTrailing } from '../utils/utils.js';
import type { LineFramer } from './line-framer.js';

const ENQ_FRAME = new Uint8Array([CONTROL_BYTES.ENQ]);

/**
 * ACK/NAK + ENQ exchange wrapped around every command that returns data.
 *
 *   SENT ──timeout──────────────▶ TIMED_OUT
 *     ├──NAK────────────────────▶ REJECTED
 *     ├──other──────────────────▶ UNKNOWN_ACK
 *     └──ACK──▶ AWAIT_PAYLOAD ──timeout/fault──▶ PAYLOAD_FAILED
 *                     └──line──▶ COMPLETE
 *
 * Send failures and faults while reading the handshake itself propagate as
 * GaugeConnectionError. One exchange at a time: the caller holds the lock.
 *
 * An exchange that ends before its reply was fully read leaves the line
 * unsettled; the next exchange drops whatever arrived in between before
 * sending.
 */
export class HandshakeProtocol {
  private _state: HandshakeState = 'SENT';
  private _unsettled: boolean = false;

  constructor(
    private _framer: LineFramer,
    private _logger: LoggerInstance = NOOP_LOGGER
  ) {}

  public async exchange(command: string): Promise<HandshakeOutcome> {
    const startTime = Date.now();
    if (this._unsettled) {
      await this._framer.reset();
      this._unsettled = false;
      this._logger.debug('Cleared late reply of the previous exchange', { command });
    }
    this._state = 'SENT';
    this._unsettled = true;

    await this._framer.send(concatUint8Arrays([asciiToBytes(command), TERMINATOR]));
    this._logger.debug('Command sent', { command });

    let handshake: Uint8Array;
    try {
      handshake = trimTrailing(await this._framer.readLine());
    } catch (err: unknown) {
      if (err instanceof GaugeTimeoutError) {
        this._logger.warn('Timeout waiting for acknowledgment', { command });
        return this._finish({ state: 'TIMED_OUT' });
      }
      throw err;
    }
    this._logger.debug('Acknowledgment received', { command, hex: toHex(handshake) });

    if (handshake.length !== 1 || handshake[0] !== CONTROL_BYTES.ACK) {
      if (handshake.length === 1 && handshake[0] === CONTROL_BYTES.NAK) {
        this._logger.error('Received NAK: wrong command', { command });
        return this._finish({ state: 'REJECTED', raw: handshake });
      }
      this._logger.error('Unknown acknowledgment', { command, hex: toHex(handshake) });
      return this._finish({ state: 'UNKNOWN_ACK', raw: handshake });
    }

    this._state = 'AWAIT_PAYLOAD';
    try {
      await this._framer.send(ENQ_FRAME);
      const line = await this._framer.readLine();
      const payload = bytesToAscii(line).trim();
      this._logger.debug('Payload received', {
        command,
        payload,
        responseTime: Date.now() - startTime,
      });
      return this._finish({ state: 'COMPLETE', payload });
    } catch (err: unknown) {
      if (err instanceof GaugeTimeoutError || err instanceof GaugeConnectionError) {
        this._logger.warn(`Payload read failed: ${err.message}`, { command });
        return this._finish({ state: 'PAYLOAD_FAILED', reason: err });
      }
      throw err;
    }
  }

  /** State the last exchange ended in */
  public get state(): HandshakeState {
    return this._state;
  }

  private _finish(outcome: HandshakeOutcome): HandshakeOutcome {
    this._state = outcome.state;
    this._unsettled = outcome.state !== 'COMPLETE' && outcome.state !== 'REJECTED';
    return outcome;
  }
}

/**
 * Splits an outcome into the two result channels: faults that must reach the
 * caller, and `null` for a reading that is simply absent this time.
 */
export function resolveOutcome(
  outcome: HandshakeOutcome,
  command: string
): Result<string | null, ProtocolFault> {
  switch (outcome.state) {
    case 'COMPLETE':
      return { ok: true, value: outcome.payload };
    case 'TIMED_OUT':
    case 'PAYLOAD_FAILED':
      return { ok: true, value: null };
    case 'REJECTED':
      return { ok: false, error: new GaugeWrongCommandError(command) };
    case 'UNKNOWN_ACK':
      return { ok: false, error: new GaugeUnknownResponseError(outcome.raw) };
  }
}
