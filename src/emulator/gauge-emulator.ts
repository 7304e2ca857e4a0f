// src/emulator/gauge-emulator.ts

import {
  CONTROL_BYTES,
  MAX_UNIT_CODE,
  MIN_UNIT_CODE,
  TERMINATOR,
} from '../constants/constants.js';
import { GaugeNotConnectedError, GaugeTimeoutError } from '../errors.js';
import { NOOP_LOGGER } from '../logger.js';
import type {
  DeviceIdentity,
  GaugeEmulatorOptions,
  LoggerInstance,
  Transport,
} from '../types/gauge-types.js';
import {
  asciiToBytes,
  bytesToAscii,
  concatUint8Arrays,
  indexOfSequence,
  sliceUint8Array,
} from '../utils/utils.js';

const ACK_LINE = new Uint8Array([CONTROL_BYTES.ACK, ...TERMINATOR]);
const NAK_LINE = new Uint8Array([CONTROL_BYTES.NAK, ...TERMINATOR]);

/**
 * Formats like the controller: `7.5000E-03`
 */
export function formatPressure(value: number): string {
  const [mantissa = '0', exponent = '0'] = value.toExponential(4).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  const digits = exponent.replace(/^[+-]/, '').padStart(2, '0');
  return `${mantissa}E${sign}${digits}`;
}

/**
 * In-process controller. Answers `PRn`, `TMP`, `UNI`, `UNI,n` and `AYT` with
 * ACK and, after ENQ, the payload line. Anything else gets NAK.
 */
class GaugeEmulator implements Transport {
  public isOpen: boolean = false;
  /** Every command line received, without terminator */
  public readonly received: string[] = [];

  private pressures: number[];
  private temperature: number;
  private unit: number;
  private identity: Omit<DeviceIdentity, 'gaugeCount'>;
  private logger: LoggerInstance;

  private inputBuffer: Uint8Array = new Uint8Array(0);
  private outputBuffer: Uint8Array = new Uint8Array(0);
  private pendingPayload: string | null = null;
  private silentCommands: number = 0;
  private handshakeOverride: Uint8Array | null = null;

  constructor(options: GaugeEmulatorOptions = {}) {
    this.pressures = [...(options.pressures ?? [1.0e-3, 2.5e-2])];
    this.temperature = options.temperature ?? 25;
    this.unit = options.unit ?? 0;
    this.identity = options.identity ?? {
      type: `VGC50${this.pressures.length}`,
      model: '398-481',
      serialNumber: 44001,
      firmwareVersion: '1.06',
      hardwareVersion: '1.00',
    };
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async connect(): Promise<void> {
    this.isOpen = true;
    this.inputBuffer = new Uint8Array(0);
    this.outputBuffer = new Uint8Array(0);
    this.pendingPayload = null;
    this.logger.info('Emulator connected');
  }

  async disconnect(): Promise<void> {
    this.isOpen = false;
    this.logger.info('Emulator disconnected');
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this.isOpen) throw new GaugeNotConnectedError();
    this.inputBuffer = concatUint8Arrays([this.inputBuffer, buffer]);
    this._processInput();
  }

  async read(maxBytes: number, timeout: number = 1000): Promise<Uint8Array> {
    if (!this.isOpen) throw new GaugeNotConnectedError();
    if (this.outputBuffer.length === 0) {
      await new Promise<void>(resolve => setTimeout(resolve, timeout));
      if (this.outputBuffer.length === 0) throw new GaugeTimeoutError('Read timeout');
    }
    const length = Math.min(Math.max(1, maxBytes), this.outputBuffer.length);
    const data = sliceUint8Array(this.outputBuffer, 0, length);
    this.outputBuffer = sliceUint8Array(this.outputBuffer, length);
    return data;
  }

  async flush(): Promise<void> {
    this.outputBuffer = new Uint8Array(0);
  }

  setPressure(gauge: number, value: number): void {
    if (!Number.isInteger(gauge) || gauge < 1 || gauge > this.pressures.length) {
      throw new RangeError(`No gauge ${gauge} on this emulator`);
    }
    this.pressures[gauge - 1] = value;
  }

  setTemperature(value: number): void {
    this.temperature = value;
  }

  getUnit(): number {
    return this.unit;
  }

  /** Leaves the next `count` commands unanswered */
  silence(count: number = 1): void {
    this.silentCommands = count;
  }

  /** Replaces the handshake line of the next command */
  respondWith(handshake: Uint8Array): void {
    this.handshakeOverride = handshake;
  }

  private _processInput(): void {
    while (this.inputBuffer.length > 0) {
      if (this.inputBuffer[0] === CONTROL_BYTES.ENQ) {
        this.inputBuffer = sliceUint8Array(this.inputBuffer, 1);
        this._handleEnquiry();
        continue;
      }
      const idx = indexOfSequence(this.inputBuffer, TERMINATOR);
      if (idx === -1) return;
      const line = bytesToAscii(sliceUint8Array(this.inputBuffer, 0, idx));
      this.inputBuffer = sliceUint8Array(this.inputBuffer, idx + TERMINATOR.length);
      this._handleCommand(line);
    }
  }

  private _handleEnquiry(): void {
    if (this.pendingPayload === null) {
      this.logger.warn('ENQ without pending payload');
      return;
    }
    this._queue(asciiToBytes(this.pendingPayload), TERMINATOR);
    this.pendingPayload = null;
  }

  private _handleCommand(command: string): void {
    this.received.push(command);
    this.logger.debug('Command received', { command });

    if (this.silentCommands > 0) {
      this.silentCommands--;
      return;
    }

    const payload = this._answer(command);
    const override = this.handshakeOverride;
    this.handshakeOverride = null;

    if (override) {
      this._queue(override);
      this.pendingPayload = payload;
    } else if (payload === null) {
      this._queue(NAK_LINE);
    } else {
      this._queue(ACK_LINE);
      this.pendingPayload = payload;
    }
  }

  private _answer(command: string): string | null {
    const pressure = /^PR(\d)$/.exec(command);
    if (pressure) {
      const value = this.pressures[Number(pressure[1]) - 1];
      return value === undefined ? null : `0,${formatPressure(value)}`;
    }
    const setUnit = /^UNI,(\d)$/.exec(command);
    if (setUnit) {
      const code = Number(setUnit[1]);
      if (code < MIN_UNIT_CODE || code > MAX_UNIT_CODE) return null;
      this.unit = code;
      return `UNI,${code}`;
    }
    switch (command) {
      case 'TMP':
        return String(this.temperature);
      case 'UNI':
        return String(this.unit);
      case 'AYT': {
        const { type, model, serialNumber, firmwareVersion, hardwareVersion } = this.identity;
        return `${type},${model},${serialNumber},${firmwareVersion},${hardwareVersion}`;
      }
      default:
        return null;
    }
  }

  private _queue(...chunks: Uint8Array[]): void {
    this.outputBuffer = concatUint8Arrays([this.outputBuffer, ...chunks]);
  }
}

export default GaugeEmulator;
