// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import Logger from '../../logger.js';
import { GaugeConfigError, GaugeConnectionError, GaugeNotConnectedError } from '../../errors.js';
import type { NodeSerialTransportOptions } from '../../types/gauge-types.js';
import { BufferedTransport } from '../buffered-transport.js';

const SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
  DEFAULT_BAUD_RATE: 9600,
  DEFAULT_MAX_BUFFER_SIZE: 4096,
} as const;

const defaultLogger = new Logger().createLogger('NodeSerialTransport');

/**
 * RS-232 link to a controller. The controllers default to 9600 8N1.
 */
class NodeSerialTransport extends BufferedTransport {
  private path: string;
  private options: Required<Omit<NodeSerialTransportOptions, 'logger' | 'maxBufferSize'>>;
  private port: SerialPort | null = null;

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    super(
      options.maxBufferSize ?? SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      options.logger ?? defaultLogger
    );
    this.path = path;
    this.options = {
      baudRate: options.baudRate ?? SERIAL_CONSTANTS.DEFAULT_BAUD_RATE,
      dataBits: options.dataBits ?? 8,
      stopBits: options.stopBits ?? 1,
      parity: options.parity ?? 'none',
    };
    if (
      this.options.baudRate < SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new GaugeConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }
  }

  public get isOpen(): boolean {
    return this.port !== null && this.port.isOpen && !this.ended;
  }

  protected hasLink(): boolean {
    return this.port !== null;
  }

  public async connect(): Promise<void> {
    if (this.isOpen) return;
    await this._release();
    this.readBuffer = new Uint8Array(0);
    this.ended = false;

    const port = new SerialPort({
      path: this.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open(err => {
        if (!err) {
          resolve();
          return;
        }
        if (err.message.includes('permission')) {
          reject(new GaugeConnectionError('Permission denied'));
        } else if (err.message.includes('busy')) {
          reject(new GaugeConnectionError('Serial port is busy'));
        } else if (err.message.includes('no such file')) {
          reject(new GaugeConnectionError('Serial port does not exist'));
        } else {
          reject(new GaugeConnectionError(err.message));
        }
      });
    });

    port.on('data', (data: Buffer) => this.onData(data));
    port.on('error', (err: Error) => {
      this.logger.error(`Serial port error: ${err.message}`);
      this.ended = true;
    });
    port.on('close', () => {
      this.ended = true;
    });
    this.port = port;
    this.logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this.isOpen || !port) throw new GaugeNotConnectedError();
    await new Promise<void>((resolve, reject) => {
      port.write(Buffer.from(buffer), err => {
        if (err) {
          reject(new GaugeConnectionError(`Write failed: ${err.message}`));
          return;
        }
        port.drain(drainErr => {
          if (drainErr) reject(new GaugeConnectionError(`Drain failed: ${drainErr.message}`));
          else resolve();
        });
      });
    });
  }

  public async disconnect(): Promise<void> {
    if (!this.port) return;
    await this._release();
    this.logger.info(`Serial port ${this.path} closed`);
  }

  private async _release(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port) return;
    port.removeAllListeners();
    if (!port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      port.close(err => {
        if (err) reject(new GaugeConnectionError(`Close failed: ${err.message}`));
        else resolve();
      });
    });
  }
}

export default NodeSerialTransport;
