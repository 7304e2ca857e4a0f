// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import Logger from '../../logger.js';
import { GaugeConnectionError, GaugeNotConnectedError } from '../../errors.js';
import type { NodeTcpTransportOptions } from '../../types/gauge-types.js';
import { BufferedTransport } from '../buffered-transport.js';

const defaultLogger = new Logger().createLogger('NodeTcpTransport');

/**
 * TCP link to a controller (or to a serial-to-Ethernet bridge in front of one).
 * No automatic reconnect: callers close and reopen.
 */
class NodeTcpTransport extends BufferedTransport {
  private host: string;
  private port: number;
  private connectTimeout: number;
  private noDelay: boolean;
  private socket: net.Socket | null = null;
  private _connected: boolean = false;

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    super(options.maxBufferSize ?? 8192, options.logger ?? defaultLogger);
    this.host = host;
    this.port = port;
    this.connectTimeout = options.connectTimeout ?? 2000;
    this.noDelay = options.noDelay ?? true;
  }

  public get isOpen(): boolean {
    return this._connected && !this.ended;
  }

  protected hasLink(): boolean {
    return this.socket !== null;
  }

  public async connect(): Promise<void> {
    if (this.isOpen) return;
    this._release();
    this.readBuffer = new Uint8Array(0);
    this.ended = false;

    await new Promise<void>((resolve, reject) => {
      this.logger.info(`Connecting to ${this.host}:${this.port}...`);
      const socket = net.connect({ host: this.host, port: this.port });
      this.socket = socket;
      let settled = false;

      socket.setTimeout(this.connectTimeout);
      socket.once('timeout', () => {
        if (settled) return;
        settled = true;
        this._release();
        reject(
          new GaugeConnectionError(
            `Connection timeout to ${this.host}:${this.port} after ${this.connectTimeout}ms`
          )
        );
      });

      socket.once('connect', () => {
        settled = true;
        socket.setTimeout(0);
        socket.setNoDelay(this.noDelay);
        this._connected = true;
        this.logger.info(`Connected to ${this.host}:${this.port}`);
        resolve();
      });

      socket.on('data', (data: Buffer) => this.onData(data));

      socket.on('error', (err: Error) => {
        if (!settled) {
          settled = true;
          this._release();
          reject(
            new GaugeConnectionError(
              `Could not connect to ${this.host}:${this.port}: ${err.message}`
            )
          );
          return;
        }
        this.logger.error(`Socket error: ${err.message}`);
        this.ended = true;
      });

      socket.on('close', () => {
        if (this._connected && !this.ended) {
          this.logger.warn(`Connection closed by ${this.host}:${this.port}`);
        }
        this.ended = true;
      });
    });
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this.isOpen || !socket) throw new GaugeNotConnectedError();
    await new Promise<void>((resolve, reject) => {
      socket.write(buffer, err => {
        if (err) reject(new GaugeConnectionError(`Write failed: ${err.message}`));
        else resolve();
      });
    });
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    await new Promise<void>(resolve => {
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once('close', () => resolve());
      socket.end();
      socket.destroy();
    });
    this._release();
    this.logger.info(`Disconnected from ${this.host}:${this.port}`);
  }

  private _release(): void {
    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.destroy();
    }
    this.socket = null;
    this._connected = false;
  }
}

export default NodeTcpTransport;
