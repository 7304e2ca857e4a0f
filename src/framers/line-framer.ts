// src/framers/line-framer.ts
import { DEFAULT_TIMEOUT, MAX_LINE_LENGTH, TERMINATOR } from '../constants/constants.js';
import {
  GaugeConnectionError,
  GaugeError,
  GaugeNotConnectedError,
  GaugeTimeoutError,
} from '../errors.js';
import { NOOP_LOGGER } from '../logger.js';
import type { LoggerInstance, Transport } from '../types/gauge-types.js';
import { concatUint8Arrays, indexOfSequence, sliceUint8Array, toHex } from '../utils/utils.js';

export interface LineFramerOptions {
  timeout?: number;
  maxLineLength?: number;
  logger?: LoggerInstance;
}

/**
 * Line-oriented view of a byte stream. Bytes received past a terminator are
 * kept for the next `readLine`.
 */
export class LineFramer {
  private _pending: Uint8Array = new Uint8Array(0);
  private readonly _timeout: number;
  private readonly _maxLineLength: number;
  private readonly _logger: LoggerInstance;

  constructor(
    private _transport: Transport,
    options: LineFramerOptions = {}
  ) {
    this._timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this._maxLineLength = options.maxLineLength ?? MAX_LINE_LENGTH;
    this._logger = options.logger ?? NOOP_LOGGER;
  }

  public async send(bytes: Uint8Array): Promise<void> {
    if (!this._transport.isOpen) throw new GaugeNotConnectedError();
    try {
      await this._transport.write(bytes);
    } catch (err: unknown) {
      throw toConnectionError(err, 'Write failed');
    }
    this._logger.trace('Sent', { bytes: bytes.length, hex: toHex(bytes) });
  }

  /**
   * Reads until the buffer ends with `terminator`, holds `maxBytes` bytes, or
   * the peer closes the stream. The whole line shares one `timeout` window.
   * @returns The line including its terminator, or fewer bytes on early close
   * @throws GaugeTimeoutError If no complete line arrives in time
   * @throws GaugeConnectionError On closed connection or I/O failure
   */
  public async readLine(
    terminator: Uint8Array = TERMINATOR,
    maxBytes: number = this._maxLineLength,
    timeout: number = this._timeout
  ): Promise<Uint8Array> {
    const start = Date.now();

    while (true) {
      const idx = indexOfSequence(this._pending, terminator);
      if (idx !== -1 && idx + terminator.length <= maxBytes) {
        return this._take(idx + terminator.length);
      }
      if (this._pending.length >= maxBytes) {
        this._logger.warn('Line reached maximum length without terminator', { bytes: maxBytes });
        return this._take(maxBytes);
      }

      const timeLeft = timeout - (Date.now() - start);
      if (timeLeft <= 0) throw new GaugeTimeoutError(`No complete line within ${timeout}ms`);

      let chunk: Uint8Array;
      try {
        chunk = await this._transport.read(maxBytes - this._pending.length, timeLeft);
      } catch (err: unknown) {
        if (err instanceof GaugeTimeoutError) throw err;
        throw toConnectionError(err, 'Read failed');
      }

      if (chunk.length === 0) {
        if (this._pending.length === 0) {
          throw new GaugeConnectionError('Connection closed by peer');
        }
        this._logger.warn('Peer closed the stream mid-line', { bytes: this._pending.length });
        return this._take(this._pending.length);
      }

      this._pending = concatUint8Arrays([this._pending, chunk]);
    }
  }

  /** Drops buffered bytes, used after a reconnect */
  public discard(): void {
    this._pending = new Uint8Array(0);
  }

  /**
   * Drops everything received so far, here and in the transport. A reply
   * that arrives after its exchange gave up is never read as the next one.
   */
  public async reset(): Promise<void> {
    const dropped = this._pending.length;
    this.discard();
    await this._transport.flush();
    if (dropped > 0) this._logger.debug('Discarded unread bytes', { bytes: dropped });
  }

  private _take(length: number): Uint8Array {
    const line = sliceUint8Array(this._pending, 0, length);
    this._pending = sliceUint8Array(this._pending, length);
    return line;
  }
}

function toConnectionError(err: unknown, context: string): GaugeError {
  if (err instanceof GaugeConnectionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new GaugeConnectionError(`${context}: ${message}`);
}
