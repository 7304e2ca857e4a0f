// src/transport/buffered-transport.ts
import { Mutex } from 'async-mutex';
import { GaugeBufferOverflowError, GaugeNotConnectedError, GaugeTimeoutError } from '../errors.js';
import type { LoggerInstance, Transport } from '../types/gauge-types.js';
import { concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';

const POLL_INTERVAL_MS = 10;

/**
 * Receive side shared by the stream transports: incoming chunks accumulate
 * in one buffer that `read` drains.
 */
export abstract class BufferedTransport implements Transport {
  protected readBuffer: Uint8Array = new Uint8Array(0);
  /** Set when the peer ended the stream; buffered bytes stay readable */
  protected ended: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  protected constructor(
    protected readonly maxBufferSize: number,
    protected readonly logger: LoggerInstance
  ) {}

  abstract get isOpen(): boolean;
  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract write(buffer: Uint8Array): Promise<void>;

  /** True while a link exists to read from, even if the peer already ended it */
  protected abstract hasLink(): boolean;

  protected onData(data: Uint8Array): void {
    const chunk = new Uint8Array(data);
    if (this.readBuffer.length + chunk.length > this.maxBufferSize) {
      const err = new GaugeBufferOverflowError(
        this.readBuffer.length + chunk.length,
        this.maxBufferSize
      );
      this.logger.error(`${err.message}, dropping buffered bytes`);
      this.readBuffer = new Uint8Array(0);
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
  }

  public async read(maxBytes: number, timeout: number = 1000): Promise<Uint8Array> {
    const start = Date.now();
    const release = await this._operationMutex.acquire();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = (): void => {
          if (this.readBuffer.length > 0) {
            const length = Math.min(Math.max(1, maxBytes), this.readBuffer.length);
            const data = sliceUint8Array(this.readBuffer, 0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, length);
            resolve(data);
            return;
          }
          if (!this.hasLink()) {
            reject(new GaugeNotConnectedError());
            return;
          }
          if (this.ended) {
            resolve(new Uint8Array(0));
            return;
          }
          if (Date.now() - start >= timeout) {
            reject(new GaugeTimeoutError('Read timeout'));
            return;
          }
          setTimeout(check, POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  public async flush(): Promise<void> {
    this.readBuffer = new Uint8Array(0);
  }
}
