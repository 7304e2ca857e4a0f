// test/helpers/fake-transport.ts
import { GaugeConnectionError, GaugeNotConnectedError, GaugeTimeoutError } from '../../src/errors.js';
import type { Transport } from '../../src/types/gauge-types.js';
import { asciiToBytes, bytesToAscii } from '../../src/utils/utils.js';

export const ACK = '\x06\r\n';
export const NAK = '\x15\r\n';

type Chunk = string | number[] | Uint8Array;

function toBytes(chunk: Chunk): Uint8Array {
  if (typeof chunk === 'string') return asciiToBytes(chunk);
  return Uint8Array.from(chunk);
}

/**
 * Scripted transport: replies are queued up front or on a given write, and
 * writes are recorded. An empty queue times out at once, or reports
 * end-of-stream after `close()`.
 */
export class FakeTransport implements Transport {
  public isOpen: boolean;
  public readonly written: Uint8Array[] = [];
  public connectCalls = 0;
  public disconnectCalls = 0;
  public failWrites = false;
  public flushCalls = 0;

  private queue: Uint8Array[] = [];
  private replies: Array<{ frame: string; chunks: Uint8Array[] }> = [];
  private peerClosed = false;
  private readonly byteByByte: boolean;

  constructor(options: { open?: boolean; byteByByte?: boolean } = {}) {
    this.isOpen = options.open ?? true;
    this.byteByByte = options.byteByByte ?? false;
  }

  feed(...chunks: Chunk[]): this {
    for (const chunk of chunks) this.queue.push(toBytes(chunk));
    return this;
  }

  /** Queues `chunks` once `frame` is written, as a device answering late would */
  replyOnWrite(frame: string, ...chunks: Chunk[]): this {
    this.replies.push({ frame, chunks: chunks.map(toBytes) });
    return this;
  }

  close(): void {
    this.peerClosed = true;
  }

  /** Written frames as ASCII strings */
  get writtenText(): string[] {
    return this.written.map(bytesToAscii);
  }

  async connect(): Promise<void> {
    this.connectCalls++;
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.isOpen = false;
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this.isOpen) throw new GaugeNotConnectedError();
    if (this.failWrites) throw new Error('EPIPE');
    this.written.push(Uint8Array.from(buffer));
    const text = bytesToAscii(buffer);
    const index = this.replies.findIndex(reply => reply.frame === text);
    const reply = this.replies[index];
    if (reply) {
      this.replies.splice(index, 1);
      this.queue.push(...reply.chunks);
    }
  }

  async flush(): Promise<void> {
    this.flushCalls++;
    this.queue = [];
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    if (!this.isOpen) throw new GaugeConnectionError('closed');
    const head = this.queue[0];
    if (head === undefined) {
      if (this.peerClosed) return new Uint8Array(0);
      throw new GaugeTimeoutError('Read timeout');
    }
    const length = Math.min(this.byteByByte ? 1 : maxBytes, head.length);
    const data = head.subarray(0, length);
    if (length === head.length) this.queue.shift();
    else this.queue[0] = head.subarray(length);
    return data;
  }
}
