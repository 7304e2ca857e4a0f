// src/types/gauge-types.ts

import type { DeviceProfileName } from '../constants/constants.js';

// !=============================================================================
// ! Transport
// !=============================================================================

/** Byte-stream endpoint owned by one client */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /**
   * Resolves with 1..maxBytes bytes as soon as any are buffered, or with an
   * empty array once the peer has closed the stream.
   * Rejects with GaugeTimeoutError when nothing arrives within `timeout`.
   */
  read(maxBytes: number, timeout?: number): Promise<Uint8Array>;
  /** Drops every byte received but not yet read */
  flush(): Promise<void>;
}

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  maxBufferSize?: number;
  noDelay?: boolean;
  logger?: LoggerInstance;
}

export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  maxBufferSize?: number;
  logger?: LoggerInstance;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context attached to a log record */
export interface LogContext {
  gauge?: number;
  command?: string;
  state?: string;
  bytes?: number;
  responseTime?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Devices
// !=============================================================================

export interface DeviceCapabilities {
  identity: boolean;
  temperature: boolean;
}

export interface DeviceProfile {
  name: string;
  /** Fixed gauge count, 0 when discovered or unknown */
  gauges: number;
  capabilities: DeviceCapabilities;
}

/** Reply to `AYT` */
export interface DeviceIdentity {
  type: string;
  model: string;
  serialNumber: number;
  firmwareVersion: string;
  hardwareVersion: string;
  gaugeCount: number;
}

export interface GaugeClientOptions {
  /** Per-read timeout in ms */
  timeout?: number;
  maxLineLength?: number;
  profile?: DeviceProfileName | DeviceProfile;
  logger?: LoggerInstance;
}

export interface PressureReading {
  gauge: number;
  pressure: number;
}

// !=============================================================================
// ! Protocol results
// !=============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type HandshakeState =
  | 'SENT'
  | 'AWAIT_PAYLOAD'
  | 'TIMED_OUT'
  | 'REJECTED'
  | 'UNKNOWN_ACK'
  | 'PAYLOAD_FAILED'
  | 'COMPLETE';

/** Terminal states of one command exchange */
export type HandshakeOutcome =
  | { state: 'COMPLETE'; payload: string }
  | { state: 'TIMED_OUT' }
  | { state: 'REJECTED'; raw: Uint8Array }
  | { state: 'UNKNOWN_ACK'; raw: Uint8Array }
  | { state: 'PAYLOAD_FAILED'; reason: Error };

// !=============================================================================
// ! Polling
// !=============================================================================

export interface PollingManagerOptions {
  logger?: LoggerInstance;
}

export interface PollingTaskOptions<T = unknown> {
  id: string;
  interval: number;
  fn: () => Promise<T>;
  onData?: (data: T) => void;
  onError?: (error: Error, attempts: number) => void;
  maxRetries?: number;
  /** Run once right after start instead of after the first interval */
  immediate?: boolean;
}

export interface PollingTaskStats {
  totalRuns: number;
  successes: number;
  failures: number;
  lastError: Error | null;
  lastRunTime: number | null;
}

// !=============================================================================
// ! Emulator
// !=============================================================================

export interface GaugeEmulatorOptions {
  pressures?: number[];
  temperature?: number;
  unit?: number;
  identity?: Omit<DeviceIdentity, 'gaugeCount'>;
  logger?: LoggerInstance;
}
