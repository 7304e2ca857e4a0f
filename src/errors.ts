// src/errors.ts

import { MAX_UNIT_CODE, MIN_UNIT_CODE } from './constants/constants.js';
import { toHex } from './utils/utils.js';

/**
 * Base class for all gauge controller errors
 */
export class GaugeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GaugeError';
  }
}

// --- Transport and Connection ---

/**
 * Socket or serial link failure: refused, reset, closed, write error
 */
export class GaugeConnectionError extends GaugeError {
  constructor(message: string = 'Connection to gauge controller failed') {
    super(message);
    this.name = 'GaugeConnectionError';
  }
}

/**
 * Error class for operations attempted without an open connection
 */
export class GaugeNotConnectedError extends GaugeConnectionError {
  constructor() {
    super('Not connected to gauge controller');
    this.name = 'GaugeNotConnectedError';
  }
}

/**
 * Error class for a read window that elapsed without data
 */
export class GaugeTimeoutError extends GaugeError {
  constructor(message: string = 'Gauge controller did not respond in time') {
    super(message);
    this.name = 'GaugeTimeoutError';
  }
}

/**
 * Error class for a transport receive buffer growing past its bound
 */
export class GaugeBufferOverflowError extends GaugeError {
  constructor(size: number, max: number) {
    super(`Buffer overflow: ${size} bytes exceeds maximum ${max} bytes`);
    this.name = 'GaugeBufferOverflowError';
  }
}

// --- Protocol ---

/**
 * The controller answered NAK
 */
export class GaugeWrongCommandError extends GaugeError {
  command: string;

  constructor(command: string) {
    super(`Controller rejected command "${command}" (NAK)`);
    this.name = 'GaugeWrongCommandError';
    this.command = command;
  }
}

/**
 * Handshake was neither ACK nor NAK. Usually a framing desync.
 */
export class GaugeUnknownResponseError extends GaugeError {
  raw: Uint8Array;

  constructor(raw: Uint8Array) {
    super(`Unknown handshake response: 0x${toHex(raw) || '<empty>'}`);
    this.name = 'GaugeUnknownResponseError';
    this.raw = raw;
  }
}

/**
 * Payload does not have the shape the command expects
 */
export class GaugeDecodeError extends GaugeError {
  payload: string;

  constructor(payload: string, expected: string) {
    super(`Cannot decode payload "${payload}": expected ${expected}`);
    this.name = 'GaugeDecodeError';
    this.payload = payload;
  }
}

// --- Caller contract ---

export class GaugeInvalidGaugeError extends GaugeError {
  constructor(gauge: number, max?: number) {
    super(
      max !== undefined && max > 0
        ? `Invalid gauge: ${gauge}. Must be an integer between 1-${max}.`
        : `Invalid gauge: ${gauge}. Must be a positive integer.`
    );
    this.name = 'GaugeInvalidGaugeError';
  }
}

export class GaugeInvalidUnitError extends GaugeError {
  constructor(code: number) {
    super(`Invalid pressure unit code: ${code}. Must be between ${MIN_UNIT_CODE}-${MAX_UNIT_CODE}.`);
    this.name = 'GaugeInvalidUnitError';
  }
}

export class GaugeInvalidCommandError extends GaugeError {
  constructor(command: string, reason: string) {
    super(`Invalid command ${JSON.stringify(command)}: ${reason}`);
    this.name = 'GaugeInvalidCommandError';
  }
}

export class GaugeUnsupportedOperationError extends GaugeError {
  constructor(operation: string, profile: string) {
    super(`${operation} is unsupported for device variant "${profile}"`);
    this.name = 'GaugeUnsupportedOperationError';
  }
}

/**
 * Error class for invalid client, transport or poller options
 */
export class GaugeConfigError extends GaugeError {
  constructor(message: string = 'Invalid configuration') {
    super(message);
    this.name = 'GaugeConfigError';
  }
}

// --- Polling ---

export class PollingManagerError extends GaugeError {
  constructor(message: string) {
    super(message);
    this.name = 'PollingManagerError';
  }
}

export class PollingTaskAlreadyExistsError extends PollingManagerError {
  constructor(id: string) {
    super(`Polling task with id "${id}" already exists.`);
    this.name = 'PollingTaskAlreadyExistsError';
  }
}

export class PollingTaskNotFoundError extends PollingManagerError {
  constructor(id: string) {
    super(`Polling task with id "${id}" does not exist.`);
    this.name = 'PollingTaskNotFoundError';
  }
}

/**
 * Faults the client raises rather than degrading to the sentinel
 */
export type ProtocolFault = GaugeWrongCommandError | GaugeUnknownResponseError;
