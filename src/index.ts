// src/index.ts

export { default as GaugeClient, isValidReading } from './client.js';
export { default as PollingManager } from './polling-manager.js';
export { default as Logger, NOOP_LOGGER } from './logger.js';
export { default as NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { default as NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export { default as GaugeEmulator, formatPressure } from './emulator/gauge-emulator.js';
export { LineFramer } from './framers/line-framer.js';
export type { LineFramerOptions } from './framers/line-framer.js';
export { HandshakeProtocol, resolveOutcome } from './framers/handshake-protocol.js';

export * from './errors.js';
export * from './constants/constants.js';
export * from './commands/read-pressure.js';
export * from './commands/read-temperature.js';
export * from './commands/pressure-unit.js';
export * from './commands/identify.js';
export type * from './types/gauge-types.js';
