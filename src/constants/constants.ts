// src/constants/constants.ts

import type { DeviceProfile } from '../types/gauge-types.js';

/**
 * Control bytes of the handshake
 */
export const CONTROL_BYTES = {
  ENQ: 0x05,
  ACK: 0x06,
  NAK: 0x15,
} as const;

/** Line terminator, both directions */
export const TERMINATOR = new Uint8Array([0x0d, 0x0a]);

/** Upper bound for a single received line */
export const MAX_LINE_LENGTH = 4096;

/** Default per-read timeout (ms) */
export const DEFAULT_TIMEOUT = 1000;

/**
 * "No reading" marker returned by numeric reads. Never a real measurement.
 */
export const SENTINEL_FAILURE_VALUE = Number.MAX_VALUE;

/**
 * Command mnemonics
 */
export const COMMANDS = {
  PRESSURE: 'PR',
  TEMPERATURE: 'TMP',
  UNIT: 'UNI',
  IDENTIFY: 'AYT',
} as const;

/**
 * Pressure unit codes as reported by `UNI`
 */
export enum PressureUnitCode {
  MBAR = 0,
  TORR = 1,
  PASCAL = 2,
  MICRON = 3,
  HPASCAL = 4,
  VOLT = 5,
}

export const PRESSURE_UNITS: Readonly<Record<PressureUnitCode, string>> = {
  [PressureUnitCode.MBAR]: 'mbar',
  [PressureUnitCode.TORR]: 'Torr',
  [PressureUnitCode.PASCAL]: 'Pascal',
  [PressureUnitCode.MICRON]: 'Micron',
  [PressureUnitCode.HPASCAL]: 'hPascal',
  [PressureUnitCode.VOLT]: 'Volt',
};

export const MIN_UNIT_CODE = PressureUnitCode.MBAR;
export const MAX_UNIT_CODE = PressureUnitCode.VOLT;

export type DeviceProfileName = 'vgc50x' | 'vgc501' | 'vgc502' | 'vgc503' | 'basic';

/**
 * Capability sets of the supported controller generations.
 * `gauges: 0` means the count is discovered through `AYT` (or unknown).
 */
export const DEVICE_PROFILES: Readonly<Record<DeviceProfileName, DeviceProfile>> = {
  vgc50x: { name: 'vgc50x', gauges: 0, capabilities: { identity: true, temperature: true } },
  vgc501: { name: 'vgc501', gauges: 1, capabilities: { identity: true, temperature: true } },
  vgc502: { name: 'vgc502', gauges: 2, capabilities: { identity: true, temperature: true } },
  vgc503: { name: 'vgc503', gauges: 3, capabilities: { identity: true, temperature: true } },
  basic: { name: 'basic', gauges: 0, capabilities: { identity: false, temperature: false } },
};
