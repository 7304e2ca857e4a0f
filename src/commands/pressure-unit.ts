// src/commands/pressure-unit.ts

import {
  COMMANDS,
  MAX_UNIT_CODE,
  MIN_UNIT_CODE,
  PRESSURE_UNITS,
  PressureUnitCode,
} from '../constants/constants.js';
import { GaugeDecodeError, GaugeInvalidUnitError } from '../errors.js';
import { parseIntegerField } from './numeric.js';

export function isPressureUnitCode(code: number): code is PressureUnitCode {
  return Number.isInteger(code) && code >= MIN_UNIT_CODE && code <= MAX_UNIT_CODE;
}

export function buildGetPressureUnitRequest(): string {
  return COMMANDS.UNIT;
}

/**
 * Builds `UNI,<code>`
 * @throws GaugeInvalidUnitError If code is outside 0-5
 */
export function buildSetPressureUnitRequest(code: number): string {
  if (!isPressureUnitCode(code)) {
    throw new GaugeInvalidUnitError(code);
  }
  return `${COMMANDS.UNIT},${code}`;
}

/**
 * Parses the unit reply. A query answers `<code>`; a set echoes `UNI,<code>`,
 * so the code is always the last field.
 * @throws GaugeDecodeError
 */
export function parsePressureUnitResponse(payload: string): PressureUnitCode {
  const fields = payload.split(',');
  const code = parseIntegerField(fields[fields.length - 1] ?? '', payload);
  if (!isPressureUnitCode(code)) {
    throw new GaugeDecodeError(payload, `a unit code between ${MIN_UNIT_CODE}-${MAX_UNIT_CODE}`);
  }
  return code;
}

export function unitName(code: PressureUnitCode): string {
  return PRESSURE_UNITS[code];
}

/**
 * Resolves a display name (`'torr'`, `'Pascal'`...) to its code.
 */
export function unitCodeFromName(name: string): PressureUnitCode | undefined {
  const wanted = name.trim().toLowerCase();
  for (let code = MIN_UNIT_CODE; code <= MAX_UNIT_CODE; code++) {
    if (isPressureUnitCode(code) && PRESSURE_UNITS[code].toLowerCase() === wanted) return code;
  }
  return undefined;
}
