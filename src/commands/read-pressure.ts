// src/commands/read-pressure.ts

import { COMMANDS } from '../constants/constants.js';
import { GaugeDecodeError, GaugeInvalidGaugeError } from '../errors.js';
import { parseFloatField } from './numeric.js';

const VALUE_FIELD = 1;

/**
 * Builds `PR<gauge>`
 * @throws GaugeInvalidGaugeError If gauge is not a positive integer
 */
export function buildReadPressureRequest(gauge: number): string {
  if (!Number.isInteger(gauge) || gauge < 1) {
    throw new GaugeInvalidGaugeError(gauge);
  }
  return `${COMMANDS.PRESSURE}${gauge}`;
}

/**
 * Parses `<status>,<value>` and returns the value.
 * @throws GaugeDecodeError
 */
export function parseReadPressureResponse(payload: string): number {
  const fields = payload.split(',');
  const value = fields[VALUE_FIELD];
  if (value === undefined) {
    throw new GaugeDecodeError(payload, 'at least 2 comma-separated fields');
  }
  return parseFloatField(value, payload);
}
