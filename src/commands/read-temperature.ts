// src/commands/read-temperature.ts

import { COMMANDS } from '../constants/constants.js';
import { parseFloatField } from './numeric.js';

export function buildReadTemperatureRequest(): string {
  return COMMANDS.TEMPERATURE;
}

/**
 * The whole payload is one number.
 * @throws GaugeDecodeError
 */
export function parseReadTemperatureResponse(payload: string): number {
  return parseFloatField(payload);
}
