// src/commands/numeric.ts

import { GaugeDecodeError } from '../errors.js';

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a decimal or exponent-notation number. Empty strings, `NaN` and
 * `Infinity` are rejected.
 */
export function parseFloatField(field: string, payload: string = field): number {
  const text = field.trim();
  if (!FLOAT_PATTERN.test(text)) {
    throw new GaugeDecodeError(payload, 'a floating-point number');
  }
  return Number(text);
}

export function parseIntegerField(field: string, payload: string = field): number {
  const text = field.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new GaugeDecodeError(payload, 'an integer');
  }
  return Number.parseInt(text, 10);
}
