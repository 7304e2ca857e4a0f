// src/commands/identify.ts

import { COMMANDS } from '../constants/constants.js';
import { GaugeDecodeError } from '../errors.js';
import type { DeviceIdentity } from '../types/gauge-types.js';
import { parseIntegerField } from './numeric.js';

const FIELD_COUNT = 5;

export function buildIdentifyRequest(): string {
  return COMMANDS.IDENTIFY;
}

/**
 * Parses `type,model,serial,firmware,hardware`.
 *
 * Gauge count is the trailing digit of the type (`VGC502` → 2), else of the
 * model (`DUAL2` → 2), else 0.
 * @throws GaugeDecodeError On a field count other than 5 or a non-integer serial
 */
export function parseIdentifyResponse(payload: string): DeviceIdentity {
  const fields = payload.split(',').map(f => f.trim());
  const [type, model, serial, firmwareVersion, hardwareVersion] = fields;
  if (
    fields.length !== FIELD_COUNT ||
    type === undefined ||
    model === undefined ||
    serial === undefined ||
    firmwareVersion === undefined ||
    hardwareVersion === undefined
  ) {
    throw new GaugeDecodeError(payload, `exactly ${FIELD_COUNT} comma-separated fields`);
  }

  return {
    type,
    model,
    serialNumber: parseIntegerField(serial, payload),
    firmwareVersion,
    hardwareVersion,
    gaugeCount: trailingDigit(type) ?? trailingDigit(model) ?? 0,
  };
}

function trailingDigit(text: string): number | undefined {
  const last = text.charAt(text.length - 1);
  return last >= '0' && last <= '9' ? Number(last) : undefined;
}
