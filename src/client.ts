// src/client.ts
import { Mutex } from 'async-mutex';
import {
  DEFAULT_TIMEOUT,
  DEVICE_PROFILES,
  MAX_LINE_LENGTH,
  SENTINEL_FAILURE_VALUE,
  TERMINATOR,
  type DeviceProfileName,
  type PressureUnitCode,
} from './constants/constants.js';
import {
  GaugeConfigError,
  GaugeConnectionError,
  GaugeDecodeError,
  GaugeInvalidCommandError,
  GaugeInvalidGaugeError,
  GaugeUnsupportedOperationError,
  type ProtocolFault,
} from './errors.js';
import { HandshakeProtocol, resolveOutcome } from './framers/handshake-protocol.js';
import { LineFramer } from './framers/line-framer.js';
import { NOOP_LOGGER } from './logger.js';
import { buildIdentifyRequest, parseIdentifyResponse } from './commands/identify.js';
import {
  buildGetPressureUnitRequest,
  buildSetPressureUnitRequest,
  parsePressureUnitResponse,
  unitName,
} from './commands/pressure-unit.js';
import { buildReadPressureRequest, parseReadPressureResponse } from './commands/read-pressure.js';
import {
  buildReadTemperatureRequest,
  parseReadTemperatureResponse,
} from './commands/read-temperature.js';
import { isAscii } from './utils/utils.js';
import type {
  DeviceIdentity,
  DeviceProfile,
  GaugeClientOptions,
  LoggerInstance,
  PressureReading,
  Result,
  Transport,
} from './types/gauge-types.js';

/**
 * False for the sentinel returned when a read produced no value.
 */
export function isValidReading(value: number): boolean {
  return value !== SENTINEL_FAILURE_VALUE && Number.isFinite(value);
}

function resolveProfile(profile: DeviceProfileName | DeviceProfile): DeviceProfile {
  if (typeof profile !== 'string') {
    if (!Number.isInteger(profile.gauges) || profile.gauges < 0) {
      throw new GaugeConfigError(`Invalid gauge count in profile "${profile.name}"`);
    }
    return profile;
  }
  if (!Object.prototype.hasOwnProperty.call(DEVICE_PROFILES, profile)) {
    throw new GaugeConfigError(`Unknown device profile: ${profile}`);
  }
  return DEVICE_PROFILES[profile];
}

/**
 * Command façade for one gauge controller over one exclusively owned
 * connection. Every exchange runs under a mutex, so a poller and a manual
 * console may share an instance.
 */
class GaugeClient {
  private transport: Transport;
  private framer: LineFramer;
  private protocol: HandshakeProtocol;
  private logger: LoggerInstance;
  private deviceProfile: DeviceProfile;
  private defaultTimeout: number;
  private _mutex: Mutex;

  private _identity: DeviceIdentity | null = null;
  private _gaugeCount: number;
  private _pressureUnit: string = '';

  constructor(transport: Transport, options: GaugeClientOptions = {}) {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new GaugeConfigError(`Timeout must be a positive number, got ${timeout}`);
    }
    const maxLineLength = options.maxLineLength ?? MAX_LINE_LENGTH;
    if (!Number.isInteger(maxLineLength) || maxLineLength <= TERMINATOR.length) {
      throw new GaugeConfigError(`Invalid maxLineLength: ${maxLineLength}`);
    }

    this.transport = transport;
    this.defaultTimeout = timeout;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.deviceProfile = resolveProfile(options.profile ?? 'vgc50x');
    this.framer = new LineFramer(transport, { timeout, maxLineLength, logger: this.logger });
    this.protocol = new HandshakeProtocol(this.framer, this.logger);
    this._mutex = new Mutex();
    this._gaugeCount = this.deviceProfile.gauges;
  }

  /**
   * Opens the connection. No-op when already open. Clears cached identity.
   */
  public async connect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (this.transport.isOpen) {
        this.logger.debug('Already connected');
        return;
      }
      try {
        await this.transport.connect();
      } catch (err: unknown) {
        if (err instanceof GaugeConnectionError) throw err;
        throw new GaugeConnectionError(
          `Could not connect: ${err instanceof Error ? err.message : String(err)}`
        );
      }
      this.framer.discard();
      this._resetIdentity();
      this.logger.info('Connected', { transport: this.transport.constructor.name });
    } finally {
      release();
    }
  }

  /**
   * Releases the link, also after the peer ended it or an I/O error left it
   * half open. Safe to call repeatedly.
   */
  public async disconnect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      await this.transport.disconnect();
      this.framer.discard();
      this.logger.info('Connection closed');
    } finally {
      release();
    }
  }

  public get isConnected(): boolean {
    return this.transport.isOpen;
  }

  public get identity(): DeviceIdentity | null {
    return this._identity;
  }

  /** 0 while unknown */
  public get gaugeCount(): number {
    return this._gaugeCount;
  }

  /** Display name of the last known unit, '' until known */
  public get pressureUnit(): string {
    return this._pressureUnit;
  }

  public get profile(): DeviceProfile {
    return this.deviceProfile;
  }

  public get timeout(): number {
    return this.defaultTimeout;
  }

  /**
   * Reads one gauge.
   * @returns The pressure, or SENTINEL_FAILURE_VALUE when no valid reading arrived
   * @throws GaugeInvalidGaugeError Before any I/O
   * @throws GaugeWrongCommandError On NAK
   * @throws GaugeUnknownResponseError On a handshake that is neither ACK nor NAK
   */
  public async readPressure(gauge: number = 1): Promise<number> {
    if (!Number.isInteger(gauge) || gauge < 1) {
      throw new GaugeInvalidGaugeError(gauge);
    }
    if (this._gaugeCount === 0 && this.deviceProfile.capabilities.identity) {
      await this.initializeIdentity();
    }
    if (this._gaugeCount > 0 && gauge > this._gaugeCount) {
      throw new GaugeInvalidGaugeError(gauge, this._gaugeCount);
    }

    const command = buildReadPressureRequest(gauge);
    const payload = this._unwrap(await this._query(command));
    if (payload === null) return SENTINEL_FAILURE_VALUE;

    try {
      return parseReadPressureResponse(payload);
    } catch (err: unknown) {
      return this._decodeFailure(err, command, gauge);
    }
  }

  /**
   * Reads gauges 1..gaugeCount in order.
   */
  public async readAllPressures(): Promise<PressureReading[]> {
    if (this._gaugeCount === 0 && this.deviceProfile.capabilities.identity) {
      await this.initializeIdentity();
    }
    if (this._gaugeCount === 0) {
      this.logger.warn('Gauge count unknown, nothing to read');
      return [];
    }
    const readings: PressureReading[] = [];
    for (let gauge = 1; gauge <= this._gaugeCount; gauge++) {
      readings.push({ gauge, pressure: await this.readPressure(gauge) });
    }
    return readings;
  }

  /**
   * @returns The temperature, or SENTINEL_FAILURE_VALUE when no valid reading arrived
   */
  public async readTemperature(): Promise<number> {
    this._requireCapability('temperature', 'readTemperature');
    const command = buildReadTemperatureRequest();
    const payload = this._unwrap(await this._query(command));
    if (payload === null) return SENTINEL_FAILURE_VALUE;

    try {
      return parseReadTemperatureResponse(payload);
    } catch (err: unknown) {
      return this._decodeFailure(err, command);
    }
  }

  /**
   * Queries the unit and refreshes `pressureUnit`.
   * @returns The unit code, or null when the controller did not deliver one
   * @throws GaugeDecodeError When the reply is not a code 0-5
   */
  public async getPressureUnit(): Promise<PressureUnitCode | null> {
    const command = buildGetPressureUnitRequest();
    const payload = this._unwrap(await this._query(command));
    if (payload === null) return null;

    const code = parsePressureUnitResponse(payload);
    this._pressureUnit = unitName(code);
    this.logger.debug(`Pressure unit is ${this._pressureUnit}`, { command });
    return code;
  }

  /**
   * Sets the unit. Succeeds only when the controller echoes the same code.
   * @throws GaugeInvalidUnitError Before any I/O when code is outside 0-5
   */
  public async setPressureUnit(code: number): Promise<boolean> {
    const command = buildSetPressureUnitRequest(code);
    const payload = this._unwrap(await this._query(command));
    if (payload === null) return false;

    let echoed: PressureUnitCode;
    try {
      echoed = parsePressureUnitResponse(payload);
    } catch (err: unknown) {
      if (err instanceof GaugeDecodeError) {
        this.logger.error(err.message, { command });
        return false;
      }
      throw err;
    }
    if (echoed !== code) {
      this.logger.warn(`Unit echo mismatch: requested ${code}, got ${echoed}`, { command });
      return false;
    }
    this._pressureUnit = unitName(echoed);
    this.logger.info(`Pressure unit set to ${this._pressureUnit}`, { command });
    return true;
  }

  /**
   * Queries unit and identity, then caches identity and gauge count.
   * Malformed or missing replies are logged, not raised.
   */
  public async initializeIdentity(): Promise<DeviceIdentity | null> {
    this._requireCapability('identity', 'initializeIdentity');

    try {
      await this.getPressureUnit();
    } catch (err: unknown) {
      if (!(err instanceof GaugeDecodeError)) throw err;
      this.logger.warn(`Ignoring unit reply: ${err.message}`);
    }

    const command = buildIdentifyRequest();
    const payload = this._unwrap(await this._query(command));
    if (payload === null) {
      this.logger.warn('No identity reply, gauge count stays unknown', { command });
      return null;
    }

    let identity: DeviceIdentity;
    try {
      identity = parseIdentifyResponse(payload);
    } catch (err: unknown) {
      if (err instanceof GaugeDecodeError) {
        this.logger.error(`Malformed identity: ${err.message}`, { command });
        return null;
      }
      throw err;
    }

    if (identity.gaugeCount === 0) {
      this.logger.error(`Configuration anomaly: no gauge count in type "${identity.type}"`, {
        command,
      });
    }
    this._identity = identity;
    if (this.deviceProfile.gauges === 0) {
      this._gaugeCount = identity.gaugeCount;
    } else if (identity.gaugeCount !== this.deviceProfile.gauges) {
      this.logger.warn(
        `Controller reports ${identity.gaugeCount} gauges, profile "${this.deviceProfile.name}" has ${this.deviceProfile.gauges}`
      );
    }
    this.logger.info(`Identified ${identity.type} ${identity.model} #${identity.serialNumber}`, {
      command,
      gauges: this._gaugeCount,
    });
    return identity;
  }

  /**
   * Dispatches by name: `pressure[N]` reads gauge N (default 1), `temp` reads
   * the temperature, `unit` returns the unit name. Anything else yields the sentinel.
   */
  public async getAtomicValue(name: string): Promise<number | string> {
    const key = name.toLowerCase();
    if (key.includes('pressure')) {
      const digits = /(\d+)\s*$/.exec(key)?.[1];
      return this.readPressure(digits !== undefined ? Number(digits) : 1);
    }
    if (key.includes('temp')) {
      return this.readTemperature();
    }
    if (key.includes('unit')) {
      const code = await this.getPressureUnit();
      return code === null ? SENTINEL_FAILURE_VALUE : unitName(code);
    }
    this.logger.warn(`Unknown value name: ${name}`);
    return SENTINEL_FAILURE_VALUE;
  }

  /**
   * Sends an arbitrary command through the handshake.
   * @returns The payload line without terminator, or null when none arrived
   * @throws GaugeInvalidCommandError Before any I/O
   */
  public async sendCommand(command: string): Promise<string | null> {
    if (command.length === 0) {
      throw new GaugeInvalidCommandError(command, 'empty');
    }
    if (/[\r\n]/.test(command)) {
      throw new GaugeInvalidCommandError(command, 'must be a single line');
    }
    if (!isAscii(command)) {
      throw new GaugeInvalidCommandError(command, 'must be ASCII');
    }
    return this._unwrap(await this._query(command));
  }

  private async _query(command: string): Promise<Result<string | null, ProtocolFault>> {
    return this._mutex.runExclusive(async () =>
      resolveOutcome(await this.protocol.exchange(command), command)
    );
  }

  private _unwrap(result: Result<string | null, ProtocolFault>): string | null {
    if (!result.ok) throw result.error;
    return result.value;
  }

  private _decodeFailure(err: unknown, command: string, gauge?: number): number {
    if (err instanceof GaugeDecodeError) {
      this.logger.error(`Failed to parse response: ${err.message}`, { command, gauge });
      return SENTINEL_FAILURE_VALUE;
    }
    throw err;
  }

  private _requireCapability(
    capability: keyof DeviceProfile['capabilities'],
    operation: string
  ): void {
    if (!this.deviceProfile.capabilities[capability]) {
      throw new GaugeUnsupportedOperationError(operation, this.deviceProfile.name);
    }
  }

  private _resetIdentity(): void {
    this._identity = null;
    this._gaugeCount = this.deviceProfile.gauges;
    this._pressureUnit = '';
  }
}

export default GaugeClient;
