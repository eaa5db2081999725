/**
 * InstrumentClient – device-level access to an Oxford Mercury ITC
 * temperature controller over a serial or network transport.
 *
 * Commands go out strictly one at a time, in the order they were issued;
 * concurrent calls queue behind each other so a reply is always read by the
 * command that caused it.
 */

import { decodeValue, encodeMagnitude } from "./codec.js";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";
import { NetworkTransport, type NetworkTransportOptions } from "./network.js";
import {
  CATALOGUE_PATH,
  IDENTITY_QUERY,
  buildQuery,
  buildRead,
  buildSet,
  parseResponse,
  serialize,
  type Command,
} from "./protocol.js";
import { DeviceRegistry } from "./registry.js";
import { SerialTransport, type SerialTransportOptions } from "./serial.js";
import type { Transport } from "./transport.js";

// ---------- Types ----------

/** Voltage (V), current (A) and resistance (Ohm). */
export type SensorReadout = [voltage: number, current: number, resistance: number];

/** Voltage (V), current (A), resistance (Ohm) and temperature (K). */
export type SensorReadoutWithTemperature = [
  voltage: number,
  current: number,
  resistance: number,
  temperature: number,
];

export interface InstrumentClientOptions extends LoggingOptions {
  /** Device key to address map. Default: DEFAULT_DEVICES */
  devices?: Readonly<Record<string, string>>;
}

// ---------- Client ----------

export class InstrumentClient {
  public readonly transport: Transport;
  public readonly devices: DeviceRegistry;

  private readonly log: Logger;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(transport: Transport, options: InstrumentClientOptions = {}) {
    this.transport = transport;
    this.devices = new DeviceRegistry(options.devices);
    this.log = resolveLogger(options);
  }

  /** Client over a persistent serial connection. */
  static serial(
    options: SerialTransportOptions & InstrumentClientOptions
  ): InstrumentClient {
    return new InstrumentClient(new SerialTransport(options), options);
  }

  /** Client over the per-command network connection. */
  static network(
    options: NetworkTransportOptions & InstrumentClientOptions
  ): InstrumentClient {
    return new InstrumentClient(new NetworkTransport(options), options);
  }

  async open(): Promise<void> {
    await this.transport.open();
  }

  async close(): Promise<void> {
    await this.exclusive(() => this.transport.close());
  }

  // ---------- Raw exchanges ----------

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Failures reach the caller through `run`; the queue only tracks completion.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private query(command: Command): Promise<string> {
    const line = serialize(command);
    return this.exclusive(async () => {
      const reply = await this.transport.query(line);
      this.log.debug(`${line} -> ${reply}`);
      return reply;
    });
  }

  private write(command: Command): Promise<void> {
    const line = serialize(command);
    return this.exclusive(async () => {
      await this.transport.send(line);
      this.log.debug(`${line} sent`);
    });
  }

  // ---------- Public API ----------

  /** Controller identity string, as returned by `*IDN?`. */
  async getIdentity(): Promise<string> {
    return this.query(buildQuery(IDENTITY_QUERY));
  }

  /** Raw reply of the device catalogue query. */
  async listDevices(): Promise<string> {
    return this.query(buildRead(CATALOGUE_PATH));
  }

  /**
   * Read a signal (TEMP, VOLT, CURR, RES ...) of a configured device and
   * return it in base units.
   *
   * @throws UnknownDeviceError for an unconfigured device key
   * @throws DecodeError when the reply value cannot be decoded
   */
  async getSignal(deviceKey: string, signal: string): Promise<number> {
    const address = this.devices.resolve(deviceKey);
    const reply = await this.query(buildRead(address, signal));
    return decodeValue(parseResponse(reply));
  }

  /** Send `SET:<payload>`; the acknowledgement is not interpreted. */
  async setRaw(payload: string): Promise<void> {
    await this.write(buildSet(payload));
  }

  /**
   * Set a numeric parameter below a device address. `value` is in base units
   * and is written as a bare number in `unit`, e.g.
   * `setDeviceValue("db7", "TYPE:NTC:EXCT:TYPE:UNIP:MAG", 0.007, "mV")`.
   */
  async setDeviceValue(
    deviceKey: string,
    path: string,
    value: number,
    unit: string
  ): Promise<void> {
    const address = this.devices.resolve(deviceKey);
    await this.setRaw(`${address}:${path}:${encodeMagnitude(value, unit)}`);
  }

  /**
   * Read voltage, current, resistance and optionally temperature of a device.
   *
   * The values come from separate commands and are therefore taken at
   * slightly different times; they are not a consistent snapshot.
   */
  async getSensorReadout(
    deviceKey: string,
    includeTemperature?: false
  ): Promise<SensorReadout>;
  async getSensorReadout(
    deviceKey: string,
    includeTemperature: true
  ): Promise<SensorReadoutWithTemperature>;
  async getSensorReadout(
    deviceKey: string,
    includeTemperature: boolean
  ): Promise<SensorReadout | SensorReadoutWithTemperature>;
  async getSensorReadout(
    deviceKey: string,
    includeTemperature = false
  ): Promise<SensorReadout | SensorReadoutWithTemperature> {
    const voltage = await this.getSignal(deviceKey, "VOLT");
    const current = await this.getSignal(deviceKey, "CURR");
    const resistance = await this.getSignal(deviceKey, "RES");

    if (!includeTemperature) {
      return [voltage, current, resistance];
    }
    const temperature = await this.getSignal(deviceKey, "TEMP");
    return [voltage, current, resistance, temperature];
  }
}
