/**
 * mercury-itc – A TypeScript client for Oxford Mercury ITC temperature
 * controllers over serial or Ethernet.
 */

// Client
export { InstrumentClient } from "./client.js";
export type {
  InstrumentClientOptions,
  SensorReadout,
  SensorReadoutWithTemperature,
} from "./client.js";

// Transports
export {
  TransportError,
  FatalCommunicationError,
  takeLine,
} from "./transport.js";
export type { Transport, TransportKind } from "./transport.js";
export { SerialTransport, createSerialStream } from "./serial.js";
export type { SerialTransportOptions, ByteStream } from "./serial.js";
export { NetworkTransport } from "./network.js";
export type { NetworkTransportOptions } from "./network.js";

// Protocol and values
export {
  Verb,
  IDENTITY_QUERY,
  CATALOGUE_PATH,
  SERIAL_TERMINATOR,
  NETWORK_TERMINATOR,
  buildQuery,
  buildRead,
  buildSet,
  serialize,
  parseResponse,
} from "./protocol.js";
export type { Command, VerbValue } from "./protocol.js";
export {
  SI_PREFIXES,
  DecodeError,
  decodeValue,
  encodeMagnitude,
  prefixFactor,
} from "./codec.js";

// Devices and configuration
export { DeviceRegistry, UnknownDeviceError, DEFAULT_DEVICES } from "./registry.js";
export { ConfigError, loadDeviceMap, parseDeviceMap } from "./config.js";

// Acquisition loops
export { pollTemperatures, runCalibration } from "./polling.js";
export { runWithClient } from "./session.js";
export type {
  PollOptions,
  TemperatureSample,
  CalibrationOptions,
  CalibrationResult,
} from "./polling.js";
export { formatScientific, renderTable, writeTable } from "./datalog.js";

// Logging
export { nullLogger, createConsoleLogger } from "./logger.js";
export type { Logger, LoggingOptions } from "./logger.js";
