/**
 * Long-running acquisition loops: temperature logging and sensor
 * calibration. Both run until their AbortSignal fires; the check happens
 * between samples, so a command already on the wire is always completed.
 */

import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { InstrumentClient } from "./client.js";
import { writeTable } from "./datalog.js";
import { resolveLogger, type LoggingOptions } from "./logger.js";
import { FatalCommunicationError, errorMessage } from "./transport.js";

// ---------- Shared ----------

interface LoopOptions extends LoggingOptions {
  /** Stops the loop once aborted */
  signal?: AbortSignal;
  /** Pause between samples, in ms. Default: 1000 */
  interval?: number;
}

async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
}

// ---------- Temperature polling ----------

export interface TemperatureSample {
  /** Seconds since polling started */
  elapsed: number;
  /** Kelvin, in the order of the polled devices */
  temperatures: number[];
}

export interface PollOptions extends LoopOptions {
  /** Device keys to read. Default: ["mb1", "db6", "db7"] */
  devices?: readonly string[];
  /** Log file, rewritten after every sample. Default: tempLog_<start>.txt; null disables it */
  output?: string | null;
  /** Skip a sample instead of stopping when communication fails for good */
  continueOnError?: boolean;
  onSample?: (sample: TemperatureSample) => void;
}

/** Poll device temperatures until aborted; resolves with every sample taken. */
export async function pollTemperatures(
  client: InstrumentClient,
  options: PollOptions = {}
): Promise<TemperatureSample[]> {
  const devices = options.devices ?? ["mb1", "db6", "db7"];
  const interval = options.interval ?? 1000;
  const log = resolveLogger(options);
  const start = Date.now();
  const output =
    options.output === undefined ? `tempLog_${start}.txt` : options.output;
  const header = ["Time", ...devices.map((_, i) => `T${i + 1}`)].join("\t");

  const samples: TemperatureSample[] = [];

  while (!options.signal?.aborted) {
    const elapsed = (Date.now() - start) / 1000;
    const temperatures: number[] = [];

    try {
      for (const device of devices) {
        temperatures.push(await client.getSignal(device, "TEMP"));
      }
    } catch (err) {
      if (!(options.continueOnError && err instanceof FatalCommunicationError)) {
        throw err;
      }
      log.error(`Sample skipped: ${errorMessage(err)}`);
      await pause(interval, options.signal);
      continue;
    }

    const sample = { elapsed, temperatures };
    samples.push(sample);
    log.info(
      devices
        .map((device, i) => `${device.toUpperCase()} ${temperatures[i].toFixed(3)} K`)
        .join("    ")
    );
    options.onSample?.(sample);

    if (output !== null) {
      await writeTable(
        output,
        samples.map((s) => [s.elapsed, ...s.temperatures]),
        header
      );
    }

    await pause(interval, options.signal);
  }

  return samples;
}

// ---------- Calibration ----------

export interface CalibrationOptions extends LoopOptions {
  /** Output names of the two sensors being calibrated */
  names: readonly [string, string];
  /** Device key of the calibrated reference sensor. Default: "db7" */
  reference?: string;
  /** Device keys of the two sensors being calibrated. Default: ["db6", "mb1"] */
  sensors?: readonly [string, string];
  /** Directory the data files are written to. Default: "." */
  directory?: string;
  /** Excitation line written to the per-sensor files. Default: "Constant Voltage, 7mV" */
  excitation?: string;
  onSample?: (row: readonly number[]) => void;
}

export interface CalibrationResult {
  samples: number;
  minTemperature?: number;
  maxTemperature?: number;
}

/**
 * Record the reference readout (V, I, R, T) next to the V, I, R readouts of
 * two uncalibrated sensors until aborted.
 *
 * Writes `calibration.txt` with all ten columns and `<name>.dat` with
 * temperature and resistance for each sensor. The controller boards must
 * already be configured for the excitation in use.
 */
export async function runCalibration(
  client: InstrumentClient,
  options: CalibrationOptions
): Promise<CalibrationResult> {
  const reference = options.reference ?? "db7";
  const [first, second] = options.sensors ?? ["db6", "mb1"];
  const [firstName, secondName] = options.names;
  const directory = options.directory ?? ".";
  const interval = options.interval ?? 1000;
  const excitation = options.excitation ?? "Constant Voltage, 7mV";
  const log = resolveLogger(options);

  const header = [
    "######################################",
    "",
    "  Calibration Log",
    "",
    `  Reference sensor: ${reference}`,
    "  (Columns 1 to 4: Voltage, Current, Resistance, Temperature)",
    "",
    `  First sensor to calibrate: ${firstName}`,
    "  (Columns 5 to 7: Voltage, Current, Resistance)",
    "",
    `  Second sensor to calibrate: ${secondName}`,
    "  (Columns 8 to 10: Voltage, Current, Resistance)",
    "",
    "######################################",
  ].join("\n");
  const sensorHeader = `Temperature (K)\t Resistance (Ohm)\nExcitation: ${excitation}`;

  const rows: number[][] = [];

  while (!options.signal?.aborted) {
    const cal = await client.getSensorReadout(reference, true);
    const a = await client.getSensorReadout(first);
    const b = await client.getSensorReadout(second);

    const row = [...cal, ...a, ...b];
    rows.push(row);
    log.info(`Rc: ${cal[2]} T: ${cal[3]} R1: ${a[2]} R2: ${b[2]}`);
    options.onSample?.(row);

    await writeTable(join(directory, "calibration.txt"), rows, header);
    await writeTable(
      join(directory, `${firstName}.dat`),
      rows.map((r) => [r[3], r[6]]),
      sensorHeader
    );
    await writeTable(
      join(directory, `${secondName}.dat`),
      rows.map((r) => [r[3], r[9]]),
      sensorHeader
    );

    await pause(interval, options.signal);
  }

  if (rows.length === 0) {
    return { samples: 0 };
  }

  const temperatures = rows.map((r) => r[3]);
  const result = {
    samples: rows.length,
    minTemperature: Math.min(...temperatures),
    maxTemperature: Math.max(...temperatures),
  };
  log.info(`Minimum temperature achieved: ${result.minTemperature}`);
  log.info(`Maximum temperature achieved: ${result.maxTemperature}`);
  return result;
}
