#!/usr/bin/env node

/**
 * mercury-itc CLI – command-line access to an Oxford Mercury ITC
 * temperature controller over serial or Ethernet.
 */

import { Command } from "commander";
import { InstrumentClient } from "./client.js";
import { loadDeviceMap } from "./config.js";
import { pollTemperatures, runCalibration } from "./polling.js";
import { runWithClient } from "./session.js";

const DEFAULT_HOST = "10.1.15.220";

interface GlobalOptions {
  serial?: string;
  baud: number;
  host?: string;
  port: number;
  devices?: string;
  verbose: boolean;
}

const program = new Command();

program
  .name("mercury-itc")
  .description(
    "CLI for reading and setting an Oxford Mercury ITC temperature controller"
  )
  .version("1.0.0")
  .option("--serial <path>", "Serial device path (e.g. /dev/ttyACM0)")
  .option("--baud <number>", "Serial baud rate", (v: string) => parseInt(v, 10), 115200)
  .option("--host <ip>", `Controller IP address (default: ${DEFAULT_HOST})`)
  .option("-p, --port <number>", "TCP port", (v: string) => parseInt(v, 10), 7020)
  .option("-d, --devices <file>", "JSON file mapping device keys to addresses")
  .option("-v, --verbose", "Enable verbose logging", false);

// ---------- Helpers ----------

async function createClient(opts: GlobalOptions): Promise<InstrumentClient> {
  const devices = opts.devices ? await loadDeviceMap(opts.devices) : undefined;
  if (opts.serial) {
    return InstrumentClient.serial({
      path: opts.serial,
      baudRate: opts.baud,
      devices,
      verbose: opts.verbose,
    });
  }
  return InstrumentClient.network({
    host: opts.host ?? DEFAULT_HOST,
    port: opts.port,
    devices,
    verbose: opts.verbose,
  });
}

async function withClient(
  command: Command,
  action: (client: InstrumentClient) => Promise<void>
): Promise<void> {
  const ok = await runWithClient(
    () => createClient(command.optsWithGlobals<GlobalOptions>()),
    action
  );
  if (!ok) {
    process.exitCode = 1;
  }
}

/** AbortSignal fired by the first Ctrl-C. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("Interrupt caught, finishing.");
    controller.abort();
  });
  return controller.signal;
}

// ---------- identity ----------

program
  .command("identity")
  .description("Print the controller identity (*IDN?)")
  .action(async (_opts: unknown, command: Command) => {
    await withClient(command, async (client) => {
      console.log(await client.getIdentity());
    });
  });

// ---------- devices ----------

program
  .command("devices")
  .description("List the devices the controller reports (SYS:CAT)")
  .action(async (_opts: unknown, command: Command) => {
    await withClient(command, async (client) => {
      console.log(await client.listDevices());
    });
  });

// ---------- read ----------

program
  .command("read")
  .description("Read a signal of a device, in base units")
  .argument("<device>", "Device key (e.g. db7)")
  .argument("<signal>", "Signal name (TEMP, VOLT, CURR, RES ...)")
  .action(async (device: string, signal: string, _opts: unknown, command: Command) => {
    await withClient(command, async (client) => {
      console.log(await client.getSignal(device, signal.toUpperCase()));
    });
  });

// ---------- readout ----------

program
  .command("readout")
  .description("Read voltage, current, resistance (and temperature) of a device")
  .argument("<device>", "Device key (e.g. db6)")
  .option("-T, --temperature", "Include the temperature", false)
  .action(
    async (device: string, opts: { temperature: boolean }, command: Command) => {
      await withClient(command, async (client) => {
        const values = await client.getSensorReadout(device, opts.temperature);
        console.log(JSON.stringify(values));
      });
    }
  );

// ---------- set ----------

program
  .command("set")
  .description("Send SET:<payload> to the controller")
  .argument("<payload>", "Full path and value, e.g. DEV:DB7.T1:TEMP:LOOP:TSET:300")
  .action(async (payload: string, _opts: unknown, command: Command) => {
    await withClient(command, async (client) => {
      await client.setRaw(payload);
    });
  });

// ---------- set-value ----------

program
  .command("set-value")
  .description("Set a numeric parameter of a device")
  .argument("<device>", "Device key (e.g. db7)")
  .argument("<path>", "Parameter path below the device, e.g. TYPE:NTC:EXCT:TYPE:UNIP:MAG")
  .argument("<value>", "Value in base units", parseFloat)
  .argument("<unit>", "Unit the controller expects, e.g. mV")
  .action(
    async (
      device: string,
      path: string,
      value: number,
      unit: string,
      _opts: unknown,
      command: Command
    ) => {
      await withClient(command, async (client) => {
        await client.setDeviceValue(device, path, value, unit);
      });
    }
  );

// ---------- poll ----------

program
  .command("poll")
  .description("Log device temperatures until interrupted")
  .argument("[devices...]", "Device keys to poll", ["mb1", "db6", "db7"])
  .option("-i, --interval <ms>", "Pause between samples", (v: string) => parseInt(v, 10), 1000)
  .option("-o, --output <file>", "Log file (default: tempLog_<start>.txt)")
  .option("--continue-on-error", "Skip samples whose communication fails", false)
  .action(
    async (
      devices: string[],
      opts: { interval: number; output?: string; continueOnError: boolean },
      command: Command
    ) => {
      await withClient(command, async (client) => {
        const samples = await pollTemperatures(client, {
          devices,
          interval: opts.interval,
          output: opts.output,
          continueOnError: opts.continueOnError,
          signal: interruptSignal(),
          verbose: true,
        });
        console.log(`${samples.length} samples recorded.`);
      });
    }
  );

// ---------- calibrate ----------

program
  .command("calibrate")
  .description(
    "Record reference and sensor readouts for calibration until interrupted"
  )
  .argument("<sensorA>", "Name of the sensor on the first calibration device")
  .argument("<sensorB>", "Name of the sensor on the second calibration device")
  .option("-r, --reference <device>", "Reference device key", "db7")
  .option("-s, --sensors <devices...>", "Device keys of the two sensors", ["db6", "mb1"])
  .option("-i, --interval <ms>", "Pause between samples", (v: string) => parseInt(v, 10), 1000)
  .option("-o, --directory <dir>", "Output directory", ".")
  .action(
    async (
      sensorA: string,
      sensorB: string,
      opts: { reference: string; sensors: string[]; interval: number; directory: string },
      command: Command
    ) => {
      if (opts.sensors.length !== 2) {
        console.error("Error: --sensors takes exactly two device keys");
        process.exitCode = 1;
        return;
      }
      const [first, second] = opts.sensors;
      await withClient(command, async (client) => {
        const result = await runCalibration(client, {
          names: [sensorA, sensorB],
          reference: opts.reference,
          sensors: [first, second],
          interval: opts.interval,
          directory: opts.directory,
          signal: interruptSignal(),
          verbose: true,
        });
        console.log(`${result.samples} samples recorded.`);
        if (result.minTemperature !== undefined) {
          console.log(`Minimum temperature achieved: ${result.minTemperature}`);
          console.log(`Maximum temperature achieved: ${result.maxTemperature}`);
        }
      });
    }
  );

await program.parseAsync();
