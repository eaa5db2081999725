/**
 * Device map files for the CLI: a JSON object of device key to address, e.g.
 * `{ "db7": "DEV:DB7.T1:TEMP" }`.
 */

import { readFile } from "node:fs/promises";
import { errorMessage } from "./transport.js";

export class ConfigError extends Error {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`Invalid device file ${file}: ${message}`);
    this.name = "ConfigError";
    this.file = file;
  }
}

/** Validate parsed JSON as a non-empty map of non-empty strings. */
export function parseDeviceMap(
  file: string,
  data: unknown
): Record<string, string> {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError(file, "expected an object of device key to address");
  }

  const devices: Record<string, string> = {};
  for (const [key, address] of Object.entries(data)) {
    if (typeof address !== "string" || address.trim() === "") {
      throw new ConfigError(file, `address of "${key}" must be a non-empty string`);
    }
    devices[key] = address.trim();
  }

  if (Object.keys(devices).length === 0) {
    throw new ConfigError(file, "no devices defined");
  }
  return devices;
}

export async function loadDeviceMap(file: string): Promise<Record<string, string>> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    throw new ConfigError(file, errorMessage(err));
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(file, errorMessage(err));
  }
  return parseDeviceMap(file, data);
}
