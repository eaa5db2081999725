/**
 * Device key to instrument address mapping.
 */

export const DEFAULT_DEVICES: Readonly<Record<string, string>> = {
  db7: "DEV:DB7.T1:TEMP",
  db6: "DEV:DB6.T1:TEMP",
  mb1: "DEV:MB1.T1:TEMP",
};

export class UnknownDeviceError extends Error {
  public readonly key: string;

  constructor(key: string, known: readonly string[]) {
    const list = known.length > 0 ? known.join(", ") : "none";
    super(`Unknown device "${key}" (configured: ${list})`);
    this.name = "UnknownDeviceError";
    this.key = key;
  }
}

export class DeviceRegistry {
  private readonly devices: ReadonlyMap<string, string>;

  constructor(devices: Readonly<Record<string, string>> = DEFAULT_DEVICES) {
    this.devices = new Map(Object.entries(devices));
  }

  /** Configured device keys, in configuration order. */
  get keys(): string[] {
    return [...this.devices.keys()];
  }

  has(key: string): boolean {
    return this.devices.has(key);
  }

  /** @throws UnknownDeviceError when the key is not configured */
  resolve(key: string): string {
    const address = this.devices.get(key);
    if (address === undefined) {
      throw new UnknownDeviceError(key, this.keys);
    }
    return address;
  }
}
