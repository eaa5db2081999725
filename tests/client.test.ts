import { describe, it, expect, vi } from "vitest";
import { setTimeout as delay } from "node:timers/promises";
import { InstrumentClient } from "../src/client.js";
import { DecodeError } from "../src/codec.js";
import { NetworkTransport } from "../src/network.js";
import { UnknownDeviceError } from "../src/registry.js";
import { SerialTransport, type ByteStream } from "../src/serial.js";
import {
  FatalCommunicationError,
  TransportError,
  type Transport,
} from "../src/transport.js";

/** Transport that answers from a function and records every line. */
class ScriptedTransport implements Transport {
  public readonly kind = "network" as const;
  public isOpen = false;
  public lines: string[] = [];

  constructor(private readonly reply: (line: string) => Promise<string> | string) {}

  async open(): Promise<void> {
    this.isOpen = true;
  }

  async query(line: string): Promise<string> {
    this.lines.push(line);
    return this.reply(line);
  }

  async send(line: string): Promise<void> {
    this.lines.push(line);
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }
}

const SIGNAL_VALUES: Record<string, string> = {
  VOLT: "7.000000mV",
  CURR: "1.500000\u00b5A",
  RES: "4.666667kO",
  TEMP: "290.1200K",
};

/** Echo the READ path back the way the controller does, with a value. */
function signalReply(line: string): string {
  const signal = line.split(":").pop() ?? "";
  return `STAT:${line.slice("READ:".length)}:${SIGNAL_VALUES[signal] ?? "0.0xV"}`;
}

describe("InstrumentClient", () => {
  it("getIdentity should return the raw reply without device lookup", async () => {
    const transport = new ScriptedTransport(
      () => "IDN:OXFORD INSTRUMENTS:MERCURY ITC:SN0001:2.5.09"
    );
    const client = new InstrumentClient(transport);
    const resolve = vi.spyOn(client.devices, "resolve");

    expect(await client.getIdentity()).toBe(
      "IDN:OXFORD INSTRUMENTS:MERCURY ITC:SN0001:2.5.09"
    );
    expect(transport.lines).toEqual(["*IDN?"]);
    expect(resolve).not.toHaveBeenCalled();
  });

  it("listDevices should read the catalogue without device lookup", async () => {
    const transport = new ScriptedTransport(
      () => "STAT:SYS:CAT:DEV:DB7.T1:TEMP:DEV:MB1.T1:TEMP"
    );
    const client = new InstrumentClient(transport);
    const resolve = vi.spyOn(client.devices, "resolve");

    expect(await client.listDevices()).toBe(
      "STAT:SYS:CAT:DEV:DB7.T1:TEMP:DEV:MB1.T1:TEMP"
    );
    expect(transport.lines).toEqual(["READ:SYS:CAT"]);
    expect(resolve).not.toHaveBeenCalled();
  });

  it("getSignal should resolve, read and decode", async () => {
    const transport = new ScriptedTransport(signalReply);
    const client = new InstrumentClient(transport);

    expect(await client.getSignal("db6", "VOLT")).toBeCloseTo(0.007, 15);
    expect(transport.lines).toEqual(["READ:DEV:DB6.T1:TEMP:SIG:VOLT"]);
  });

  it("getSignal should use a configured device map", async () => {
    const transport = new ScriptedTransport(signalReply);
    const client = new InstrumentClient(transport, {
      devices: { probe: "DEV:MB0.T1:TEMP" },
    });

    expect(await client.getSignal("probe", "TEMP")).toBe(290.12);
    expect(transport.lines).toEqual(["READ:DEV:MB0.T1:TEMP:SIG:TEMP"]);
  });

  it("getSignal should reject unknown devices before sending", async () => {
    const transport = new ScriptedTransport(signalReply);
    const client = new InstrumentClient(transport);

    await expect(client.getSignal("db9", "TEMP")).rejects.toBeInstanceOf(
      UnknownDeviceError
    );
    expect(transport.lines).toEqual([]);
  });

  it("getSignal should surface DecodeError with the offending token", async () => {
    const transport = new ScriptedTransport(signalReply);
    const client = new InstrumentClient(transport);

    await expect(client.getSignal("db7", "HTR")).rejects.toThrow(
      'Cannot decode "0.0xV": unknown SI prefix "x"'
    );
    await expect(client.getSignal("db7", "HTR")).rejects.toBeInstanceOf(
      DecodeError
    );
  });

  it("getSignal should never return a value after communication failed", async () => {
    const failure = new FatalCommunicationError(
      "READ:DEV:DB7.T1:TEMP:SIG:TEMP",
      5,
      new TransportError("Connection closed before reply")
    );
    const transport = new ScriptedTransport(() => Promise.reject(failure));
    const client = new InstrumentClient(transport);

    await expect(client.getSignal("db7", "TEMP")).rejects.toBe(failure);
  });

  it("setRaw should send SET with the caller's payload", async () => {
    const transport = new ScriptedTransport(signalReply);
    const client = new InstrumentClient(transport);

    await client.setRaw("DEV:DB7.T1:TEMP:LOOP:TSET:300");
    expect(transport.lines).toEqual(["SET:DEV:DB7.T1:TEMP:LOOP:TSET:300"]);
  });

  it("setDeviceValue should encode the magnitude below the device address", async () => {
    const transport = new ScriptedTransport(signalReply);
    const client = new InstrumentClient(transport);

    await client.setDeviceValue("db7", "TYPE:NTC:EXCT:TYPE:UNIP:MAG", 0.007, "mV");
    expect(transport.lines).toEqual([
      "SET:DEV:DB7.T1:TEMP:TYPE:NTC:EXCT:TYPE:UNIP:MAG:7",
    ]);
  });

  it("getSensorReadout should read VOLT, CURR and RES in order", async () => {
    const client = new InstrumentClient(new ScriptedTransport(signalReply));
    const getSignal = vi.spyOn(client, "getSignal");

    const [voltage, current, resistance] = await client.getSensorReadout("db6");

    expect(getSignal.mock.calls).toEqual([
      ["db6", "VOLT"],
      ["db6", "CURR"],
      ["db6", "RES"],
    ]);
    expect(voltage).toBeCloseTo(0.007, 15);
    expect(current).toBeCloseTo(1.5e-6, 18);
    expect(resistance).toBeCloseTo(4666.667, 9);
  });

  it("getSensorReadout should add TEMP when asked", async () => {
    const client = new InstrumentClient(new ScriptedTransport(signalReply));
    const getSignal = vi.spyOn(client, "getSignal");

    const readout = await client.getSensorReadout("db7", true);

    expect(getSignal.mock.calls).toEqual([
      ["db7", "VOLT"],
      ["db7", "CURR"],
      ["db7", "RES"],
      ["db7", "TEMP"],
    ]);
    expect(readout).toHaveLength(4);
    expect(readout[3]).toBe(290.12);
  });

  it("should never overlap two exchanges", async () => {
    let active = 0;
    let maxActive = 0;
    const transport = new ScriptedTransport(async (line) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await delay(line.endsWith("VOLT") ? 20 : 1);
      active--;
      return signalReply(line);
    });
    const client = new InstrumentClient(transport);

    const [volt, temp] = await Promise.all([
      client.getSignal("db7", "VOLT"),
      client.getSignal("db7", "TEMP"),
    ]);

    expect(maxActive).toBe(1);
    expect(transport.lines).toEqual([
      "READ:DEV:DB7.T1:TEMP:SIG:VOLT",
      "READ:DEV:DB7.T1:TEMP:SIG:TEMP",
    ]);
    expect(volt).toBeCloseTo(0.007, 15);
    expect(temp).toBe(290.12);
  });

  it("should keep serving commands after a failed one", async () => {
    let calls = 0;
    const transport = new ScriptedTransport((line) => {
      calls++;
      if (calls === 1) {
        return Promise.reject(new TransportError("No reply"));
      }
      return signalReply(line);
    });
    const client = new InstrumentClient(transport);

    const first = client.getSignal("db7", "TEMP");
    const second = client.getSignal("db7", "TEMP");

    await expect(first).rejects.toThrow("No reply");
    expect(await second).toBe(290.12);
  });

  it("open and close should drive the transport", async () => {
    const transport = new ScriptedTransport(signalReply);
    const client = new InstrumentClient(transport);

    await client.open();
    expect(transport.isOpen).toBe(true);
    await client.close();
    expect(transport.isOpen).toBe(false);
  });

  it("network() should build a per-call network transport", () => {
    const client = InstrumentClient.network({ host: "10.1.15.220" });
    expect(client.transport).toBeInstanceOf(NetworkTransport);
    expect(client.transport.kind).toBe("network");
  });

  it("serial() should build a persistent serial transport", () => {
    const stream: ByteStream = {
      open: async () => {},
      write: async () => {},
      flush: async () => {},
      close: async () => {},
      onData: () => {},
      onError: () => {},
    };
    const client = InstrumentClient.serial({ path: "/dev/ttyACM0", stream });
    expect(client.transport).toBeInstanceOf(SerialTransport);
    expect(client.transport.kind).toBe("serial");
  });
});
