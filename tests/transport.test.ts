import { describe, it, expect } from "vitest";
import { decodeValue } from "../src/codec.js";
import { parseResponse } from "../src/protocol.js";
import { FatalCommunicationError, TransportError, takeLine } from "../src/transport.js";

describe("takeLine", () => {
  it("should split on LF and keep the rest", () => {
    const taken = takeLine(Buffer.from("abc\n\r"));
    expect(taken?.line).toBe("abc");
    expect(taken?.rest.toString()).toBe("\r");
  });

  it("should skip leftover terminators and trim trailing spaces", () => {
    const taken = takeLine(Buffer.from("\rabc  \r\n"));
    expect(taken?.line).toBe("abc");
    expect(taken?.rest.toString()).toBe("\n");
  });

  it("should return null until a terminator arrives", () => {
    expect(takeLine(Buffer.from("partial"))).toBeNull();
    expect(takeLine(Buffer.from("\r\n"))).toBeNull();
    expect(takeLine(Buffer.alloc(0))).toBeNull();
  });

  it("should read the micro sign as a single latin1 byte", () => {
    const taken = takeLine(Buffer.from("STAT:SIG:CURR:3.3\u00b5A\n", "latin1"));
    expect(taken?.line).toBe("STAT:SIG:CURR:3.3\u00b5A");
    expect(decodeValue(parseResponse(taken?.line ?? ""))).toBeCloseTo(3.3e-6, 18);
  });
});

describe("errors", () => {
  it("FatalCommunicationError should carry command, attempts and cause", () => {
    const cause = new TransportError("Connection closed before reply");
    const err = new FatalCommunicationError("*IDN?", 5, cause);
    expect(err.name).toBe("FatalCommunicationError");
    expect(err.command).toBe("*IDN?");
    expect(err.attempts).toBe(5);
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Communication failed 5 times for "*IDN?", aborting');
  });
});
