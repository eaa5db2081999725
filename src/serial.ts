/**
 * Persistent serial link to the temperature controller.
 *
 * The port stays open for the life of the transport. The firmware needs a
 * settle period after the line is opened and is slow to process writes, so
 * every write is followed by a fixed pause and exactly one reply line is read
 * before the next command goes out.
 */

import { SerialPort } from "serialport";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";
import { SERIAL_TERMINATOR } from "./protocol.js";
import {
  TransportError,
  errorMessage,
  sleep,
  takeLine,
  type Transport,
} from "./transport.js";

// ---------- Byte stream ----------

/** Minimal byte stream the serial transport drives. */
export interface ByteStream {
  open(): Promise<void>;
  write(data: Buffer): Promise<void>;
  /** Discard bytes buffered by the driver. */
  flush(): Promise<void>;
  close(): Promise<void>;
  onData(listener: (chunk: Buffer) => void): void;
  onError(listener: (err: Error) => void): void;
}

/** Wrap a `serialport` port (opened lazily) as a ByteStream. */
export function createSerialStream(
  path: string,
  baudRate: number,
  stopBits: 1 | 2
): ByteStream {
  const port = new SerialPort({ path, baudRate, stopBits, autoOpen: false });

  return {
    open: () =>
      new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      }),
    write: (data) =>
      new Promise<void>((resolve, reject) => {
        port.write(data, (err) => {
          if (err) {
            reject(err);
            return;
          }
          port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
        });
      }),
    flush: () =>
      new Promise<void>((resolve, reject) => {
        port.flush((err) => (err ? reject(err) : resolve()));
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close((err) => (err ? reject(err) : resolve()));
      }),
    onData: (listener) => {
      port.on("data", listener);
    },
    onError: (listener) => {
      port.on("error", listener);
    },
  };
}

// ---------- Options ----------

export interface SerialTransportOptions extends LoggingOptions {
  /** Device path, e.g. /dev/ttyACM0 or COM3 */
  path: string;
  /** Default: 115200 */
  baudRate?: number;
  /** Default: 1 */
  stopBits?: 1 | 2;
  /** Time to wait for a reply line, in ms. Default: 1000 */
  readTimeout?: number;
  /** Pause after opening the port, in ms. Default: 2000 */
  settleDelay?: number;
  /** Pause after each write, in ms. Default: 3000 */
  writeDelay?: number;
  /** Stream to use instead of a real serial port */
  stream?: ByteStream;
}

interface PendingLine {
  check(): void;
  fail(err: Error): void;
}

// ---------- Transport ----------

export class SerialTransport implements Transport {
  public readonly kind = "serial" as const;
  public readonly path: string;
  public readonly baudRate: number;
  public readonly readTimeout: number;
  public readonly settleDelay: number;
  public readonly writeDelay: number;

  private readonly log: Logger;
  private readonly stream: ByteStream;
  private state: "closed" | "open" = "closed";
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingLine | null = null;

  constructor(options: SerialTransportOptions) {
    this.path = options.path;
    this.baudRate = options.baudRate ?? 115200;
    this.readTimeout = options.readTimeout ?? 1000;
    this.settleDelay = options.settleDelay ?? 2000;
    this.writeDelay = options.writeDelay ?? 3000;
    this.log = resolveLogger(options);
    this.stream =
      options.stream ??
      createSerialStream(this.path, this.baudRate, options.stopBits ?? 1);

    this.stream.onData((chunk) => {
      this.log.debug(`[${this.path}] RAW RECD: ${chunk.toString("latin1")}`);
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.pending?.check();
    });
    this.stream.onError((err) => {
      this.log.debug(`[${this.path}] Port error: ${err.message}`);
      this.pending?.fail(err);
    });
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  /** Open the port and wait for the controller to settle. */
  async open(): Promise<void> {
    if (this.state === "open") return;

    try {
      await this.stream.open();
    } catch (err) {
      throw new TransportError(`Cannot open ${this.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.log.debug(`Opened ${this.path} at ${this.baudRate} baud`);
    await sleep(this.settleDelay);
    this.state = "open";
  }

  /** Write a command and return its reply line. */
  async query(line: string): Promise<string> {
    await this.write(line);
    const reply = await this.receiveLine();
    await this.flushInput();
    return reply;
  }

  /** Write a SET command and consume its acknowledgement line. */
  async send(line: string): Promise<void> {
    await this.write(line);
    const ack = await this.receiveLine();
    await this.flushInput();
    this.log.debug(`[${this.path}] ACK: ${ack}`);
  }

  async close(): Promise<void> {
    if (this.state === "closed") return;
    this.state = "closed";
    this.pending?.fail(new Error("port closed"));
    this.buffer = Buffer.alloc(0);
    await this.stream.close();
    this.log.debug(`Closed ${this.path}`);
  }

  // ---------- Internals ----------

  private async write(line: string): Promise<void> {
    if (this.state !== "open") {
      throw new TransportError(`Serial port ${this.path} is not open`);
    }
    if (this.buffer.length > 0) {
      this.log.debug(
        `[DISCARDED] RECD: ${this.buffer.toString("latin1")}`
      );
      this.buffer = Buffer.alloc(0);
    }

    this.log.debug(`[${this.path}] SENT: ${line}`);
    try {
      await this.stream.write(Buffer.from(line + SERIAL_TERMINATOR, "latin1"));
    } catch (err) {
      throw new TransportError(`Write to ${this.path} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    await sleep(this.writeDelay);
  }

  private receiveLine(): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(
          new TransportError(
            `No reply from ${this.path} within ${this.readTimeout} ms`
          )
        );
      }, this.readTimeout);

      const pending: PendingLine = {
        check: () => {
          const taken = takeLine(this.buffer);
          if (taken === null) return;
          this.buffer = taken.rest;
          clearTimeout(timer);
          this.pending = null;
          resolve(taken.line);
        },
        fail: (err) => {
          clearTimeout(timer);
          this.pending = null;
          reject(
            new TransportError(`Read from ${this.path} failed: ${err.message}`, {
              cause: err,
            })
          );
        },
      };

      this.pending = pending;
      pending.check();
    });
  }

  /** Drop anything received after the reply line. */
  private async flushInput(): Promise<void> {
    if (this.buffer.length > 0) {
      this.log.debug(`[DISCARDED] RECD: ${this.buffer.toString("latin1")}`);
      this.buffer = Buffer.alloc(0);
    }
    await this.stream.flush();
  }
}
