/**
 * Per-call TCP link to the temperature controller's Ethernet interface.
 *
 * Every command opens a fresh connection, which is closed again once the
 * reply (or, for SET, the write) is done. A failed attempt is discarded
 * entirely and retried after a back-off; when all attempts fail the command
 * ends with a FatalCommunicationError instead of a value.
 */

import net from "node:net";
import { resolveLogger, type Logger, type LoggingOptions } from "./logger.js";
import { NETWORK_TERMINATOR } from "./protocol.js";
import {
  FatalCommunicationError,
  TransportError,
  errorMessage,
  sleep,
  type Transport,
} from "./transport.js";

// ---------- Options ----------

export interface NetworkTransportOptions extends LoggingOptions {
  /** IP address or host name of the controller */
  host: string;
  /** TCP port. Default: 7020 */
  port?: number;
  /** Maximum number of reply bytes kept. Default: 4096 */
  bufferSize?: number;
  /** Attempts per command before giving up. Default: 5 */
  attempts?: number;
  /** Back-off between attempts, in ms. Default: 1000 */
  retryDelay?: number;
  /** Pause before each read attempt, in ms. Default: 100 */
  throttle?: number;
  /** Socket inactivity timeout per attempt, in ms. Default: 10000 */
  timeout?: number;
}

// ---------- Transport ----------

export class NetworkTransport implements Transport {
  public readonly kind = "network" as const;
  public readonly host: string;
  public readonly port: number;
  public readonly bufferSize: number;
  public readonly attempts: number;
  public readonly retryDelay: number;
  public readonly throttle: number;
  public readonly timeout: number;

  private readonly log: Logger;

  constructor(options: NetworkTransportOptions) {
    this.host = options.host;
    this.port = options.port ?? 7020;
    this.bufferSize = options.bufferSize ?? 4096;
    this.attempts = options.attempts ?? 5;
    this.retryDelay = options.retryDelay ?? 1000;
    this.throttle = options.throttle ?? 100;
    this.timeout = options.timeout ?? 10000;
    this.log = resolveLogger(options);
  }

  /** No connection is held between commands, so the transport is always usable. */
  get isOpen(): boolean {
    return true;
  }

  async open(): Promise<void> {}

  async close(): Promise<void> {}

  /** Write a command and return the reply, retrying on any link failure. */
  async query(line: string): Promise<string> {
    return this.withRetry(line, true);
  }

  /** Write a SET command; the controller's reply is not read. */
  async send(line: string): Promise<void> {
    await this.withRetry(line, false);
  }

  // ---------- Internals ----------

  private async withRetry(line: string, expectReply: boolean): Promise<string> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      if (expectReply) {
        await sleep(this.throttle);
      }
      try {
        return await this.exchange(line, expectReply);
      } catch (err) {
        lastError = err;
        this.log.warn(
          `Communication failed on attempt ${attempt}: ${errorMessage(err)}`
        );
        if (attempt < this.attempts) {
          await sleep(this.retryDelay);
        }
      }
    }

    this.log.error(`Communication failed ${this.attempts} times, aborting`);
    throw new FatalCommunicationError(line, this.attempts, lastError);
  }

  /**
   * One attempt over a fresh socket. The reply is the first chunk received,
   * cut to `bufferSize` bytes; no attempt is made to wait for a terminator.
   */
  private exchange(line: string, expectReply: boolean): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const socket = new net.Socket();
      socket.setTimeout(this.timeout);
      let settled = false;

      const finish = (err: Error | null, reply = "") => {
        if (settled) return;
        settled = true;
        socket.destroy();
        if (err) {
          reject(err);
        } else {
          resolve(reply);
        }
      };

      socket.on("error", (err: Error) => {
        finish(
          new TransportError(
            `Connection to ${this.host}:${this.port} failed: ${err.message}`,
            { cause: err }
          )
        );
      });

      socket.on("timeout", () => {
        finish(new TransportError(`Timed out after ${this.timeout} ms`));
      });

      socket.on("close", () => {
        finish(new TransportError("Connection closed before reply"));
      });

      socket.on("data", (chunk: Buffer) => {
        const reply = chunk
          .subarray(0, this.bufferSize)
          .toString("latin1")
          .trimEnd();
        this.log.debug(`[${this.host}] RECD: ${reply}`);
        finish(null, reply);
      });

      socket.connect(this.port, this.host, () => {
        this.log.debug(`[${this.host}] SENT: ${line}`);
        socket.write(line + NETWORK_TERMINATOR, "latin1", (err) => {
          if (err) {
            finish(
              new TransportError(`Send failed: ${err.message}`, { cause: err })
            );
          } else if (!expectReply) {
            finish(null);
          }
        });
      });
    });
  }
}
