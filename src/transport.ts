/**
 * Transport capability shared by the serial and network links.
 *
 * A transport carries one command line at a time. `query` writes a line and
 * returns the reply line with trailing whitespace removed; `send` writes a
 * SET line and deals with the acknowledgement the way its link requires.
 */

import { setTimeout as delay } from "node:timers/promises";

// ---------- Errors ----------

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class FatalCommunicationError extends Error {
  public readonly command: string;
  public readonly attempts: number;

  constructor(command: string, attempts: number, cause: unknown) {
    super(`Communication failed ${attempts} times for "${command}", aborting`, {
      cause,
    });
    this.name = "FatalCommunicationError";
    this.command = command;
    this.attempts = attempts;
  }
}

// ---------- Transport interface ----------

export type TransportKind = "serial" | "network";

export interface Transport {
  readonly kind: TransportKind;
  /** Whether the transport can carry a command right now. */
  readonly isOpen: boolean;
  open(): Promise<void>;
  query(line: string): Promise<string>;
  send(line: string): Promise<void>;
  close(): Promise<void>;
}

// ---------- Helpers ----------

export async function sleep(ms: number): Promise<void> {
  if (ms > 0) {
    await delay(ms);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Take the first complete line out of `buffer`. Leading terminator bytes left
 * over from a previous `\n\r` or `\r\n` pair are skipped; either CR or LF ends
 * a line. Bytes are read as latin1 so the micro sign (0xB5) survives.
 */
export function takeLine(buffer: Buffer): { line: string; rest: Buffer } | null {
  let start = 0;
  while (start < buffer.length && (buffer[start] === 0x0a || buffer[start] === 0x0d)) {
    start++;
  }

  for (let i = start; i < buffer.length; i++) {
    if (buffer[i] === 0x0a || buffer[i] === 0x0d) {
      return {
        line: buffer.subarray(start, i).toString("latin1").trimEnd(),
        rest: buffer.subarray(i + 1),
      };
    }
  }
  return null;
}
