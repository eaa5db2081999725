/**
 * Command construction and reply parsing for the Mercury ITC command set.
 */

// ---------- Constants ----------

export const Verb = {
  READ: "READ:",
  SET: "SET:",
  NONE: "",
} as const;

export type VerbValue = (typeof Verb)[keyof typeof Verb];

export const IDENTITY_QUERY = "*IDN?";
export const CATALOGUE_PATH = "SYS:CAT";

/** Line terminators written by each transport. Replies may use either. */
export const SERIAL_TERMINATOR = "\n\r";
export const NETWORK_TERMINATOR = "\r\n";

// ---------- Types ----------

export interface Command {
  readonly verb: VerbValue;
  readonly path: string;
}

// ---------- Builders ----------

/** Build a command that bypasses the READ/SET convention, e.g. `*IDN?`. */
export function buildQuery(path: string, verb: VerbValue = Verb.NONE): Command {
  return { verb, path };
}

/**
 * Build a READ command. With a signal the path becomes
 * `<address>:SIG:<signal>`; without one the address is read as given.
 */
export function buildRead(address: string, signal?: string): Command {
  const path = signal === undefined ? address : `${address}:SIG:${signal}`;
  return { verb: Verb.READ, path };
}

/** Build a SET command; the caller supplies the full path and value. */
export function buildSet(path: string): Command {
  return { verb: Verb.SET, path };
}

/** Text written on the wire, without the terminator. */
export function serialize(command: Command): string {
  return command.verb + command.path;
}

// ---------- Parsing ----------

/**
 * Return the last colon-delimited field of a reply. The echoed prefix
 * (`STAT:`, `READ:` ...) is not checked.
 */
export function parseResponse(raw: string): string {
  const fields = raw.split(":");
  return fields[fields.length - 1];
}
