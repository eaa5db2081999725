/**
 * SI-prefixed value encoding and decoding.
 *
 * The controller reports readings as a mantissa followed by an optional
 * magnitude prefix and a one-letter unit, e.g. `7.000000mV` or `290.1200K`.
 */

// ---------- Prefix table ----------

export const SI_PREFIXES: Readonly<Record<string, number>> = {
  M: 1e6,
  k: 1e3,
  m: 1e-3,
  "\u00b5": 1e-6, // micro sign
  n: 1e-9,
  p: 1e-12,
};

// ---------- Errors ----------

export class DecodeError extends Error {
  public readonly token: string;

  constructor(token: string, reason: string) {
    super(`Cannot decode "${token}": ${reason}`);
    this.name = "DecodeError";
    this.token = token;
  }
}

// ---------- Helpers ----------

/** Return the multiplier for a prefix character, or undefined if unknown. */
export function prefixFactor(prefix: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(SI_PREFIXES, prefix)
    ? SI_PREFIXES[prefix]
    : undefined;
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function isSpace(char: string): boolean {
  return /\s/.test(char);
}

/** Plain decimal or exponent notation; no hex, binary, octal or Infinity. */
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseMantissa(token: string, text: string): number {
  const numeral = text.trim();
  if (numeral === "") {
    throw new DecodeError(token, "missing numeral");
  }
  if (!DECIMAL.test(numeral)) {
    throw new DecodeError(token, `malformed numeral "${numeral}"`);
  }
  return Number(numeral);
}

// ---------- Public API ----------

/**
 * Decode a value token into a number in base units.
 *
 * The last character is the unit letter and is dropped together with the
 * character before it. When that character is a digit the remaining text is
 * returned unscaled; otherwise it must be a known SI prefix. Whitespace is
 * tolerated around the numeral, between prefix and unit, and at the end;
 * anywhere inside the numeral it is an error.
 *
 * @throws DecodeError when the prefix is unknown or the numeral is malformed
 */
export function decodeValue(token: string): number {
  const text = token.trimEnd();
  let markerIndex = text.length - 2;
  while (markerIndex >= 0 && isSpace(text[markerIndex])) {
    markerIndex--;
  }
  if (markerIndex < 0) {
    throw new DecodeError(token, "token too short");
  }

  const marker = text[markerIndex];
  const mantissa = parseMantissa(token, text.slice(0, markerIndex));

  if (isDigit(marker)) {
    return mantissa;
  }

  const factor = prefixFactor(marker);
  if (factor === undefined) {
    throw new DecodeError(token, `unknown SI prefix "${marker}"`);
  }
  return mantissa * factor;
}

/**
 * Render a base-unit value as the bare fixed-point literal the controller
 * expects for a parameter given in `unit` (e.g. 0.007 with "mV" gives "7").
 *
 * Only a two-character unit made of a known prefix and a unit letter is
 * scaled; longer units such as "min" or "mol" are taken as base units.
 */
export function encodeMagnitude(value: number, unit = ""): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot encode non-finite value ${value}`);
  }

  const factor = unit.length === 2 ? (prefixFactor(unit[0]) ?? 1) : 1;
  const fixed = (value / factor).toFixed(6);
  const trimmed = fixed.replace(/\.?0+$/, "");
  return trimmed === "-0" ? "0" : trimmed;
}
