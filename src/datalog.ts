/**
 * Numeric text files written by the polling and calibration loops: a
 * `#`-prefixed header followed by one space-separated row per sample.
 */

import { writeFile } from "node:fs/promises";

/** C-style `%.6e` formatting, e.g. 123.456 gives `1.234560e+02`. */
export function formatScientific(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";

  return value
    .toExponential(6)
    .replace(/e([+-])(\d+)$/, (_match, sign: string, digits: string) =>
      `e${sign}${digits.padStart(2, "0")}`
    );
}

/** Render rows under a header; every header line is prefixed with `#`. */
export function renderTable(
  rows: readonly (readonly number[])[],
  header: string
): string {
  const lines = header.split("\n").map((line) => `#${line}`);
  for (const row of rows) {
    lines.push(row.map(formatScientific).join(" "));
  }
  return lines.join("\n") + "\n";
}

/** Rewrite `path` with the full table. */
export async function writeTable(
  path: string,
  rows: readonly (readonly number[])[],
  header: string
): Promise<void> {
  await writeFile(path, renderTable(rows, header), "utf8");
}
