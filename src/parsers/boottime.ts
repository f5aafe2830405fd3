import { ParseError } from "../errors";
import { parseDecimal, splitLines, stripUnit } from "./text";

/**
 * Parse a boot-time report whose first line reads `<label>=<value><unit>`,
 * e.g. `total=1234.56ms`. Returns milliseconds.
 */
export function parseBoottime(content: string, source: string): number {
  const first = splitLines(content)[0] ?? "";
  if (first.trim() === "") {
    throw new ParseError(source, "empty boot-time report", 1);
  }

  const eq = first.indexOf("=");
  if (eq === -1) {
    throw new ParseError(
      source,
      `expected '<label>=<value><unit>', got '${first}'`,
      1,
    );
  }

  const value = first.slice(eq + 1).trim();
  return parseDecimal(stripUnit(value), source, 1);
}
