import { ParseError } from "../errors";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

/** Split file content into lines, tolerating CRLF endings. */
export function splitLines(content: string): string[] {
  return content.split("\n").map((line) => line.replace(/\r$/, ""));
}

/** Drop the fixed-width unit suffix from a token such as `4821us`. */
export function stripUnit(token: string, width = 2): string {
  return token.slice(0, Math.max(token.length - width, 0));
}

export function parseDecimal(
  text: string,
  source: string,
  line?: number,
): number {
  if (!DECIMAL.test(text)) {
    throw new ParseError(source, `not a decimal number: '${text}'`, line);
  }
  return Number(text);
}

export function parseInteger(
  text: string,
  source: string,
  line?: number,
): number {
  if (!INTEGER.test(text)) {
    throw new ParseError(source, `not an integer: '${text}'`, line);
  }
  return Number.parseInt(text, 10);
}
