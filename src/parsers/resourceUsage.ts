import { ParseError } from "../errors";
import { parseInteger, splitLines } from "./text";

/**
 * Parse a process resource-usage log. Lines are `<name> <value>` or, for
 * timeval fields such as `utime`, `<name> <seconds> <subseconds>`, folded
 * into `seconds * 1000 + subseconds`.
 *
 * Returns one series per field name, in order of first appearance.
 */
export function parseResourceUsage(
  content: string,
  source: string,
): Map<string, number[]> {
  const series = new Map<string, number[]>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === "") return;
    const lineNo = index + 1;
    const [name = "", ...values] = line.split(" ");

    if (name === "") {
      throw new ParseError(source, "missing field name", lineNo);
    }

    let value: number;
    if (values.length === 1) {
      value = parseInteger(values[0] ?? "", source, lineNo);
    } else if (values.length === 2) {
      value =
        parseInteger(values[0] ?? "", source, lineNo) * 1000 +
        parseInteger(values[1] ?? "", source, lineNo);
    } else {
      throw new ParseError(
        source,
        `expected '<name> <value>' or '<name> <seconds> <subseconds>', got ${values.length + 1} fields`,
        lineNo,
      );
    }

    const list = series.get(name);
    if (list) {
      list.push(value);
    } else {
      series.set(name, [value]);
    }
  });

  return series;
}
