import { parseInteger, splitLines, stripUnit } from "./text";

/**
 * Parse a startup-time log. Each line ends with `<integer><unit>` (e.g.
 * `vmm startup time: 4821us`); one sample in microseconds per line.
 * Blank lines are ignored.
 */
export function parseStartupTimes(content: string, source: string): number[] {
  const samples: number[] = [];
  const lines = splitLines(content);

  lines.forEach((line, index) => {
    const tokens = line.trim().split(/\s+/);
    const last = tokens[tokens.length - 1] ?? "";
    if (last === "") return;
    samples.push(parseInteger(stripUnit(last), source, index + 1));
  });

  return samples;
}
