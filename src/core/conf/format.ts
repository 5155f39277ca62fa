import { Line } from "./line.js";

const QUOTE = "'";

export function needsQuoting(value: string): boolean {
  return value.includes(" ") || value.includes("#") || value.includes(QUOTE);
}

export function formatValue(value: string): string {
  return needsQuoting(value) ? `${QUOTE}${value}${QUOTE}` : value;
}

export function renderLine(line: Line): string {
  switch (line.kind) {
    case "setting":
      return `${line.key} = ${formatValue(line.value)}`;
    case "comment":
      return line.text;
    case "empty":
      return "";
  }
}

export function renderLines(lines: readonly Line[]): string {
  return lines.map((line) => `${renderLine(line)}\n`).join("");
}
