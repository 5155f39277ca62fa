import fs from "node:fs";
import { CliError } from "../errors.js";
import { printJson, printValue } from "./print.js";

export type RichOutputFormat = "table" | "tsv" | "json";

export type RichOutputOptions = {
  format?: string;
  out?: string;
  json?: boolean;
};

export function normalizeRichOutputFormat(format: string | undefined, jsonFlag?: boolean): RichOutputFormat {
  if (jsonFlag) {
    return "json";
  }
  const value = (format ?? "table").trim().toLowerCase();
  if (value === "table" || value === "tsv" || value === "json") {
    return value;
  }
  throw new CliError(`Invalid --format value: ${format}. Use table, tsv, or json.`);
}

export function assertRichOutputFileOption(outputPath: string | undefined, format: RichOutputFormat): void {
  if (outputPath && format === "table") {
    throw new CliError("`--out` requires --format tsv/json (or --json).");
  }
}

/**
 * Resolves the output format for a command and validates `--out` against it
 * before the command does any work.
 */
export function resolveRichOutput(options: RichOutputOptions): RichOutputFormat {
  const format = normalizeRichOutputFormat(options.format, options.json);
  assertRichOutputFileOption(options.out, format);
  return format;
}

/**
 * Writes a command result. `--out` saves the rendered payload to a file, tsv and
 * json print it, and table output uses `renderTable` when the command has a
 * plain-text form of its own.
 */
export function emitRichOutput(
  payload: unknown,
  format: RichOutputFormat,
  options: RichOutputOptions & { label: string; renderTable?: () => string }
): void {
  if (options.out) {
    writeRichOutputFile(options.out, renderRichOutput(payload, format));
    process.stdout.write(`Saved ${options.label} output to ${options.out}.\n`);
    return;
  }
  if (format === "table" && options.renderTable) {
    process.stdout.write(options.renderTable());
    return;
  }
  printRichData(payload, format);
}

export function printRichData(data: unknown, format: RichOutputFormat): void {
  if (format === "tsv") {
    process.stdout.write(renderRichOutput(data, "tsv"));
    return;
  }
  if (format === "json") {
    printJson(data);
    return;
  }
  printValue(data);
}

export function renderRichOutput(data: unknown, format: RichOutputFormat): string {
  if (format === "tsv") {
    return `${toTsv(data)}\n`;
  }
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function writeRichOutputFile(path: string, content: string): void {
  fs.writeFileSync(path, content, "utf8");
}

function toTsv(data: unknown): string {
  if (Array.isArray(data)) {
    return recordsToTsv(data.map(normalizeRecord));
  }
  if (isRecord(data)) {
    return recordsToTsv(Object.entries(data).map(([key, value]) => ({ key, value })));
  }
  return recordsToTsv([{ value: data }]);
}

function normalizeRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : { value };
}

function recordsToTsv(records: Record<string, unknown>[]): string {
  const columns = collectColumns(records);
  const lines = [columns.join("\t")];
  for (const record of records) {
    lines.push(columns.map((column) => formatTsvCell(record[column])).join("\t"));
  }
  return lines.join("\n");
}

function collectColumns(records: Record<string, unknown>[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      keys.add(key);
    }
  }
  return keys.size === 0 ? ["value"] : Array.from(keys);
}

function formatTsvCell(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  const text = typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : JSON.stringify(value);
  return text.replace(/[\t\r\n]/g, " ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
