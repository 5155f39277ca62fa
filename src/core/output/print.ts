import util from "node:util";

export function printJson(data: unknown): void {
  process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
}

/** Scalars print as their text; objects such as the settings tree are inspected in full. */
export function printValue(data: unknown): void {
  const text = typeof data === "object" && data !== null ? util.inspect(data, { depth: null, colors: false }) : String(data);
  process.stdout.write(`${text}\n`);
}

export function printWarning(message: string): void {
  process.stderr.write(`Warning: ${message}\n`);
}
