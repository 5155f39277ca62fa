import { parseBoolean, parseFloatValue, parseInteger } from "./coerce.js";
import { renderLines } from "./format.js";
import { Line, parseLine, splitLines } from "./line.js";
import { isPattern, matchesPattern } from "./pattern.js";

export type ConfEntry = [key: string, value: string];

/**
 * A parsed `rabbitmq.conf` file.
 *
 * Holds every physical line in file order next to an index from key to the
 * position of the setting that currently answers reads for it. Both are private
 * and every mutating method updates them together, so comments, blank lines and
 * settings that were never touched render back exactly as they were read.
 *
 * When a key occurs more than once, the last occurrence is the one the index
 * points to; the earlier lines are kept and rendered, but never read.
 */
export class ConfDocument {
  private readonly lines: Line[] = [];
  private readonly keyIndex = new Map<string, number>();

  static parse(content: string): ConfDocument {
    const document = new ConfDocument();
    splitLines(content).forEach((text, index) => {
      document.append(parseLine(text, index + 1));
    });
    return document;
  }

  static isPattern(key: string): boolean {
    return isPattern(key);
  }

  get(key: string): string | undefined {
    const position = this.keyIndex.get(key);
    if (position === undefined) {
      return undefined;
    }
    const line = this.lines[position];
    return line.kind === "setting" ? line.value : undefined;
  }

  getInt(key: string): number | undefined {
    const value = this.get(key);
    return value === undefined ? undefined : parseInteger(value);
  }

  getBool(key: string): boolean | undefined {
    const value = this.get(key);
    return value === undefined ? undefined : parseBoolean(value);
  }

  getFloat(key: string): number | undefined {
    const value = this.get(key);
    return value === undefined ? undefined : parseFloatValue(value);
  }

  containsKey(key: string): boolean {
    return this.keyIndex.has(key);
  }

  set(key: string, value: string): void {
    const position = this.keyIndex.get(key);
    if (position === undefined) {
      this.append({ kind: "setting", key, value });
      return;
    }
    this.lines[position] = { kind: "setting", key, value };
  }

  /** Blanks the line in place; the line count does not change. */
  remove(key: string): boolean {
    const position = this.keyIndex.get(key);
    if (position === undefined) {
      return false;
    }
    this.keyIndex.delete(key);
    this.lines[position] = { kind: "empty" };
    return true;
  }

  /** Keys in ascending code-unit order, independent of file layout. */
  keys(): string[] {
    return [...this.keyIndex.keys()].sort(compareKeys);
  }

  entries(): ConfEntry[] {
    return this.collect(() => true);
  }

  getMatching(pattern: string): ConfEntry[] {
    return this.collect((key) => matchesPattern(key, pattern));
  }

  toString(): string {
    return renderLines(this.lines);
  }

  private append(line: Line): void {
    if (line.kind === "setting") {
      this.keyIndex.set(line.key, this.lines.length);
    }
    this.lines.push(line);
  }

  private collect(predicate: (key: string) => boolean): ConfEntry[] {
    const entries: ConfEntry[] = [];
    for (const key of this.keys()) {
      if (!predicate(key)) {
        continue;
      }
      const value = this.get(key);
      if (value !== undefined) {
        entries.push([key, value]);
      }
    }
    return entries;
  }
}

function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
