import { ConfParseError } from "../errors.js";
import { isValidKeyFormat } from "./keys.js";

export type SettingLine = {
  kind: "setting";
  key: string;
  value: string;
};

export type CommentLine = {
  kind: "comment";
  text: string;
};

export type EmptyLine = {
  kind: "empty";
};

export type Line = SettingLine | CommentLine | EmptyLine;

// Value alternatives are tried in order: closed at the next quote, closed at a later
// quote (values written with embedded quotes), unquoted.
const SETTING_PATTERN = /^\s*([A-Za-z0-9_.]+)\s*=\s*(?:'([^']*)'|'(.*)'|([^#]*?))\s*(?:#.*)?$/;
const SETTING_KEY_PATTERN = /^[A-Za-z0-9_.]+$/;
const LINE_BREAK_PATTERN = /[\r\n]/;

/**
 * Classifies one line of a configuration file.
 *
 * Comment lines keep their original text, indentation included. A quoted value
 * ends at the next `'` and has no escapes. When the rest of the line cannot
 * follow that quote, the value extends to a later quote that can close it; when
 * no quote closes it the line is read as an unquoted value and the quote
 * character stays in it.
 *
 * @param lineNumber 1-based, used only in error messages
 * @throws ConfParseError when the line is not a comment, blank or `key = value`,
 *   or when the key is malformed
 */
export function parseLine(text: string, lineNumber: number): Line {
  const trimmed = text.trim();
  if (!trimmed) {
    return { kind: "empty" };
  }
  if (trimmed.startsWith("#")) {
    return { kind: "comment", text };
  }

  const match = SETTING_PATTERN.exec(text);
  if (!match) {
    throw new ConfParseError(lineNumber, `invalid line: ${text}`);
  }

  const [, key, quoted, embedded, unquoted] = match;
  if (!isValidKeyFormat(key)) {
    throw new ConfParseError(lineNumber, `invalid key format: ${key}`);
  }
  return { kind: "setting", key, value: quoted ?? embedded ?? unquoted ?? "" };
}

/**
 * Whether a setting with this key can be parsed back. Key format allows hyphens
 * in segments (`listeners.tcp.my-listener`) but a setting line does not.
 */
export function isWritableKey(key: string): boolean {
  return SETTING_KEY_PATTERN.test(key) && isValidKeyFormat(key);
}

/** Values are single-line; a line break would split the setting. */
export function isWritableValue(value: string): boolean {
  return !LINE_BREAK_PATTERN.test(value);
}

/**
 * Splits file content into lines. A trailing `\r` is dropped from every line and
 * a final line terminator does not start another line.
 */
export function splitLines(content: string): string[] {
  if (!content) {
    return [];
  }
  const lines = content.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (content.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}
