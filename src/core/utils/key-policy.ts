import { isKnownKey, isValidKeyFormat, suggestSimilarKeys } from "../conf/keys.js";
import { isWritableKey, isWritableValue } from "../conf/line.js";
import { CliError } from "../errors.js";

export type KeyWriteCheck =
  | { status: "known" }
  | { status: "unknown"; suggestions: string[] };

/**
 * Decides whether `key` may be written. Malformed keys and keys a setting line
 * cannot hold are always rejected. Keys outside the known-key catalog are
 * rejected with suggestions unless `allowUnknown` is set, in which case the
 * caller is told to warn instead.
 */
export function checkKeyForWrite(key: string, allowUnknown: boolean): KeyWriteCheck {
  if (!isValidKeyFormat(key)) {
    throw new CliError(`invalid key format: ${key}`);
  }
  if (!isWritableKey(key)) {
    throw new CliError(`key cannot be written to rabbitmq.conf: ${key}`);
  }
  if (isKnownKey(key)) {
    return { status: "known" };
  }
  const suggestions = suggestSimilarKeys(key);
  if (!allowUnknown) {
    throw new CliError(formatUnknownKeyMessage(key, suggestions));
  }
  return { status: "unknown", suggestions };
}

export function checkValueForWrite(key: string, value: string): void {
  if (!isWritableValue(value)) {
    throw new CliError(`value for ${key} cannot contain a line break`);
  }
}

export function formatUnknownKeyMessage(key: string, suggestions: string[]): string {
  if (suggestions.length === 0) {
    return `unknown configuration key: ${key}`;
  }
  return `unknown configuration key: ${key}. Similar keys: ${suggestions.join(", ")}`;
}

export type KeyAuditStatus = "ok" | "warn";

export type KeyAudit = {
  key: string;
  status: KeyAuditStatus;
  detail: string;
};

export function auditKeys(keys: string[]): KeyAudit[] {
  return keys.map((key): KeyAudit => {
    if (isKnownKey(key)) {
      return { key, status: "ok", detail: "known key" };
    }
    const suggestions = suggestSimilarKeys(key);
    return {
      key,
      status: "warn",
      detail: suggestions.length > 0 ? `unknown key; similar keys: ${suggestions.join(", ")}` : "unknown key",
    };
  });
}
