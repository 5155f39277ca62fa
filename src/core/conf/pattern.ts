export const WILDCARD = "*";

export const KEY_SEPARATOR = ".";

export function splitKey(key: string): string[] {
  return key.split(KEY_SEPARATOR);
}

/**
 * Matches a dotted key against a dotted pattern. A `*` segment in the pattern
 * stands for exactly one whole segment of the key; every other segment must be
 * equal. Keys and patterns with a different number of segments never match.
 */
export function matchesPattern(key: string, pattern: string): boolean {
  const keyParts = splitKey(key);
  const patternParts = splitKey(pattern);
  if (keyParts.length !== patternParts.length) {
    return false;
  }
  return patternParts.every((part, index) => part === WILDCARD || part === keyParts[index]);
}

export function isPattern(value: string): boolean {
  return value.includes(WILDCARD);
}
