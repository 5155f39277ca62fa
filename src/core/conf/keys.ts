import fs from "node:fs";
import { z } from "zod";
import { WILDCARD, matchesPattern, splitKey } from "./pattern.js";

const MAX_SUGGESTIONS = 5;

const KNOWN_KEYS_FILE = new URL("../../../data/known-keys.json", import.meta.url);

const KnownKeySectionSchema = z.object({
  name: z.string().min(1),
  keys: z.array(z.string().min(1)),
});

const KnownKeysFileSchema = z.object({
  sections: z.array(KnownKeySectionSchema),
});

export type KnownKeySection = {
  readonly name: string;
  readonly keys: readonly string[];
};

/**
 * Catalog sections as they appear in `data/known-keys.json`, derived from the
 * RabbitMQ cuttlefish schema files. Template variables such as `$name` are
 * written as a `*` segment.
 */
export const KNOWN_KEY_SECTIONS: readonly KnownKeySection[] = Object.freeze(
  KnownKeysFileSchema.parse(JSON.parse(fs.readFileSync(KNOWN_KEYS_FILE, "utf-8"))).sections.map(
    (section): KnownKeySection => Object.freeze({ name: section.name, keys: Object.freeze([...section.keys]) })
  )
);

export const KNOWN_KEY_TEMPLATES: readonly string[] = Object.freeze(
  KNOWN_KEY_SECTIONS.flatMap((section) => section.keys)
);

/**
 * A key is a non-empty list of dot-separated segments. A segment is either all
 * ASCII digits (`auth_backends.1`) or starts with a letter or underscore and
 * continues with letters, digits, underscores and hyphens.
 */
export function isValidKeyFormat(key: string): boolean {
  if (!key) {
    return false;
  }
  return splitKey(key).every(isValidSegment);
}

function isValidSegment(segment: string): boolean {
  return /^\d+$/.test(segment) || /^[A-Za-z_][A-Za-z0-9_-]*$/.test(segment);
}

export function isKnownKey(key: string): boolean {
  return KNOWN_KEY_TEMPLATES.some((template) => matchesPattern(key, template));
}

// First-segment heuristic only; templates starting with a wildcard always qualify.
export function suggestSimilarKeys(key: string): string[] {
  const [head] = splitKey(key);
  const suggestions: string[] = [];
  for (const template of KNOWN_KEY_TEMPLATES) {
    if (suggestions.length >= MAX_SUGGESTIONS) {
      break;
    }
    const [templateHead] = splitKey(template);
    if (templateHead === head || templateHead === WILDCARD) {
      suggestions.push(template);
    }
  }
  return suggestions;
}

export function findMatchingTemplates(pattern: string): string[] {
  return KNOWN_KEY_TEMPLATES.filter((template) => matchesPattern(template, pattern));
}
