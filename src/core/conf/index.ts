export { ConfDocument } from "./document.js";
export type { ConfEntry } from "./document.js";
export { loadConfDocument, saveConfDocument } from "./file.js";
export { isWritableKey, isWritableValue, parseLine, splitLines } from "./line.js";
export type { CommentLine, EmptyLine, Line, SettingLine } from "./line.js";
export { formatValue, needsQuoting, renderLine } from "./format.js";
export { isPattern, matchesPattern, WILDCARD } from "./pattern.js";
export {
  findMatchingTemplates,
  isKnownKey,
  isValidKeyFormat,
  KNOWN_KEY_SECTIONS,
  KNOWN_KEY_TEMPLATES,
  suggestSimilarKeys,
} from "./keys.js";
export type { KnownKeySection } from "./keys.js";
export { parseBoolean, parseFloatValue, parseInteger } from "./coerce.js";
export { ConfParseError } from "../errors.js";
