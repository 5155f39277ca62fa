import fs from "node:fs";
import { ConfDocument } from "./document.js";

/**
 * Reads and parses a configuration file. Filesystem errors and
 * `ConfParseError` reach the caller unchanged.
 */
export function loadConfDocument(filePath: string): ConfDocument {
  return ConfDocument.parse(fs.readFileSync(filePath, "utf-8"));
}

// Overwrites the file in place; there is no temporary file or rename.
export function saveConfDocument(filePath: string, document: ConfDocument): void {
  fs.writeFileSync(filePath, document.toString(), "utf-8");
}
