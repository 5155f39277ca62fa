import { Command } from "commander";
import { findMatchingTemplates, KNOWN_KEY_SECTIONS, suggestSimilarKeys } from "../core/conf/keys.js";
import { CliError } from "../core/errors.js";
import { emitRichOutput, resolveRichOutput, RichOutputOptions } from "../core/output/rich.js";

export function registerSchemaCommand(program: Command): void {
  const schema = program.command("schema").description("Browse the catalog of known configuration keys");

  schema
    .command("list")
    .description("List known key templates, optionally only those matching a pattern")
    .argument("[pattern]", "Dotted pattern, e.g. log.*.level")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write schema list output to file")
    .option("--json", "Print raw JSON")
    .action((pattern: string | undefined, options: RichOutputOptions) => {
      const outputFormat = resolveRichOutput(options);
      const allowed = pattern ? new Set(findMatchingTemplates(pattern)) : undefined;
      const rows = KNOWN_KEY_SECTIONS.flatMap((section) =>
        section.keys.filter((key) => !allowed || allowed.has(key)).map((key) => ({ section: section.name, key }))
      );
      if (pattern && rows.length === 0) {
        throw new CliError(`no known keys matching pattern: ${pattern}`);
      }
      emitRichOutput(rows, outputFormat, {
        ...options,
        label: "schema list",
        renderTable: () => rows.map((row) => `${row.key}\n`).join(""),
      });
    });

  schema
    .command("suggest")
    .description("Suggest known key templates for a key")
    .argument("<key>", "Dotted key")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write schema suggest output to file")
    .option("--json", "Print raw JSON")
    .action((key: string, options: RichOutputOptions) => {
      const outputFormat = resolveRichOutput(options);
      const suggestions = suggestSimilarKeys(key);
      emitRichOutput(suggestions.map((template) => ({ key: template })), outputFormat, {
        ...options,
        label: "schema suggest",
        renderTable: () =>
          suggestions.length === 0 ? `No similar keys for ${key}.\n` : suggestions.map((item) => `${item}\n`).join(""),
      });
    });
}
