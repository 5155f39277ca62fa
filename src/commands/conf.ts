import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { ConfDocument } from "../core/conf/document.js";
import { loadConfDocument, saveConfDocument } from "../core/conf/file.js";
import { loadConfig } from "../core/config/store.js";
import { CliError, ConfParseError } from "../core/errors.js";
import { printWarning } from "../core/output/print.js";
import { emitRichOutput, resolveRichOutput, RichOutputOptions } from "../core/output/rich.js";
import { resolveConfFilePath } from "../core/utils/context.js";
import { checkKeyForWrite, checkValueForWrite } from "../core/utils/key-policy.js";

type ConfFileOptions = RichOutputOptions & {
  file?: string;
};

type SetOptions = ConfFileOptions & {
  force?: boolean;
};

export function registerConfCommands(program: Command): void {
  program
    .command("get")
    .description("Print the value of a key, or every key matching a pattern such as listeners.tcp.*")
    .argument("<key>", "Dotted key or pattern")
    .option("--file <path>", "Configuration file (default: $RABBITMQ_CONFIG_FILE, conf.path, ./rabbitmq.conf)")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write get output to file")
    .option("--json", "Print raw JSON")
    .action((key: string, options: ConfFileOptions) => {
      const outputFormat = resolveRichOutput(options);
      const confPath = resolveConfFilePath(loadConfig(), options.file);
      const document = readExistingDocument(confPath);

      if (ConfDocument.isPattern(key)) {
        const matches = document.getMatching(key);
        if (matches.length === 0) {
          throw new CliError(`no keys matching pattern: ${key}`);
        }
        emitRichOutput(toRecords(matches), outputFormat, {
          ...options,
          label: "get",
          renderTable: () => renderAssignments(matches),
        });
        return;
      }

      const value = document.get(key);
      if (value === undefined) {
        throw new CliError(`key not found: ${key}`);
      }
      emitRichOutput({ key, value }, outputFormat, {
        ...options,
        label: "get",
        renderTable: () => `${value}\n`,
      });
    });

  program
    .command("set")
    .description("Set a key, updating it in place or appending it to the file")
    .argument("<key>", "Dotted key")
    .argument("<value>", "Value, stored as text")
    .option("--force", "Write keys that are not in the known-key catalog")
    .option("--file <path>", "Configuration file (default: $RABBITMQ_CONFIG_FILE, conf.path, ./rabbitmq.conf)")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write set output to file")
    .option("--json", "Print raw JSON")
    .action((key: string, value: string, options: SetOptions) => {
      const outputFormat = resolveRichOutput(options);
      const config = loadConfig();
      const check = checkKeyForWrite(key, Boolean(options.force) || config.set.allowUnknown);
      checkValueForWrite(key, value);
      if (check.status === "unknown") {
        printWarning(`unknown key: ${key}`);
      }

      const confPath = resolveConfFilePath(config, options.file);
      const document = fs.existsSync(confPath) ? readDocument(confPath) : new ConfDocument();
      const updated = document.containsKey(key);
      document.set(key, value);

      fs.mkdirSync(path.dirname(confPath), { recursive: true });
      saveConfDocument(confPath, document);

      emitRichOutput({ key, value, updated, path: confPath }, outputFormat, {
        ...options,
        label: "set",
        renderTable: () => `${updated ? "updated" : "set"} ${key} = ${value}\n`,
      });
    });

  program
    .command("unset")
    .description("Remove a key; its line is left blank")
    .argument("<key>", "Dotted key")
    .option("--file <path>", "Configuration file (default: $RABBITMQ_CONFIG_FILE, conf.path, ./rabbitmq.conf)")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write unset output to file")
    .option("--json", "Print raw JSON")
    .action((key: string, options: ConfFileOptions) => {
      const outputFormat = resolveRichOutput(options);
      const confPath = resolveConfFilePath(loadConfig(), options.file);
      const document = readExistingDocument(confPath);
      if (!document.remove(key)) {
        throw new CliError(`key not found: ${key}`);
      }
      saveConfDocument(confPath, document);

      emitRichOutput({ key, removed: true, path: confPath }, outputFormat, {
        ...options,
        label: "unset",
        renderTable: () => `removed ${key}\n`,
      });
    });

  program
    .command("list")
    .description("List every key and value in key order")
    .option("--file <path>", "Configuration file (default: $RABBITMQ_CONFIG_FILE, conf.path, ./rabbitmq.conf)")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write list output to file")
    .option("--json", "Print raw JSON")
    .action((options: ConfFileOptions) => {
      const outputFormat = resolveRichOutput(options);
      const confPath = resolveConfFilePath(loadConfig(), options.file);
      const entries = readExistingDocument(confPath).entries();
      emitRichOutput(toRecords(entries), outputFormat, {
        ...options,
        label: "list",
        renderTable: () => (entries.length === 0 ? "No settings.\n" : renderAssignments(entries)),
      });
    });
}

export function readExistingDocument(confPath: string): ConfDocument {
  if (!fs.existsSync(confPath)) {
    throw new CliError(`configuration file not found: ${confPath}`);
  }
  return readDocument(confPath);
}

function readDocument(confPath: string): ConfDocument {
  try {
    return loadConfDocument(confPath);
  } catch (error) {
    if (error instanceof ConfParseError) {
      throw new CliError(`${confPath}: ${error.message}`, error);
    }
    throw error;
  }
}

function toRecords(entries: [string, string][]): { key: string; value: string }[] {
  return entries.map(([key, value]) => ({ key, value }));
}

function renderAssignments(entries: [string, string][]): string {
  return entries.map(([key, value]) => `${key} = ${value}\n`).join("");
}
