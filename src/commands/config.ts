import { Command } from "commander";
import { getByPath, parseConfigValue, setByPath, unsetByPath } from "../core/utils/object-path.js";
import { formatConfigValidationError, getConfigPath, loadConfig, saveConfig } from "../core/config/store.js";
import { RmqconfConfig, RmqconfConfigSchema } from "../core/config/schema.js";
import { emitRichOutput, resolveRichOutput, RichOutputOptions } from "../core/output/rich.js";
import { CliError } from "../core/errors.js";

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command("config").description("Read or update rmqconf settings");

  configCommand
    .command("path")
    .description("Print settings file path")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config path output to file")
    .option("--json", "Print raw JSON")
    .action((options: RichOutputOptions) => {
      const outputFormat = resolveRichOutput(options);
      const configPath = getConfigPath();
      emitRichOutput({ path: configPath }, outputFormat, {
        ...options,
        label: "config path",
        renderTable: () => `${configPath}\n`,
      });
    });

  configCommand
    .command("get")
    .description("Get all settings or one value by dotted path")
    .argument("[key]", "Dotted key path, e.g. conf.path")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config get output to file")
    .option("--json", "Print raw JSON")
    .action((key: string | undefined, options: RichOutputOptions) => {
      const outputFormat = resolveRichOutput(options);
      const config = loadConfig();
      const result = key ? getByPath(config, key) : config;
      if (result === undefined) {
        throw new CliError(`Setting not found: ${key}`);
      }
      emitRichOutput(result, outputFormat, { ...options, label: "config get" });
    });

  configCommand
    .command("set")
    .description("Set one setting by dotted path")
    .argument("<key>", "Dotted key path, e.g. set.allowUnknown")
    .argument("<value>", "Value, supports JSON literals")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config set output to file")
    .option("--json", "Print raw JSON")
    .action((key: string, value: string, options: RichOutputOptions) => {
      const outputFormat = resolveRichOutput(options);
      const config = loadConfig();
      // `true` and `5` are JSON literals; a path such as /etc/rabbitmq/rabbitmq.conf is not and stays text.
      const typed = RmqconfConfigSchema.safeParse(setByPath(cloneSettings(config), key, parseConfigValue(value)));
      const validated = typed.success ? typed.data : validateSettings(setByPath(cloneSettings(config), key, value));
      saveConfig(validated);
      emitRichOutput({ updated: true, key }, outputFormat, {
        ...options,
        label: "config set",
        renderTable: () => `Updated ${key}\n`,
      });
    });

  configCommand
    .command("unset")
    .description("Remove one setting by dotted path")
    .argument("<key>", "Dotted key path")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write config unset output to file")
    .option("--json", "Print raw JSON")
    .action((key: string, options: RichOutputOptions) => {
      const outputFormat = resolveRichOutput(options);
      const config = loadConfig();
      const mutable = cloneSettings(config);
      const removed = unsetByPath(mutable, key);
      const validated = validateSettings(mutable);
      saveConfig(validated);
      emitRichOutput({ removed, key }, outputFormat, {
        ...options,
        label: "config unset",
        renderTable: () => (removed ? `Removed ${key}\n` : `${key} was not set\n`),
      });
    });
}

function cloneSettings(config: RmqconfConfig): Record<string, unknown> {
  return structuredClone(config);
}

function validateSettings(candidate: Record<string, unknown>): RmqconfConfig {
  const result = RmqconfConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new CliError(`Invalid setting: ${formatConfigValidationError(result.error)}`, result.error);
  }
  return result.data;
}
