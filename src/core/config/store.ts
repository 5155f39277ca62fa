import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { RmqconfConfig, RmqconfConfigSchema } from "./schema.js";
import { CliError } from "../errors.js";

const CONFIG_DIR_NAME = ".rmqconf";
const CONFIG_FILE_NAME = "config.json";
const CONFIG_HOME_ENV = "RMQCONF_HOME";

export function getConfigDir(): string {
  const override = process.env[CONFIG_HOME_ENV]?.trim();
  if (override) {
    return override;
  }
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

export function getDefaultConfig(): RmqconfConfig {
  return RmqconfConfigSchema.parse({});
}

export function loadConfig(): RmqconfConfig {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  let rawParsed: unknown;
  try {
    rawParsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new CliError(`Invalid config JSON at ${configPath}. Fix or remove the file.`, error);
  }

  const result = RmqconfConfigSchema.safeParse(rawParsed);
  if (!result.success) {
    throw new CliError(`Invalid config format: ${formatConfigValidationError(result.error)}`, result.error);
  }
  return result.data;
}

export function saveConfig(config: RmqconfConfig): void {
  const validated = RmqconfConfigSchema.parse(config);
  writeConfigFile(validated);
}

export function updateConfig(mutator: (config: RmqconfConfig) => RmqconfConfig): RmqconfConfig {
  const current = loadConfig();
  const next = mutator(current);
  saveConfig(next);
  return next;
}

export function formatConfigValidationError(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) {
    return "schema validation failed";
  }
  const where = first.path.length > 0 ? first.path.join(".") : "(root)";
  return `${where}: ${first.message}`;
}

function writeConfigFile(config: RmqconfConfig): void {
  const dir = getConfigDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(getConfigPath(), `${JSON.stringify(config, null, 2)}\n`, "utf-8");
}
