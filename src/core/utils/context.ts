import path from "node:path";
import { RmqconfConfig } from "../config/schema.js";

export const CONF_FILE_ENV = "RABBITMQ_CONFIG_FILE";
export const DEFAULT_CONF_FILE_NAME = "rabbitmq.conf";

/**
 * Picks the configuration file a command works on: `--file`, then
 * `RABBITMQ_CONFIG_FILE`, then `conf.path` from the tool settings, then
 * `rabbitmq.conf` in the working directory.
 */
export function resolveConfFilePath(config: RmqconfConfig, provided?: string): string {
  const candidate =
    normalizeOptional(provided) ??
    normalizeOptional(process.env[CONF_FILE_ENV]) ??
    normalizeOptional(config.conf.path) ??
    DEFAULT_CONF_FILE_NAME;
  return path.resolve(candidate);
}

function normalizeOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
