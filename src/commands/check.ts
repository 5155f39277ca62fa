import { Command } from "commander";
import { loadConfig } from "../core/config/store.js";
import { CliError } from "../core/errors.js";
import { emitRichOutput, resolveRichOutput, RichOutputOptions } from "../core/output/rich.js";
import { resolveConfFilePath } from "../core/utils/context.js";
import { auditKeys, KeyAudit } from "../core/utils/key-policy.js";
import { readExistingDocument } from "./conf.js";

type CheckOptions = RichOutputOptions & {
  file?: string;
};

export function registerCheckCommand(program: Command): void {
  program
    .command("check")
    .description("Check every key in the configuration file against the known-key catalog")
    .option("--file <path>", "Configuration file (default: $RABBITMQ_CONFIG_FILE, conf.path, ./rabbitmq.conf)")
    .option("--format <format>", "table | tsv | json", "table")
    .option("--out <path>", "Write check output to file")
    .option("--json", "Print raw JSON")
    .action((options: CheckOptions) => {
      const outputFormat = resolveRichOutput(options);
      const confPath = resolveConfFilePath(loadConfig(), options.file);
      const checks = auditKeys(readExistingDocument(confPath).keys());
      const summary = buildSummary(checks);
      const result = {
        ok: summary.warn === 0,
        path: confPath,
        summary,
        checks,
      };

      emitRichOutput(outputFormat === "tsv" ? checks : result, outputFormat, {
        ...options,
        label: "check",
        renderTable: () => renderChecks(checks),
      });

      if (summary.warn > 0) {
        throw new CliError(`Check found ${summary.warn} unknown key(s) in ${confPath}.`);
      }
    });
}

function buildSummary(checks: KeyAudit[]): { ok: number; warn: number; total: number } {
  const summary = {
    ok: 0,
    warn: 0,
    total: checks.length,
  };
  for (const item of checks) {
    summary[item.status] += 1;
  }
  return summary;
}

function renderChecks(checks: KeyAudit[]): string {
  if (checks.length === 0) {
    return "No settings.\n";
  }
  return checks.map((item) => `[${item.status}] ${item.key}: ${item.detail}\n`).join("");
}
