import { Command } from "commander";
import { registerCheckCommand } from "./commands/check.js";
import { registerConfCommands } from "./commands/conf.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerSchemaCommand } from "./commands/schema.js";

export const CLI_VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("rmqconf")
    .description("Read, query and edit rabbitmq.conf files without losing comments or layout")
    .version(CLI_VERSION);

  registerConfCommands(program);
  registerCheckCommand(program);
  registerSchemaCommand(program);
  registerConfigCommand(program);

  return program;
}
