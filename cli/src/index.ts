#!/usr/bin/env node
import { program } from "commander";
import chalk from "chalk";

import { runCommand, parsePositiveInt } from "./commands/run.js";
import type { ShellCommandOptions } from "./commands/shell.js";

program
  .name("wayfarer")
  .description(chalk.cyan("🧭 Wayfarer browser task agent"))
  .version("0.1.0");

program
  .command("run <task...>")
  .description("Execute a one-time browser task")
  .option("-u, --url <url>", "Start URL")
  .option("--headless", "Run the browser without a window")
  .option("-m, --max-iterations <count>", "Iteration cap for iterative mode", parsePositiveInt)
  .option("-y, --yes", "Approve flagged actions without asking")
  .action(runCommand);

program
  .command("shell")
  .description("Start an interactive browser session")
  .option("--headless", "Run the browser without a window")
  .option("-y, --yes", "Approve flagged actions without asking")
  .action(async (options: ShellCommandOptions) => {
    const { shellCommand } = await import("./commands/shell.js");
    return shellCommand(options);
  });

program
  .command("config [action]")
  .description("Show the resolved configuration (show|path)")
  .action(async (action?: string) => {
    const { configCommand } = await import("./commands/config.js");
    return configCommand(action);
  });

await program.parseAsync();
