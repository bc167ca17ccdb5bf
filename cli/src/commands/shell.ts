import inquirer from "inquirer";
import chalk from "chalk";
import ora from "ora";
import { ensureEnvLoaded, resolveConfig } from "../../../runtime/src/config.js";
import { errorMessage } from "../../../runtime/src/web-agent/browser-driver.js";
import { createAgentRuntime, type AgentRuntime } from "../utils/bootstrap.js";
import { AutoApprovePrompter, InquirerPrompter } from "../utils/confirm.js";
import { SHELL_HELP, parseShellInput, type ShellCommand } from "../utils/shell-input.js";
import { executeTask } from "./run.js";

export interface ShellCommandOptions {
  headless?: boolean;
  yes?: boolean;
}

const spinner = ora();

async function handle(runtime: AgentRuntime, command: ShellCommand): Promise<void> {
  const { session, oracle, config } = runtime;
  const maxIterations = config.agent.maxIterations;

  switch (command.type) {
    case "empty":
    case "exit":
      return;
    case "help":
      console.log(chalk.gray(SHELL_HELP));
      return;
    case "usage":
      console.log(chalk.red(command.message));
      return;
    case "go": {
      const outcome = await session.navigate(command.url);
      const content = await session.currentContent();
      if (outcome.status !== "ok") {
        console.log(chalk.yellow(outcome.warning));
      }
      console.log(chalk.green(`Opened ${content.title || "(untitled)"} (${content.url})`));
      return;
    }
    case "tabs": {
      const tabs = await session.listTabs();
      if (tabs.length === 0) {
        console.log(chalk.gray("No open tabs"));
        return;
      }
      for (const tab of tabs) {
        const marker = tab.active ? chalk.green("*") : " ";
        console.log(`${marker} ${tab.index}. ${tab.title || "(untitled)"} ${chalk.gray(tab.url)}`);
      }
      return;
    }
    case "switch": {
      const tab = await session.switchActiveTab(command.target);
      console.log(chalk.green(`Switched to tab ${tab.index}: ${tab.title || tab.url}`));
      return;
    }
    case "task":
      await executeTask(
        runtime,
        { goal: command.description, startUrl: command.url, maxIterations },
        spinner,
      );
      return;
    case "request": {
      spinner.start("Understanding request...");
      const parsed = await oracle
        .parseRequest(command.input)
        .finally(() => spinner.stop());
      console.log(chalk.gray(`Task: ${parsed.task}`));
      if (parsed.needsUrl && parsed.url) {
        console.log(chalk.gray(`Start URL: ${parsed.url}`));
      }
      await executeTask(
        runtime,
        {
          goal: parsed.task,
          startUrl: parsed.needsUrl ? parsed.url : undefined,
          maxIterations,
        },
        spinner,
      );
      return;
    }
  }
}

export async function shellCommand(options: ShellCommandOptions) {
  let runtime: AgentRuntime | undefined;

  try {
    ensureEnvLoaded();
    const config = resolveConfig({
      overrides: {
        browser: { headless: options.headless },
        security: { autoApprove: options.yes },
      },
    });
    const prompter = config.security.autoApprove
      ? new AutoApprovePrompter()
      : new InquirerPrompter({
          beforePrompt: () => spinner.stop(),
          afterPrompt: () => spinner.start(),
        });

    spinner.start("Launching browser...");
    runtime = await createAgentRuntime(config, prompter);
    spinner.succeed("Browser ready");

    console.log(chalk.cyan.bold("\n🧭 Wayfarer shell\n"));
    console.log(chalk.gray(SHELL_HELP));
    console.log();

    for (;;) {
      const { line } = await inquirer.prompt<{ line: string }>([
        { type: "input", name: "line", message: chalk.cyan("wayfarer>") },
      ]);
      const command = parseShellInput(line);
      if (command.type === "exit") break;

      try {
        await handle(runtime, command);
      } catch (error) {
        if (spinner.isSpinning) spinner.fail();
        console.error(chalk.red("Error:"), errorMessage(error));
      }
    }

    console.log(chalk.gray("\nGoodbye!\n"));
  } catch (error) {
    if (spinner.isSpinning) spinner.fail();
    console.error(chalk.red("\nError:"), errorMessage(error));
    process.exitCode = 1;
  } finally {
    if (runtime) {
      await runtime.close();
    }
  }
}
