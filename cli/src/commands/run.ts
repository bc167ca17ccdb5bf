import chalk from "chalk";
import ora, { type Ora } from "ora";
import { InvalidArgumentError } from "commander";
import type { Task, TaskOutcome } from "../../../agent/src/orchestrator/types.js";
import { ensureEnvLoaded, resolveConfig } from "../../../runtime/src/config.js";
import { errorMessage } from "../../../runtime/src/web-agent/browser-driver.js";
import { createAgentRuntime, type AgentRuntime } from "../utils/bootstrap.js";
import { AutoApprovePrompter, InquirerPrompter } from "../utils/confirm.js";
import { printOutcome, renderTaskEvent } from "../utils/task-progress.js";

export interface RunCommandOptions {
  url?: string;
  headless?: boolean;
  maxIterations?: number;
  yes?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Run one task with a spinner. Ctrl-C aborts the task instead of the process.
 */
export async function executeTask(
  runtime: AgentRuntime,
  task: Task,
  spinner: Ora,
): Promise<TaskOutcome> {
  const controller = new AbortController();
  const onInterrupt = () => {
    spinner.text = "Cancelling...";
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);
  const unsubscribe = runtime.orchestrator.onEvent((event) => renderTaskEvent(spinner, event));

  spinner.start("Planning...");
  try {
    const outcome = await runtime.orchestrator.run(task, controller.signal);
    if (outcome.status === "complete") {
      spinner.succeed("Task completed");
    } else {
      spinner.fail("Task failed");
    }
    printOutcome(outcome);
    return outcome;
  } finally {
    unsubscribe();
    process.off("SIGINT", onInterrupt);
    if (spinner.isSpinning) spinner.stop();
  }
}

export async function runCommand(taskWords: string[], options: RunCommandOptions) {
  const goal = taskWords.join(" ").trim();
  if (!goal) {
    console.log(chalk.red("\n❌ Usage: wayfarer run <task...> [--url <url>]\n"));
    process.exit(1);
  }

  const spinner = ora();
  let runtime: AgentRuntime | undefined;
  let failed = false;

  try {
    ensureEnvLoaded();
    const config = resolveConfig({
      overrides: {
        browser: { headless: options.headless },
        agent: { maxIterations: options.maxIterations },
        security: { autoApprove: options.yes },
      },
    });

    console.log(chalk.cyan(`\n🚀 Executing: ${goal}\n`));

    const prompter = config.security.autoApprove
      ? new AutoApprovePrompter()
      : new InquirerPrompter({
          beforePrompt: () => spinner.stop(),
          afterPrompt: () => spinner.start(),
        });

    spinner.start("Launching browser...");
    runtime = await createAgentRuntime(config, prompter);
    spinner.stop();

    const outcome = await executeTask(
      runtime,
      { goal, startUrl: options.url, maxIterations: config.agent.maxIterations },
      spinner,
    );
    failed = outcome.status === "failed";
  } catch (error) {
    failed = true;
    if (spinner.isSpinning) spinner.fail("Task failed");
    console.error(chalk.red("\nError:"), errorMessage(error));
  } finally {
    if (runtime) {
      await runtime.close();
    }
  }

  if (failed) process.exit(1);
}
