import type { Ora } from "ora";
import chalk from "chalk";
import type { TaskEvent, TaskOutcome } from "../../../agent/src/orchestrator/types.js";

export type ProgressLevel = "text" | "info" | "warn" | "succeed" | "fail";

export interface ProgressLine {
  level: ProgressLevel;
  message: string;
}

/**
 * Map an orchestrator event to one line of terminal progress, or null for
 * events that are not shown.
 */
export function describeTaskEvent(event: TaskEvent): ProgressLine | null {
  switch (event.type) {
    case "plan_created":
      return {
        level: "info",
        message: `Plan (${event.steps.length} steps):\n${event.steps
          .map((step, i) => `  ${i + 1}. ${step}`)
          .join("\n")}`,
      };
    case "step_start":
      return { level: "text", message: `Step ${event.index}/${event.total}: ${event.step}` };
    case "iteration":
      return { level: "text", message: `Iteration ${event.iteration}/${event.maxIterations}` };
    case "decision":
      if (!event.parsed) {
        return { level: "warn", message: `Unreadable model reply: ${event.decision.reasoning}` };
      }
      return {
        level: "text",
        message: `${event.decision.action}${event.decision.reasoning ? `: ${event.decision.reasoning}` : ""}`,
      };
    case "action_result":
      if (!event.result.ok) {
        return { level: "fail", message: `${event.result.kind} failed: ${event.result.error}` };
      }
      if (event.result.warning) {
        return { level: "warn", message: event.result.warning };
      }
      return { level: "succeed", message: event.result.kind };
    case "challenge_detected":
      return {
        level: "warn",
        message: `Challenge detected (${event.indicator}) at ${event.url}. Solve it in the browser window.`,
      };
    case "challenge_cleared":
      return { level: "succeed", message: "Challenge cleared, continuing" };
    case "state_change":
      return null;
  }
}

/**
 * Render progress on a running spinner. Permanent lines stop the spinner and
 * restart it so the next step keeps animating.
 */
export function renderTaskEvent(spinner: Ora, event: TaskEvent): void {
  const line = describeTaskEvent(event);
  if (!line) return;

  if (line.level === "text") {
    spinner.text = line.message;
    return;
  }

  const text = spinner.text;
  spinner[line.level](line.message);
  spinner.start(text);
}

export function formatOutcome(outcome: TaskOutcome): string[] {
  const { stats } = outcome;
  const summary = [
    `oracle calls: ${stats.oracleCalls}`,
    `actions: ${stats.actionsSucceeded} ok / ${stats.actionsFailed} failed`,
    `tokens: ${stats.usage.inputTokens} in / ${stats.usage.outputTokens} out`,
  ].join(", ");

  if (outcome.status === "complete") {
    return [`Task complete (${outcome.mode} mode): ${outcome.summary}`, summary];
  }
  return [`Task failed [${outcome.reason}]: ${outcome.message}`, summary];
}

export function printOutcome(outcome: TaskOutcome): void {
  const [headline, summary] = formatOutcome(outcome);
  const color = outcome.status === "complete" ? chalk.green : chalk.red;
  console.log(color(`\n${outcome.status === "complete" ? "✅" : "❌"} ${headline}`));
  console.log(chalk.gray(`${summary}\n`));
}
