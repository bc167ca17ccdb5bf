import inquirer from "inquirer";
import chalk from "chalk";
import type {
  ConfirmationPrompter,
  DestructiveActionRequest,
} from "../../../agent/src/security/security-gate.js";

export interface PromptHooks {
  /** Called before the question is shown, e.g. to stop a spinner. */
  beforePrompt?: () => void;
  afterPrompt?: () => void;
}

/**
 * Asks on the terminal whether a flagged action may proceed.
 */
export class InquirerPrompter implements ConfirmationPrompter {
  constructor(private readonly hooks: PromptHooks = {}) {}

  async confirm(request: DestructiveActionRequest): Promise<boolean> {
    this.hooks.beforePrompt?.();
    try {
      console.log(chalk.yellow.bold("\n⚠️  SECURITY CONFIRMATION REQUIRED"));
      console.log(`Action Type: ${request.kind} (${request.severity} severity)`);
      console.log(`Description: ${request.description}`);
      if (request.target) {
        console.log(`Target: ${request.target}`);
      }

      const { approved } = await inquirer.prompt<{ approved: boolean }>([
        {
          type: "confirm",
          name: "approved",
          message: "Do you want to proceed?",
          default: false,
        },
      ]);
      return approved;
    } finally {
      this.hooks.afterPrompt?.();
    }
  }
}

export class AutoApprovePrompter implements ConfirmationPrompter {
  async confirm(request: DestructiveActionRequest): Promise<boolean> {
    console.log(chalk.gray(`Auto-approved ${request.kind}: ${request.description}`));
    return true;
  }
}
