import type { TokenUsage } from "../index.js";
import { BudgetExceededError, ChallengeTimeoutError } from "../errors.js";
import { ConversationHistory } from "../context/conversation-history.js";
import {
  TokenBudget,
  estimateTokens,
  type TokenUsageSnapshot,
} from "../context/token-budget.js";
import type { DecisionOracle } from "../oracle/decision-oracle.js";
import { decisionFromReply, type Decision, type DecisionReply } from "../oracle/decision.js";
import {
  ORACLE_PROMPTS,
  buildIteratePrompt,
  buildPageDescription,
  buildPlanPrompt,
  buildStepPrompt,
  composeUserPrompt,
} from "../oracle/prompts.js";
import type { SecurityGate } from "../security/security-gate.js";
import { ActionDispatcher } from "./action-dispatcher.js";
import { ChallengeWaiter } from "./challenge-waiter.js";
import type {
  BrowserSession,
  DispatchResult,
  ExecutionMode,
  FailureReason,
  Task,
  TaskEvent,
  TaskEventHandler,
  TaskOutcome,
  TaskState,
  TaskStats,
} from "./types.js";
import type { AgentLoopConfig } from "../../../runtime/src/config.js";
import type { PageContent } from "../../../runtime/src/web-agent/contracts.js";
import { matchBlockIndicator } from "../../../runtime/src/web-agent/block-detector.js";
import {
  SessionUnrecoverableError,
  errorMessage,
} from "../../../runtime/src/web-agent/browser-driver.js";
import { isBlankUrl } from "../../../runtime/src/web-agent/url-utils.js";
import { CancelledError, sleep, throwIfCancelled } from "../../../runtime/src/utils/abort.js";
import { silentLogger, type Logger } from "../../../runtime/src/logger.js";

export interface TaskOrchestratorOptions {
  session: BrowserSession;
  oracle: DecisionOracle;
  gate: SecurityGate;
  config: AgentLoopConfig;
  logger?: Logger;
}

const SUMMARY_CHARS = 500;

/**
 * The context cannot hold the next prompt even with the history emptied.
 */
class ContextExhaustedError extends Error {
  constructor(readonly needed: number, readonly maxTokens: number) {
    super(`Prompt needs ${needed} tokens but the context budget is ${maxTokens}`);
    this.name = "ContextExhaustedError";
  }
}

class IterationLimitError extends Error {
  constructor(readonly maxIterations: number, goal: string) {
    super(`max iterations (${maxIterations}) reached without completing task: ${goal}`);
    this.name = "IterationLimitError";
  }
}

interface RunContext {
  task: Task;
  signal?: AbortSignal;
  mode?: ExecutionMode;
  stats: TaskStats;
}

function truncate(text: string, max = SUMMARY_CHARS): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function summarizeDecision(decision: Decision): string {
  if (decision.reasoning) {
    const target = decision.selector ?? decision.url ?? decision.text ?? "";
    return truncate(`${decision.action}${target ? ` ${target}` : ""}: ${decision.reasoning}`);
  }
  return truncate(JSON.stringify(decision));
}

function summarizeResult(result: DispatchResult): string {
  if (!result.ok) return truncate(`Result: ${result.kind} failed: ${result.error}`);
  return result.warning ? truncate(`Result: ${result.kind} ok (${result.warning})`) : `Result: ${result.kind} ok`;
}

/**
 * Plan-then-iterate control loop for one browser task at a time.
 *
 * planning -> executing_plan | iterating, either of which may enter
 * waiting_challenge and return, until complete or failed.
 */
export class TaskOrchestrator {
  private readonly budget: TokenBudget;
  private readonly history: ConversationHistory;
  private readonly dispatcher: ActionDispatcher;
  private readonly challengeWaiter: ChallengeWaiter;
  private readonly session: BrowserSession;
  private readonly oracle: DecisionOracle;
  private readonly config: AgentLoopConfig;
  private readonly logger: Logger;
  private readonly handlers: TaskEventHandler[] = [];
  private state: TaskState = "planning";
  private running = false;

  constructor(options: TaskOrchestratorOptions) {
    this.session = options.session;
    this.oracle = options.oracle;
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger).child("orchestrator");
    this.budget = new TokenBudget(options.config.maxContextTokens);
    this.history = new ConversationHistory(options.config.maxHistoryEntries, this.budget);
    this.dispatcher = new ActionDispatcher(
      options.session,
      options.gate,
      {
        waitActionMs: options.config.waitActionMs,
        errorPauseMs: options.config.errorPauseMs,
      },
      options.logger,
    );
    this.challengeWaiter = new ChallengeWaiter(options.session, {
      pollMs: options.config.challengePollMs,
      timeoutMs: options.config.challengeTimeoutMs,
      logger: options.logger,
    });
  }

  /**
   * Register an event handler. Returns a function that removes it.
   */
  onEvent(handler: TaskEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index >= 0) this.handlers.splice(index, 1);
    };
  }

  getState(): TaskState {
    return this.state;
  }

  contextUsage(): TokenUsageSnapshot {
    return this.budget.snapshot();
  }

  /**
   * Drive `task` to completion. Terminal conditions are reported through the
   * returned outcome; only a second concurrent call rejects.
   */
  async run(task: Task, signal?: AbortSignal): Promise<TaskOutcome> {
    if (this.running) {
      throw new Error("A task is already running on this orchestrator");
    }
    this.running = true;

    const ctx: RunContext = {
      task,
      signal,
      stats: {
        oracleCalls: 0,
        stepsAttempted: 0,
        iterations: 0,
        actionsSucceeded: 0,
        actionsFailed: 0,
        challengesCleared: 0,
        usage: { inputTokens: 0, outputTokens: 0 },
        context: this.budget.snapshot(),
      },
    };

    try {
      this.history.clear();
      this.budget.reset();
      this.transition("planning");

      if (!Number.isInteger(task.maxIterations) || task.maxIterations < 1) {
        throw new RangeError(`maxIterations must be a positive integer, got ${task.maxIterations}`);
      }
      this.logger.info("Starting task", { goal: task.goal, startUrl: task.startUrl ?? null });

      const initial = await this.prepare(ctx);
      const steps = await this.requestPlan(ctx, initial);

      if (steps) {
        ctx.mode = "plan";
        this.transition("executing_plan");
        await this.executePlan(ctx, steps, initial);
        return this.complete(ctx, `All ${steps.length} plan steps attempted`, steps);
      }

      ctx.mode = "iterate";
      this.transition("iterating");
      return await this.iterate(ctx, initial);
    } catch (error) {
      return this.fail(ctx, error);
    } finally {
      this.running = false;
    }
  }

  private async prepare(ctx: RunContext): Promise<PageContent> {
    throwIfCancelled(ctx.signal);
    const startUrl = ctx.task.startUrl;
    if (startUrl && !isBlankUrl(startUrl)) {
      const outcome = await this.session.navigate(startUrl);
      if (outcome.status !== "ok") {
        this.logger.warn("Start page did not load cleanly, continuing", {
          warning: outcome.warning,
        });
      }
    }
    return await this.session.currentContent();
  }

  /**
   * Ask for a plan. Any failure other than cancellation means "no plan".
   */
  private async requestPlan(ctx: RunContext, content: PageContent): Promise<string[] | null> {
    const description = buildPageDescription(content, [], {
      maxElements: this.config.maxPromptElements,
    });
    const current = buildPlanPrompt(ctx.task.goal, description);

    try {
      const user = this.makeRoom(ORACLE_PROMPTS.planner, current);
      ctx.stats.oracleCalls += 1;
      const reply = await this.oracle.plan({ system: ORACLE_PROMPTS.planner, user, signal: ctx.signal });
      this.addUsage(ctx, reply.usage);
      this.record("user", `Plan requested for: ${ctx.task.goal}`);
      this.record(
        "assistant",
        truncate(`Plan: ${reply.steps.map((step, i) => `${i + 1}. ${step}`).join("; ")}`),
      );
      this.logger.info("Plan generated", { steps: reply.steps.length });
      this.emit({ type: "plan_created", steps: reply.steps });
      return reply.steps;
    } catch (error) {
      if (error instanceof CancelledError || ctx.signal?.aborted) {
        throw new CancelledError();
      }
      this.logger.warn("Planning failed, falling back to iterative mode", {
        error: errorMessage(error),
      });
      return null;
    }
  }

  private async executePlan(ctx: RunContext, steps: string[], initial: PageContent): Promise<void> {
    let pending: PageContent | null = initial;

    for (let index = 0; index < steps.length; ) {
      throwIfCancelled(ctx.signal);
      const content: PageContent = pending ?? (await this.session.currentContent());
      pending = null;

      const indicator = matchBlockIndicator(content);
      if (indicator) {
        pending = await this.awaitChallenge(ctx, content, indicator, "executing_plan");
        continue;
      }

      const step = steps[index];
      ctx.stats.stepsAttempted += 1;
      this.emit({ type: "step_start", index: index + 1, total: steps.length, step });
      this.logger.info(`Executing plan step ${index + 1}/${steps.length}`, { step });

      const current = buildStepPrompt({
        goal: ctx.task.goal,
        step,
        stepNumber: index + 1,
        totalSteps: steps.length,
        pageDescription: await this.describe(content),
      });
      const decision = await this.consult(
        ctx,
        ORACLE_PROMPTS.step,
        current,
        `Step ${index + 1}/${steps.length}: ${step} @ ${content.url}`,
      );

      await this.execute(ctx, decision);
      await this.settle();
      await sleep(this.config.actionDelayMs, ctx.signal);
      index += 1;
    }

    this.logger.info("Plan completed (all steps attempted)");
  }

  private async iterate(ctx: RunContext, initial: PageContent): Promise<TaskOutcome> {
    const maxIterations = ctx.task.maxIterations;
    let pending: PageContent | null = initial;
    let iteration = 0;

    while (iteration < maxIterations) {
      throwIfCancelled(ctx.signal);
      const content: PageContent = pending ?? (await this.session.currentContent());
      pending = null;

      const indicator = matchBlockIndicator(content);
      if (indicator) {
        pending = await this.awaitChallenge(ctx, content, indicator, "iterating");
        continue;
      }

      iteration += 1;
      ctx.stats.iterations = iteration;
      this.emit({ type: "iteration", iteration, maxIterations });

      const current = buildIteratePrompt({
        goal: ctx.task.goal,
        iteration,
        maxIterations,
        pageDescription: await this.describe(content),
      });
      const decision = await this.consult(
        ctx,
        ORACLE_PROMPTS.agent,
        current,
        `Iteration ${iteration} @ ${content.title} (${content.url})`,
      );

      if (decision.isComplete) {
        this.logger.info("Task completed", { iterations: iteration });
        return this.complete(ctx, decision.reasoning || "Task completed");
      }

      await this.execute(ctx, decision);
      await sleep(this.config.actionDelayMs, ctx.signal);
    }

    throw new IterationLimitError(maxIterations, ctx.task.goal);
  }

  private async awaitChallenge(
    ctx: RunContext,
    content: PageContent,
    indicator: string,
    resume: TaskState,
  ): Promise<PageContent> {
    this.logger.warn("Challenge detected, waiting for manual resolution", {
      url: content.url,
      indicator,
    });
    this.transition("waiting_challenge");
    this.emit({ type: "challenge_detected", url: content.url, indicator });

    const cleared = await this.challengeWaiter.waitUntilCleared(ctx.signal);

    ctx.stats.challengesCleared += 1;
    this.emit({ type: "challenge_cleared", url: cleared.url });
    this.transition(resume);
    return cleared;
  }

  /**
   * Best-effort load wait between plan steps. Only an unrecoverable session
   * or cancellation ends the plan.
   */
  private async settle(): Promise<void> {
    try {
      const settled = await this.session.waitForLoad();
      if (settled.status !== "ok") {
        this.logger.debug("Page did not settle after step", { warning: settled.warning });
      }
    } catch (error) {
      if (error instanceof SessionUnrecoverableError || error instanceof CancelledError) {
        throw error;
      }
      this.logger.warn("Waiting for the page failed, continuing", { error: errorMessage(error) });
    }
  }

  private async describe(content: PageContent): Promise<string> {
    const tabs = await this.session.listTabs();
    return buildPageDescription(content, tabs, {
      maxElements: this.config.maxPromptElements,
      includeBody: true,
    });
  }

  /**
   * One oracle round trip: make room in the context, ask, then account the
   * exchange in the history.
   */
  private async consult(
    ctx: RunContext,
    system: string,
    current: string,
    observation: string,
  ): Promise<Decision> {
    const user = this.makeRoom(system, current);
    ctx.stats.oracleCalls += 1;

    let reply: DecisionReply;
    try {
      reply = await this.oracle.decide({ system, user, signal: ctx.signal });
    } catch (error) {
      if (error instanceof CancelledError || ctx.signal?.aborted) {
        throw new CancelledError();
      }
      this.logger.warn("Oracle request failed", { error: errorMessage(error) });
      reply = { kind: "unparsed", raw: errorMessage(error), error: errorMessage(error) };
    }

    this.addUsage(ctx, reply.usage);
    if (reply.kind === "unparsed") {
      this.logger.warn("Oracle reply could not be parsed", { error: reply.error });
    }

    const decision = decisionFromReply(reply);
    this.emit({ type: "decision", decision, parsed: reply.kind === "decision" });
    this.logger.debug("Decision", { action: decision.action, reasoning: decision.reasoning });

    this.record("user", truncate(observation));
    this.record("assistant", summarizeDecision(decision));
    return decision;
  }

  private async execute(ctx: RunContext, decision: Decision): Promise<void> {
    const result = await this.dispatcher.dispatch(decision, ctx.signal);
    if (result.ok) {
      ctx.stats.actionsSucceeded += 1;
      if (result.warning) this.logger.warn(result.warning);
    } else {
      ctx.stats.actionsFailed += 1;
      this.logger.warn("Action failed, continuing", { action: result.kind, error: result.error });
    }
    this.emit({ type: "action_result", result });
    this.record("user", summarizeResult(result));
  }

  /**
   * Evict the oldest history until system + current prompt + completion
   * reserve fit next to the retained history. Returns the full user prompt.
   */
  private makeRoom(system: string, current: string): string {
    const needed =
      estimateTokens(system) + estimateTokens(current) + this.config.completionReserveTokens;

    while (!this.budget.canAdd(needed)) {
      if (this.history.size === 0) {
        throw new ContextExhaustedError(needed, this.budget.maxTokens);
      }
      this.history.removeOldest(1);
    }
    return composeUserPrompt(this.history.transcript(), current);
  }

  private record(role: "user" | "assistant", text: string): void {
    try {
      this.history.append(role, text);
    } catch (error) {
      if (!(error instanceof BudgetExceededError)) throw error;
      this.logger.warn("History entry does not fit the context budget, skipped", {
        tokens: error.requested,
      });
    }
  }

  private addUsage(ctx: RunContext, usage: TokenUsage | undefined): void {
    if (!usage) return;
    ctx.stats.usage.inputTokens += usage.inputTokens;
    ctx.stats.usage.outputTokens += usage.outputTokens;
  }

  private transition(to: TaskState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.emit({ type: "state_change", from, to });
  }

  private emit(event: TaskEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn("Task event handler failed", {
          event: event.type,
          error: errorMessage(error),
        });
      }
    }
  }

  private complete(ctx: RunContext, summary: string, plan?: string[]): TaskOutcome {
    this.transition("complete");
    ctx.stats.context = this.budget.snapshot();
    return { status: "complete", mode: ctx.mode ?? "iterate", summary, plan, stats: ctx.stats };
  }

  private fail(ctx: RunContext, error: unknown): TaskOutcome {
    const reason = classifyFailure(error);
    const message = errorMessage(error);
    this.transition("failed");
    ctx.stats.context = this.budget.snapshot();
    if (reason === "cancelled") {
      this.logger.warn("Task cancelled");
    } else {
      this.logger.error("Task failed", { reason, error: message });
    }
    return { status: "failed", reason, message, mode: ctx.mode, cause: error, stats: ctx.stats };
  }
}

function classifyFailure(error: unknown): FailureReason {
  if (error instanceof CancelledError) return "cancelled";
  if (error instanceof SessionUnrecoverableError) return "session_unrecoverable";
  if (error instanceof ChallengeTimeoutError) return "challenge_unresolved";
  if (error instanceof ContextExhaustedError || error instanceof IterationLimitError) {
    return "budget_exhausted";
  }
  return "fatal";
}
