import type { TokenUsage } from "../index.js";
import type { TokenUsageSnapshot } from "../context/token-budget.js";
import type { ActionKind, Decision } from "../oracle/decision.js";
import type { BrowserSessionManager } from "../../../runtime/src/web-agent/session-manager.js";

export interface Task {
  goal: string;
  startUrl?: string;
  maxIterations: number;
}

export type TaskState =
  | "planning"
  | "executing_plan"
  | "iterating"
  | "waiting_challenge"
  | "complete"
  | "failed";

export type ExecutionMode = "plan" | "iterate";

export type FailureReason =
  | "budget_exhausted"
  | "challenge_unresolved"
  | "session_unrecoverable"
  | "cancelled"
  | "fatal";

export interface TaskStats {
  oracleCalls: number;
  stepsAttempted: number;
  iterations: number;
  actionsSucceeded: number;
  actionsFailed: number;
  challengesCleared: number;
  /** Provider-reported usage, summed over every oracle call. */
  usage: TokenUsage;
  context: TokenUsageSnapshot;
}

export type TaskOutcome =
  | {
      status: "complete";
      mode: ExecutionMode;
      summary: string;
      plan?: string[];
      stats: TaskStats;
    }
  | {
      status: "failed";
      reason: FailureReason;
      message: string;
      mode?: ExecutionMode;
      cause?: unknown;
      stats: TaskStats;
    };

export type DispatchResult =
  | { ok: true; kind: ActionKind; warning?: string }
  | { ok: false; kind: string; error: string };

export type TaskEvent =
  | { type: "state_change"; from: TaskState; to: TaskState }
  | { type: "plan_created"; steps: string[] }
  | { type: "step_start"; index: number; total: number; step: string }
  | { type: "iteration"; iteration: number; maxIterations: number }
  | { type: "decision"; decision: Decision; parsed: boolean }
  | { type: "action_result"; result: DispatchResult }
  | { type: "challenge_detected"; url: string; indicator: string }
  | { type: "challenge_cleared"; url: string };

export type TaskEventHandler = (event: TaskEvent) => void;

/**
 * The part of the session manager the orchestrator drives.
 */
export type BrowserSession = Pick<
  BrowserSessionManager,
  "navigate" | "currentContent" | "dispatchAction" | "waitForLoad" | "listTabs" | "switchActiveTab"
>;
