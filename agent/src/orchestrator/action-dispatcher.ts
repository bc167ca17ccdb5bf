import { resolveActionKind, type Decision } from "../oracle/decision.js";
import type { SecurityGate } from "../security/security-gate.js";
import type { BrowserSession, DispatchResult } from "./types.js";
import type { ActionOutcome } from "../../../runtime/src/web-agent/contracts.js";
import { SessionUnrecoverableError } from "../../../runtime/src/web-agent/browser-driver.js";
import { CancelledError, sleep } from "../../../runtime/src/utils/abort.js";
import { silentLogger, type Logger } from "../../../runtime/src/logger.js";

export interface DispatcherTimings {
  waitActionMs: number;
  errorPauseMs: number;
}

/**
 * Executes one decision against the session. Per-action failures come back
 * as `{ ok: false }`; only an unrecoverable session or cancellation rejects.
 */
export class ActionDispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly session: BrowserSession,
    private readonly gate: SecurityGate,
    private readonly timings: DispatcherTimings,
    logger: Logger = silentLogger,
  ) {
    this.logger = logger.child("dispatch");
  }

  async dispatch(decision: Decision, signal?: AbortSignal): Promise<DispatchResult> {
    const kind = resolveActionKind(decision.action);
    if (!kind) {
      return { ok: false, kind: decision.action, error: `unknown action: ${decision.action}` };
    }

    try {
      if (decision.needsConfirm) {
        const { approved } = await this.gate.review(decision);
        if (!approved) {
          return { ok: false, kind, error: "action denied by user" };
        }
      }

      let outcome: ActionOutcome = { status: "ok" };
      switch (kind) {
        case "navigate":
          outcome = await this.session.navigate(decision.url ?? "");
          break;
        case "click":
        case "fill":
        case "focus":
        case "type":
        case "press":
          outcome = await this.session.dispatchAction(kind, decision.selector ?? "", decision.text);
          break;
        case "switch_tab":
          await this.session.switchActiveTab(decision.text ?? decision.url ?? "");
          break;
        case "wait":
          await sleep(this.timings.waitActionMs, signal);
          break;
        case "complete":
          break;
        case "error":
          this.logger.warn("Oracle reported an error, pausing", { reasoning: decision.reasoning });
          await sleep(this.timings.errorPauseMs, signal);
          break;
      }

      if (outcome.status !== "ok") {
        return { ok: true, kind, warning: outcome.warning };
      }
      return { ok: true, kind };
    } catch (error) {
      if (error instanceof SessionUnrecoverableError || error instanceof CancelledError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn("Action failed", { action: kind, error: message });
      return { ok: false, kind, error: message };
    }
  }
}
