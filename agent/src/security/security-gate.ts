import { ConfirmationUnavailableError } from "../errors.js";
import type { Decision } from "../oracle/decision.js";
import type { AuditLog } from "./audit-log.js";

export type Severity = "high" | "medium";

export interface DestructiveActionRequest {
  kind: string;
  description: string;
  severity: Severity;
  target?: string;
}

/**
 * Human-approval collaborator. Rejecting means no answer could be obtained,
 * which is different from a "no".
 */
export interface ConfirmationPrompter {
  confirm(request: DestructiveActionRequest): Promise<boolean>;
}

export interface ReviewResult {
  approved: boolean;
  request: DestructiveActionRequest;
}

export const DESTRUCTIVE_KEYWORDS: readonly string[] = [
  "delete",
  "remove",
  "destroy",
  "payment",
  "purchase",
  "checkout",
  "pay",
  "logout",
  "log out",
  "sign out",
  "clear",
  "reset",
  "wipe",
  "disable",
  "close account",
];

export class SecurityGate {
  constructor(
    private readonly prompter: ConfirmationPrompter,
    private readonly audit: AuditLog,
  ) {}

  isDestructive(description: string): boolean {
    const lowered = String(description || "").toLowerCase();
    return DESTRUCTIVE_KEYWORDS.some((keyword) => lowered.includes(keyword));
  }

  async requestConfirmation(request: DestructiveActionRequest): Promise<boolean> {
    try {
      return await this.prompter.confirm(request);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfirmationUnavailableError(`Could not obtain confirmation: ${reason}`, {
        cause: error,
      });
    }
  }

  logAction(
    kind: string,
    description: string,
    approved: boolean,
    details: Partial<Pick<DestructiveActionRequest, "severity" | "target">> = {},
  ): void {
    this.audit.record({ kind, description, approved, ...details });
  }

  /**
   * Ask for approval of a decision flagged `needsConfirm`. An unanswered
   * prompt is logged as denied before ConfirmationUnavailableError propagates.
   */
  async review(decision: Decision): Promise<ReviewResult> {
    const actionText = [decision.action, decision.selector, decision.text, decision.url, decision.reasoning]
      .filter(Boolean)
      .join(" ");
    const request: DestructiveActionRequest = {
      kind: decision.action,
      description: decision.reasoning || actionText,
      severity: this.isDestructive(actionText) ? "high" : "medium",
      target: decision.selector ?? decision.url ?? decision.text,
    };

    let approved: boolean;
    try {
      approved = await this.requestConfirmation(request);
    } catch (error) {
      this.logRequest(request, false);
      throw error;
    }
    this.logRequest(request, approved);
    return { approved, request };
  }

  private logRequest(request: DestructiveActionRequest, approved: boolean): void {
    this.logAction(request.kind, request.description, approved, {
      severity: request.severity,
      target: request.target,
    });
  }
}
