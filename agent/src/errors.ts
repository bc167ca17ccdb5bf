export class BudgetExceededError extends Error {
  readonly requested: number;
  readonly remaining: number;

  constructor(requested: number, remaining: number) {
    super(`Token budget exceeded: requested ${requested}, remaining ${remaining}`);
    this.name = "BudgetExceededError";
    this.requested = requested;
    this.remaining = remaining;
  }
}

export class PlanParseError extends Error {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = "PlanParseError";
    this.raw = raw;
  }
}

export class ChallengeTimeoutError extends Error {
  readonly waitedMs: number;

  constructor(waitedMs: number) {
    super(`Challenge was not cleared within ${Math.round(waitedMs / 1000)}s`);
    this.name = "ChallengeTimeoutError";
    this.waitedMs = waitedMs;
  }
}

export class ConfirmationUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ConfirmationUnavailableError";
  }
}
