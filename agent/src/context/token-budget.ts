import { BudgetExceededError } from "../errors.js";

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / 4);
}

export interface TokenUsageSnapshot {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  maxTokens: number;
}

function assertTokenCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Allowance of context tokens for one task. A rejected `add` leaves every
 * counter untouched.
 */
export class TokenBudget {
  private promptTokens = 0;
  private completionTokens = 0;

  constructor(readonly maxTokens: number) {
    assertTokenCount("maxTokens", maxTokens);
  }

  get total(): number {
    return this.promptTokens + this.completionTokens;
  }

  add(promptTokens: number, completionTokens: number): void {
    assertTokenCount("promptTokens", promptTokens);
    assertTokenCount("completionTokens", completionTokens);

    const requested = promptTokens + completionTokens;
    if (!this.canAdd(requested)) {
      throw new BudgetExceededError(requested, this.remaining());
    }
    this.promptTokens += promptTokens;
    this.completionTokens += completionTokens;
  }

  /**
   * Return tokens of an evicted history entry. Counters never drop below zero.
   */
  release(promptTokens: number, completionTokens: number): void {
    assertTokenCount("promptTokens", promptTokens);
    assertTokenCount("completionTokens", completionTokens);
    this.promptTokens = Math.max(0, this.promptTokens - promptTokens);
    this.completionTokens = Math.max(0, this.completionTokens - completionTokens);
  }

  canAdd(tokens: number): boolean {
    return this.total + tokens <= this.maxTokens;
  }

  remaining(): number {
    return Math.max(0, this.maxTokens - this.total);
  }

  reset(): void {
    this.promptTokens = 0;
    this.completionTokens = 0;
  }

  snapshot(): TokenUsageSnapshot {
    return {
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens,
      totalTokens: this.total,
      maxTokens: this.maxTokens,
    };
  }
}
