import { BudgetExceededError } from "../errors.js";
import { estimateTokens, type TokenBudget } from "./token-budget.js";

export type ConversationRole = "system" | "user" | "assistant";

export interface ConversationEntry {
  readonly role: ConversationRole;
  readonly text: string;
  readonly tokens: number;
}

/**
 * Sliding window of the most recent exchanges with the oracle.
 *
 * When a budget is attached, the budget total always equals the token sum of
 * the retained entries: appends are charged (assistant text as completion
 * tokens, everything else as prompt tokens) and every eviction is released.
 */
export class ConversationHistory {
  private readonly items: ConversationEntry[] = [];

  constructor(
    readonly maxEntries: number,
    private readonly budget?: TokenBudget,
  ) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  /**
   * Add an entry at the end. If the attached budget cannot hold it, oldest
   * entries are evicted until it fits; an entry larger than the whole budget
   * raises BudgetExceededError with the history left empty.
   */
  append(role: ConversationRole, text: string): ConversationEntry {
    const entry: ConversationEntry = { role, text, tokens: estimateTokens(text) };

    if (this.budget) {
      for (;;) {
        try {
          this.charge(entry);
          break;
        } catch (error) {
          if (!(error instanceof BudgetExceededError) || this.items.length === 0) throw error;
          this.removeOldest(1);
        }
      }
    }

    this.items.push(entry);
    if (this.items.length > this.maxEntries) {
      this.removeOldest(this.items.length - this.maxEntries);
    }
    return entry;
  }

  entries(): readonly ConversationEntry[] {
    return this.items.slice();
  }

  get size(): number {
    return this.items.length;
  }

  get totalTokens(): number {
    return this.items.reduce((sum, entry) => sum + entry.tokens, 0);
  }

  removeOldest(count = 1): ConversationEntry[] {
    const evicted = this.items.splice(0, Math.max(0, count));
    for (const entry of evicted) {
      this.refund(entry);
    }
    return evicted;
  }

  clear(): void {
    this.removeOldest(this.items.length);
  }

  /**
   * Retained entries as `role: text` lines, keeping the newest lines when
   * `maxChars` is given.
   */
  transcript(maxChars?: number): string {
    const lines = this.items.map((entry) => `${entry.role}: ${entry.text}`);
    if (maxChars === undefined) return lines.join("\n");

    const kept: string[] = [];
    let used = 0;
    for (let i = lines.length - 1; i >= 0; i -= 1) {
      const cost = lines[i].length + (kept.length > 0 ? 1 : 0);
      if (used + cost > maxChars) break;
      kept.unshift(lines[i]);
      used += cost;
    }
    return kept.join("\n");
  }

  private charge(entry: ConversationEntry): void {
    if (!this.budget) return;
    if (entry.role === "assistant") {
      this.budget.add(0, entry.tokens);
    } else {
      this.budget.add(entry.tokens, 0);
    }
  }

  private refund(entry: ConversationEntry): void {
    if (!this.budget) return;
    if (entry.role === "assistant") {
      this.budget.release(0, entry.tokens);
    } else {
      this.budget.release(entry.tokens, 0);
    }
  }
}
