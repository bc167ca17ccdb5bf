import { describe, expect, it } from "vitest";
import { ConversationHistory } from "../../../agent/src/context/conversation-history.js";
import { TokenBudget } from "../../../agent/src/context/token-budget.js";
import { BudgetExceededError } from "../../../agent/src/errors.js";

describe("ConversationHistory", () => {
  it("keeps exactly the most recent entries once the count bound is reached", () => {
    const history = new ConversationHistory(3);
    for (let i = 1; i <= 7; i += 1) {
      history.append(i % 2 === 0 ? "assistant" : "user", `message ${i}`);
    }

    expect(history.entries().map((entry) => entry.text)).toEqual([
      "message 5",
      "message 6",
      "message 7",
    ]);
  });

  it("attaches a token estimate to each entry", () => {
    const history = new ConversationHistory(5);

    expect(history.append("user", "twelve chars")).toEqual({
      role: "user",
      text: "twelve chars",
      tokens: 3,
    });
  });

  it("keeps the budget total equal to the retained entries", () => {
    const budget = new TokenBudget(1000);
    const history = new ConversationHistory(2, budget);

    history.append("user", "a".repeat(40));
    history.append("assistant", "b".repeat(20));
    history.append("user", "c".repeat(8));

    expect(history.totalTokens).toBe(7);
    expect(budget.snapshot()).toMatchObject({ promptTokens: 2, completionTokens: 5, totalTokens: 7 });
  });

  it("evicts the oldest entries until a new one fits the budget", () => {
    const budget = new TokenBudget(10);
    const history = new ConversationHistory(10, budget);
    history.append("user", "a".repeat(16));
    history.append("user", "b".repeat(16));

    history.append("assistant", "c".repeat(24));

    expect(history.entries().map((entry) => entry.text[0])).toEqual(["b", "c"]);
    expect(budget.total).toBe(10);
  });

  it("raises when one entry exceeds the whole budget", () => {
    const budget = new TokenBudget(4);
    const history = new ConversationHistory(10, budget);
    history.append("user", "abcd");

    expect(() => history.append("user", "x".repeat(40))).toThrow(BudgetExceededError);
    expect(history.size).toBe(0);
    expect(budget.total).toBe(0);
  });

  it("returns evicted entries and refunds them", () => {
    const budget = new TokenBudget(100);
    const history = new ConversationHistory(10, budget);
    history.append("user", "first");
    history.append("assistant", "second");

    const evicted = history.removeOldest();

    expect(evicted.map((entry) => entry.text)).toEqual(["first"]);
    expect(budget.snapshot()).toMatchObject({ promptTokens: 0, completionTokens: 2 });
  });

  it("clears entries and budget together", () => {
    const budget = new TokenBudget(100);
    const history = new ConversationHistory(10, budget);
    history.append("user", "hello");
    history.clear();

    expect(history.size).toBe(0);
    expect(budget.total).toBe(0);
  });

  it("renders a transcript of the newest lines that fit", () => {
    const history = new ConversationHistory(10);
    history.append("user", "open the docs");
    history.append("assistant", "navigate https://docs.test");
    history.append("user", "Result: navigate ok");

    expect(history.transcript()).toBe(
      "user: open the docs\nassistant: navigate https://docs.test\nuser: Result: navigate ok",
    );
    expect(history.transcript(63)).toBe(
      "assistant: navigate https://docs.test\nuser: Result: navigate ok",
    );
  });

  it("rejects a non-positive entry bound", () => {
    expect(() => new ConversationHistory(0)).toThrow(RangeError);
  });
});
