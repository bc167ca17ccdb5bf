import { describe, expect, it } from "vitest";
import {
  decisionFromReply,
  parseDecision,
  parsePlan,
  parseRequestReply,
  resolveActionKind,
  stripCodeFence,
} from "../../../agent/src/oracle/decision.js";
import { PlanParseError } from "../../../agent/src/errors.js";

describe("stripCodeFence", () => {
  it("removes one surrounding fence with a language tag", () => {
    expect(stripCodeFence('```json\n{"action":"wait"}\n```')).toBe('{"action":"wait"}');
  });

  it("leaves unfenced text alone", () => {
    expect(stripCodeFence('  {"action":"wait"} ')).toBe('{"action":"wait"}');
  });
});

describe("parseDecision", () => {
  it("maps the wire fields onto a decision", () => {
    const reply = parseDecision(
      '```json\n{"action":"fill","selector":"#q","text":" hello ","reasoning":"Search box","is_complete":false,"next_step":"press Enter","needs_confirm":false}\n```',
      { inputTokens: 3, outputTokens: 4 },
    );

    expect(reply).toMatchObject({
      kind: "decision",
      usage: { inputTokens: 3, outputTokens: 4 },
      decision: {
        action: "fill",
        selector: "#q",
        text: " hello ",
        reasoning: "Search box",
        isComplete: false,
        nextStep: "press Enter",
        needsConfirm: false,
      },
    });
  });

  it("defaults missing flags and treats null as absent", () => {
    const reply = parseDecision('{"action":"wait","selector":null,"url":""}');

    expect(reply).toEqual({
      kind: "decision",
      raw: '{"action":"wait","selector":null,"url":""}',
      usage: undefined,
      decision: {
        action: "wait",
        selector: undefined,
        text: undefined,
        url: undefined,
        reasoning: "",
        isComplete: false,
        nextStep: undefined,
        needsConfirm: false,
      },
    });
  });

  it("reports malformed JSON as unparsed", () => {
    const reply = parseDecision("I think we should click the button");

    expect(reply.kind).toBe("unparsed");
    if (reply.kind === "unparsed") {
      expect(reply.error.startsWith("invalid JSON: ")).toBe(true);
    }
  });

  it("reports a reply without an action as unparsed", () => {
    const reply = parseDecision('{"reasoning":"no idea"}');

    expect(reply).toMatchObject({ kind: "unparsed", error: "action: Required" });
  });
});

describe("decisionFromReply", () => {
  it("turns unparsed output into an error decision carrying the raw text", () => {
    expect(decisionFromReply(parseDecision("sorry, cannot help"))).toEqual({
      action: "error",
      reasoning: "sorry, cannot help",
      isComplete: false,
      needsConfirm: false,
    });
  });
});

describe("resolveActionKind", () => {
  it("accepts canonical names and aliases in any case", () => {
    expect(resolveActionKind("Click")).toBe("click");
    expect(resolveActionKind("input")).toBe("fill");
    expect(resolveActionKind("keypress")).toBe("press");
    expect(resolveActionKind("key")).toBe("press");
    expect(resolveActionKind("switch")).toBe("switch_tab");
  });

  it("returns null for unknown actions", () => {
    expect(resolveActionKind("scroll")).toBeNull();
  });
});

describe("parsePlan", () => {
  it("reads a JSON array of steps", () => {
    expect(parsePlan('["Open the site", " Search for shoes ", ""]')).toEqual([
      "Open the site",
      "Search for shoes",
    ]);
  });

  it("falls back to one step per line without list markers", () => {
    expect(parsePlan("1. Open the site\n2) Search\n\n- Click the first result\n* Done")).toEqual([
      "Open the site",
      "Search",
      "Click the first result",
      "Done",
    ]);
  });

  it("rejects JSON that is not an array of strings", () => {
    expect(() => parsePlan('{"steps":["a"]}')).toThrow(
      new PlanParseError("Plan reply is not a JSON array of strings", ""),
    );
  });

  it("rejects an empty plan", () => {
    expect(() => parsePlan("[]")).toThrow("Plan reply contained no steps");
    expect(() => parsePlan("   ")).toThrow(PlanParseError);
  });
});

describe("parseRequestReply", () => {
  it("reads task and url", () => {
    expect(
      parseRequestReply(
        '{"task":"find the weather","url":"weather.test","needs_url":true,"reasoning":"site named"}',
        "weather on weather.test",
      ),
    ).toEqual({
      task: "find the weather",
      url: "weather.test",
      needsUrl: true,
      reasoning: "site named",
    });
  });

  it("treats the input as the task when the reply is unreadable", () => {
    expect(parseRequestReply("no json here", "  book a table  ")).toEqual({
      task: "book a table",
      needsUrl: false,
      reasoning: "Could not parse, treating as direct task",
    });
  });
});
