import { describe, expect, it } from "vitest";
import { LlmDecisionOracle } from "../../../agent/src/oracle/decision-oracle.js";
import { ORACLE_PROMPTS } from "../../../agent/src/oracle/prompts.js";
import { PlanParseError } from "../../../agent/src/errors.js";
import { ScriptedModel } from "../../helpers/fake-oracle.js";

describe("LlmDecisionOracle", () => {
  it("parses a plan and passes the usage through", async () => {
    const model = new ScriptedModel(['["Open settings","Change the theme"]']);
    const oracle = new LlmDecisionOracle(model);

    const reply = await oracle.plan({ system: ORACLE_PROMPTS.planner, user: "Task: theme" });

    expect(reply).toEqual({
      steps: ["Open settings", "Change the theme"],
      usage: { inputTokens: 10, outputTokens: 5 },
    });
    expect(model.requests[0]).toEqual({ system: ORACLE_PROMPTS.planner, user: "Task: theme" });
  });

  it("rejects a plan without steps", async () => {
    const oracle = new LlmDecisionOracle(new ScriptedModel(["[]"]));

    await expect(oracle.plan({ system: "s", user: "u" })).rejects.toBeInstanceOf(PlanParseError);
  });

  it("returns an unparsed reply instead of rejecting on malformed output", async () => {
    const oracle = new LlmDecisionOracle(new ScriptedModel(["click it!"]));

    const reply = await oracle.decide({ system: "s", user: "u" });

    expect(reply).toMatchObject({ kind: "unparsed", raw: "click it!" });
  });

  it("propagates model failures", async () => {
    const oracle = new LlmDecisionOracle(new ScriptedModel([new Error("rate limited")]));

    await expect(oracle.decide({ system: "s", user: "u" })).rejects.toThrow("rate limited");
  });

  it("parses free-form requests with the request parser prompt", async () => {
    const model = new ScriptedModel([
      '{"task":"check the forecast","url":"https://weather.test","needs_url":true,"reasoning":"explicit site"}',
    ]);
    const oracle = new LlmDecisionOracle(model);

    const parsed = await oracle.parseRequest("check the forecast on weather.test");

    expect(parsed).toEqual({
      task: "check the forecast",
      url: "https://weather.test",
      needsUrl: true,
      reasoning: "explicit site",
    });
    expect(model.requests[0]).toMatchObject({
      system: ORACLE_PROMPTS.requestParser,
      user: "check the forecast on weather.test",
    });
  });
});
