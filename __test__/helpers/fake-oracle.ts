import type {
  CompletionRequest,
  CompletionResponse,
  LanguageModel,
} from "../../agent/src/index.js";
import type { DecisionOracle, OracleRequest, PlanReply } from "../../agent/src/oracle/decision-oracle.js";
import { parseDecision, type DecisionReply } from "../../agent/src/oracle/decision.js";
import { PlanParseError } from "../../agent/src/errors.js";

/**
 * Language model that answers from a fixed queue of replies.
 */
export class ScriptedModel implements LanguageModel {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error("no scripted reply left");
    if (next instanceof Error) throw next;
    return { content: next, usage: { inputTokens: 10, outputTokens: 5 } };
  }
}

export type PlanScript = string[] | Error;

/**
 * Oracle stand-in: a plan (or a planning failure) plus a decision function
 * called with the request and a 1-based call counter.
 */
export class FakeOracle implements DecisionOracle {
  readonly planRequests: OracleRequest[] = [];
  readonly decideRequests: OracleRequest[] = [];

  constructor(
    private readonly planScript: PlanScript,
    private readonly decider: (request: OracleRequest, call: number) => DecisionReply | Promise<DecisionReply>,
  ) {}

  async plan(request: OracleRequest): Promise<PlanReply> {
    this.planRequests.push(request);
    if (this.planScript instanceof Error) throw this.planScript;
    return { steps: this.planScript, usage: { inputTokens: 20, outputTokens: 10 } };
  }

  async decide(request: OracleRequest): Promise<DecisionReply> {
    this.decideRequests.push(request);
    return await this.decider(request, this.decideRequests.length);
  }
}

export const NO_PLAN = new PlanParseError("Plan reply contained no steps", "");

export function reply(json: Record<string, unknown>): DecisionReply {
  return parseDecision(JSON.stringify(json));
}
