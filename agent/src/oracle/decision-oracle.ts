import type { LanguageModel, TokenUsage } from "../index.js";
import {
  parseDecision,
  parsePlan,
  parseRequestReply,
  type DecisionReply,
  type ParsedRequest,
} from "./decision.js";
import { ORACLE_PROMPTS } from "./prompts.js";

export interface OracleRequest {
  system: string;
  user: string;
  signal?: AbortSignal;
}

export interface PlanReply {
  steps: string[];
  usage?: TokenUsage;
}

/**
 * Decision-making collaborator of the orchestrator. `plan` rejects with
 * PlanParseError when the reply holds no usable steps; `decide` never rejects
 * for malformed output, it reports an `unparsed` reply instead.
 */
export interface DecisionOracle {
  plan(request: OracleRequest): Promise<PlanReply>;
  decide(request: OracleRequest): Promise<DecisionReply>;
}

export class LlmDecisionOracle implements DecisionOracle {
  constructor(private readonly model: LanguageModel) {}

  async plan(request: OracleRequest): Promise<PlanReply> {
    const response = await this.model.complete(request);
    return { steps: parsePlan(response.content), usage: response.usage };
  }

  async decide(request: OracleRequest): Promise<DecisionReply> {
    const response = await this.model.complete(request);
    return parseDecision(response.content, response.usage);
  }

  /**
   * Split a free-form request into a task and an optional start URL.
   */
  async parseRequest(input: string, signal?: AbortSignal): Promise<ParsedRequest> {
    const response = await this.model.complete({
      system: ORACLE_PROMPTS.requestParser,
      user: input,
      signal,
    });
    return parseRequestReply(response.content, input);
  }
}
