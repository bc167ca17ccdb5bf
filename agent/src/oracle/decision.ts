import { z } from "zod";
import type { TokenUsage } from "../index.js";
import { PlanParseError } from "../errors.js";

export const ACTION_KINDS = [
  "navigate",
  "click",
  "fill",
  "focus",
  "type",
  "press",
  "switch_tab",
  "wait",
  "complete",
  "error",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

const ACTION_ALIASES: Record<string, ActionKind> = {
  input: "fill",
  keypress: "press",
  key: "press",
  switch: "switch_tab",
};

export interface Decision {
  /** Raw action name as the oracle wrote it; see `resolveActionKind`. */
  action: string;
  selector?: string;
  text?: string;
  url?: string;
  reasoning: string;
  isComplete: boolean;
  nextStep?: string;
  needsConfirm: boolean;
}

export type DecisionReply =
  | { kind: "decision"; decision: Decision; raw: string; usage?: TokenUsage }
  | { kind: "unparsed"; raw: string; error: string; usage?: TokenUsage };

export interface ParsedRequest {
  task: string;
  url?: string;
  needsUrl: boolean;
  reasoning: string;
}

const decisionSchema = z.object({
  action: z.string().trim().min(1),
  selector: z.string().nullish(),
  text: z.string().nullish(),
  url: z.string().nullish(),
  reasoning: z.string().nullish(),
  is_complete: z.boolean().nullish(),
  next_step: z.string().nullish(),
  needs_confirm: z.boolean().nullish(),
});

const planSchema = z.array(z.string());

const requestSchema = z.object({
  task: z.string().nullish(),
  url: z.string().nullish(),
  needs_url: z.boolean().nullish(),
  reasoning: z.string().nullish(),
});

export function resolveActionKind(action: string): ActionKind | null {
  const normalized = String(action || "").trim().toLowerCase();
  const alias = ACTION_ALIASES[normalized];
  if (alias) return alias;
  return ACTION_KINDS.find((kind) => kind === normalized) ?? null;
}

/**
 * Remove one surrounding markdown code fence, if the reply starts with one.
 */
export function stripCodeFence(text: string): string {
  const trimmed = String(text || "").trim();
  if (!trimmed.startsWith("```")) return trimmed;

  const newline = trimmed.indexOf("\n");
  if (newline === -1) return trimmed;

  let body = trimmed.slice(newline + 1).trim();
  const closing = body.lastIndexOf("```");
  if (closing !== -1) body = body.slice(0, closing).trim();
  return body;
}

function optionalText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseDecision(raw: string, usage?: TokenUsage): DecisionReply {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { kind: "unparsed", raw, error: `invalid JSON: ${reason}`, usage };
  }

  const result = decisionSchema.safeParse(parsed);
  if (!result.success) {
    return { kind: "unparsed", raw, error: formatIssues(result.error), usage };
  }

  const data = result.data;
  return {
    kind: "decision",
    raw,
    usage,
    decision: {
      action: data.action,
      selector: optionalText(data.selector),
      // text is kept verbatim: whitespace can matter for fill/type
      text: data.text ? data.text : undefined,
      url: optionalText(data.url),
      reasoning: data.reasoning?.trim() ?? "",
      isComplete: data.is_complete ?? false,
      nextStep: optionalText(data.next_step),
      needsConfirm: data.needs_confirm ?? false,
    },
  };
}

/**
 * Collapse a reply into the decision the loop acts on. Malformed output
 * becomes an `error` decision carrying the raw text as its reasoning.
 */
export function decisionFromReply(reply: DecisionReply): Decision {
  if (reply.kind === "decision") return reply.decision;
  return {
    action: "error",
    reasoning: reply.raw,
    isComplete: false,
    needsConfirm: false,
  };
}

function stripListMarker(line: string): string {
  let step = line.trim();
  if (step.startsWith("- ")) step = step.slice(2);
  if (step.startsWith("*")) step = step.slice(1);
  step = step.replace(/^\d+[.)]\s*/, "");
  return step.trim();
}

/**
 * A plan is a JSON array of step strings. Replies that are not JSON at all
 * are read as one step per non-empty line, without list markers.
 */
export function parsePlan(raw: string): string[] {
  const content = stripCodeFence(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    const steps = content.split("\n").map(stripListMarker).filter(Boolean);
    if (steps.length === 0) {
      throw new PlanParseError("Plan reply contained no steps", raw);
    }
    return steps;
  }

  const result = planSchema.safeParse(parsed);
  if (!result.success) {
    throw new PlanParseError("Plan reply is not a JSON array of strings", raw);
  }
  const steps = result.data.map((step) => step.trim()).filter(Boolean);
  if (steps.length === 0) {
    throw new PlanParseError("Plan reply contained no steps", raw);
  }
  return steps;
}

/**
 * Read a request-parser reply. Anything unreadable makes the whole input the
 * task.
 */
export function parseRequestReply(raw: string, input: string): ParsedRequest {
  const fallback: ParsedRequest = {
    task: input.trim(),
    needsUrl: false,
    reasoning: "Could not parse, treating as direct task",
  };

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch {
    return fallback;
  }

  const result = requestSchema.safeParse(parsed);
  if (!result.success) return fallback;

  const url = optionalText(result.data.url);
  return {
    task: optionalText(result.data.task) ?? input.trim(),
    url,
    needsUrl: result.data.needs_url ?? Boolean(url),
    reasoning: result.data.reasoning?.trim() ?? "",
  };
}
