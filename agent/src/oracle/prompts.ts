import type { PageContent, TabInfo } from "../../../runtime/src/web-agent/contracts.js";

const ACTION_VOCABULARY = `Valid actions: navigate, click, fill, focus, type, press, wait, switch_tab, complete, error.
- "click": press a button or link (selector required)
- "fill" / "type": enter text into a field (selector and text required; "type" sends keystrokes one by one)
- "focus": focus an element before typing if needed (selector required)
- "press": press a keyboard key; put the key name in text, e.g. "Enter"
- "navigate": open a URL (url required)
- "switch_tab": operate on another tab; put the tab index or part of its title/URL in text
- "wait": pause for page load or manual intervention
- "complete": the task is done`;

const DECISION_FORMAT = `Return only a JSON object, no markdown fences:
{
  "action": "...",
  "selector": "CSS selector from the page description, if the action targets an element",
  "text": "text to enter, key to press or tab to switch to",
  "url": "URL to open, if navigating",
  "reasoning": "one or two sentences explaining the decision",
  "is_complete": false,
  "next_step": "what you expect to do after this action",
  "needs_confirm": false
}
Set needs_confirm to true for anything irreversible: deleting data, payments, purchases, signing out, closing or resetting accounts.`;

export const ORACLE_PROMPTS = {
  agent: `You are a web automation agent. You complete the user's task by choosing one browser action at a time based on the current page.

${ACTION_VOCABULARY}

IMPORTANT:
- If the page shows a CAPTCHA or security challenge, choose "wait" so the user can solve it manually. Do NOT use "error".
- Only use selectors that appear in the page description.
- Set is_complete to true once the task is fully done.
- Use "error" only when no progress is possible after several attempts on the same page.

${DECISION_FORMAT}`,

  step: `You are a web automation agent executing one step of a plan. Choose the single action that accomplishes the given step on the current page.

${ACTION_VOCABULARY}

If the page shows a CAPTCHA or security challenge, choose "wait".

${DECISION_FORMAT}`,

  planner: `You convert user tasks into step-by-step plans for a browser automation agent.
Return only a JSON array of strings, each one short, concrete instruction, in execution order. Example:
["Open the images tab", "Click the first image", "Copy the image URL"]`,

  requestParser: `You are a request parser for a web automation agent. From the user's message extract:
1. the task to perform
2. the URL to start from, if one is mentioned or obvious
3. whether a URL is needed at all
4. your reasoning

Respond with JSON only: {"task": "...", "url": "...", "needs_url": true, "reasoning": "..."}`,
} as const;

/**
 * Textual rendering of a snapshot for the oracle: title, url, numbered
 * interactive elements, then the open tabs with the active one starred.
 */
export function buildPageDescription(
  content: PageContent,
  tabs: TabInfo[] = [],
  options: { maxElements?: number; includeBody?: boolean } = {},
): string {
  const lines = [`Title: ${content.title}`, `URL: ${content.url}`, "", "Interactive Elements:"];

  const limit = options.maxElements ?? content.elements.length;
  content.elements.slice(0, limit).forEach((element, index) => {
    lines.push(`${index + 1}. [${element.kind}] ${element.label} (selector: ${element.selector})`);
  });
  if (content.elements.length > limit) {
    lines.push(`... ${content.elements.length - limit} more elements not shown`);
  }

  if (options.includeBody && content.bodyExcerpt) {
    lines.push("", "Page Text:", content.bodyExcerpt);
  }

  if (tabs.length > 0) {
    lines.push("", "Open Tabs:");
    for (const tab of tabs) {
      lines.push(`[${tab.active ? "*" : " "}] ${tab.index}. ${tab.title} (${tab.url})`);
    }
  }

  return lines.join("\n");
}

/**
 * Prefix the current prompt with the retained conversation transcript.
 */
export function composeUserPrompt(transcript: string, current: string): string {
  return transcript ? `Recent history:\n${transcript}\n\n${current}` : current;
}

export function buildPlanPrompt(goal: string, pageDescription: string): string {
  return `Task: "${goal}"

Current page (brief):
${pageDescription}

Break the task into a concise, ordered list of concrete steps.`;
}

export function buildStepPrompt(input: {
  goal: string;
  step: string;
  stepNumber: number;
  totalSteps: number;
  pageDescription: string;
}): string {
  return `Task: ${input.goal}
Plan step ${input.stepNumber}/${input.totalSteps}: ${input.step}

Current page:
${input.pageDescription}

Return a single JSON decision for this step.`;
}

export function buildIteratePrompt(input: {
  goal: string;
  iteration: number;
  maxIterations: number;
  pageDescription: string;
}): string {
  return `Current task: ${input.goal}
Iteration ${input.iteration}/${input.maxIterations}

Current page state:
${input.pageDescription}

What should be the next action? Return a single JSON decision.`;
}
