import { describe, expect, it } from "vitest";
import {
  buildIteratePrompt,
  buildPageDescription,
  composeUserPrompt,
} from "../../../agent/src/oracle/prompts.js";
import type { PageContent } from "../../../runtime/src/web-agent/contracts.js";

const content: PageContent = {
  title: "Search",
  url: "https://search.test/",
  elements: [
    { kind: "input", label: "Query", selector: '[id="q"]' },
    { kind: "button", label: "Go", selector: "form > button:nth-of-type(1)" },
    { kind: "link", label: "Help", selector: '[id="help"]', href: "https://search.test/help" },
  ],
  bodyExcerpt: "Find anything",
};

describe("buildPageDescription", () => {
  it("lists numbered elements and the open tabs", () => {
    const description = buildPageDescription(
      content,
      [
        { index: 1, id: "a", title: "Search", url: "https://search.test/", active: true },
        { index: 2, id: "b", title: "Mail", url: "https://mail.test/", active: false },
      ],
      { maxElements: 2, includeBody: true },
    );

    expect(description).toBe(
      [
        "Title: Search",
        "URL: https://search.test/",
        "",
        "Interactive Elements:",
        '1. [input] Query (selector: [id="q"])',
        "2. [button] Go (selector: form > button:nth-of-type(1))",
        "... 1 more elements not shown",
        "",
        "Page Text:",
        "Find anything",
        "",
        "Open Tabs:",
        "[*] 1. Search (https://search.test/)",
        "[ ] 2. Mail (https://mail.test/)",
      ].join("\n"),
    );
  });

  it("omits the body and tabs unless asked", () => {
    expect(buildPageDescription({ ...content, elements: [] })).toBe(
      "Title: Search\nURL: https://search.test/\n\nInteractive Elements:",
    );
  });
});

describe("composeUserPrompt", () => {
  it("prefixes the transcript when there is one", () => {
    expect(composeUserPrompt("user: hi", "Now?")).toBe("Recent history:\nuser: hi\n\nNow?");
    expect(composeUserPrompt("", "Now?")).toBe("Now?");
  });
});

describe("buildIteratePrompt", () => {
  it("states the iteration count", () => {
    const prompt = buildIteratePrompt({
      goal: "find help",
      iteration: 3,
      maxIterations: 20,
      pageDescription: "Title: Search",
    });

    expect(prompt.split("\n").slice(0, 2)).toEqual(["Current task: find help", "Iteration 3/20"]);
  });
});
