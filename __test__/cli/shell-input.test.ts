import { describe, expect, it } from "vitest";
import { parseShellInput } from "../../cli/src/utils/shell-input.js";

describe("parseShellInput", () => {
  it("reads a task with a url and a description", () => {
    expect(parseShellInput("task https://shop.test buy the blue lamp")).toEqual({
      type: "task",
      url: "https://shop.test",
      description: "buy the blue lamp",
    });
  });

  it("explains the task syntax when arguments are missing", () => {
    expect(parseShellInput("task https://shop.test")).toEqual({
      type: "usage",
      message: "Usage: task <URL> <description>",
    });
  });

  it("reads go, tabs and switch", () => {
    expect(parseShellInput("go docs.test")).toEqual({ type: "go", url: "docs.test" });
    expect(parseShellInput("go")).toEqual({ type: "usage", message: "Usage: go <URL>" });
    expect(parseShellInput("tabs")).toEqual({ type: "tabs" });
    expect(parseShellInput("switch release notes")).toEqual({
      type: "switch",
      target: "release notes",
    });
    expect(parseShellInput("switch")).toEqual({ type: "switch", target: "" });
  });

  it("accepts exit and quit in any case, with a leading prompt marker", () => {
    expect(parseShellInput("EXIT")).toEqual({ type: "exit" });
    expect(parseShellInput("> quit")).toEqual({ type: "exit" });
  });

  it("treats blank lines as empty", () => {
    expect(parseShellInput("   ")).toEqual({ type: "empty" });
    expect(parseShellInput(">")).toEqual({ type: "empty" });
  });

  it("routes anything else as a free-form request", () => {
    expect(parseShellInput("  find the cheapest flight to Lisbon ")).toEqual({
      type: "request",
      input: "find the cheapest flight to Lisbon",
    });
  });
});
