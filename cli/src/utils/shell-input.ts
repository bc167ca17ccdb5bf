export type ShellCommand =
  | { type: "empty" }
  | { type: "exit" }
  | { type: "help" }
  | { type: "usage"; message: string }
  | { type: "task"; url: string; description: string }
  | { type: "go"; url: string }
  | { type: "tabs" }
  | { type: "switch"; target: string }
  | { type: "request"; input: string };

export const SHELL_HELP = [
  "Type a request in natural language, or use a command:",
  "  task <URL> <description>   run a task starting at URL",
  "  go <URL>                   open URL in the active tab",
  "  tabs                       list open tabs",
  "  switch [index|text]        make another tab active",
  "  exit                       quit",
].join("\n");

export function parseShellInput(line: string): ShellCommand {
  const input = String(line || "").trim().replace(/^>/, "").trim();
  if (!input) return { type: "empty" };

  const parts = input.split(/\s+/);
  const command = parts[0].toLowerCase();

  switch (command) {
    case "exit":
    case "quit":
      return { type: "exit" };
    case "help":
      return { type: "help" };
    case "task":
      if (parts.length < 3) return { type: "usage", message: "Usage: task <URL> <description>" };
      return { type: "task", url: parts[1], description: parts.slice(2).join(" ") };
    case "go":
      if (parts.length < 2) return { type: "usage", message: "Usage: go <URL>" };
      return { type: "go", url: parts[1] };
    case "tabs":
      return { type: "tabs" };
    case "switch":
      return { type: "switch", target: parts.slice(1).join(" ") };
    default:
      return { type: "request", input };
  }
}
