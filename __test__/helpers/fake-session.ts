import type { BrowserSession } from "../../agent/src/orchestrator/types.js";
import type {
  ActionOutcome,
  PageActionKind,
  PageContent,
  TabInfo,
} from "../../runtime/src/web-agent/contracts.js";

export function page(title: string, url = "https://app.test/"): PageContent {
  return { title, url, elements: [], bodyExcerpt: "" };
}

/**
 * Session stand-in for orchestrator tests. Snapshots come from `contents` in
 * order; the last one repeats. Every command is appended to `log`.
 */
export class FakeSession implements BrowserSession {
  readonly log: string[] = [];
  contents: Array<PageContent | Error>;
  tabs: TabInfo[] = [];
  nextOutcome: ActionOutcome = { status: "ok" };
  nextError: Error | null = null;
  snapshots = 0;
  waits = 0;
  /** Errors thrown by successive `waitForLoad` calls. */
  waitErrors: Error[] = [];

  constructor(contents: Array<PageContent | Error> = [page("Home")]) {
    this.contents = contents;
  }

  async navigate(url: string): Promise<ActionOutcome> {
    this.log.push(`navigate ${url}`);
    return this.outcome();
  }

  async currentContent(): Promise<PageContent> {
    this.snapshots += 1;
    const next = this.contents.length > 1 ? this.contents.shift() : this.contents[0];
    if (next === undefined) throw new Error("no scripted page content");
    if (next instanceof Error) throw next;
    return next;
  }

  async dispatchAction(kind: PageActionKind, selector: string, text?: string): Promise<ActionOutcome> {
    this.log.push([kind, selector, text].filter((part) => part !== undefined).join(" "));
    return this.outcome();
  }

  async waitForLoad(): Promise<ActionOutcome> {
    this.waits += 1;
    const error = this.waitErrors.shift();
    if (error) throw error;
    return { status: "ok" };
  }

  async listTabs(): Promise<TabInfo[]> {
    return this.tabs;
  }

  async switchActiveTab(target: string): Promise<TabInfo> {
    this.log.push(`switch ${target}`);
    return { index: 1, id: "t1", title: target, url: "https://app.test/", active: true };
  }

  private outcome(): ActionOutcome {
    const error = this.nextError;
    const outcome = this.nextOutcome;
    this.nextError = null;
    this.nextOutcome = { status: "ok" };
    if (error) throw error;
    return outcome;
  }
}
