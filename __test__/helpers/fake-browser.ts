import type {
  BrowserDriver,
  BrowserEngineName,
  DriverEvent,
  DriverEventListener,
  DriverPage,
  PageContent,
} from "../../runtime/src/web-agent/contracts.js";
import { PageTerminatedError } from "../../runtime/src/web-agent/browser-driver.js";

export type FakePageMethod =
  | "title"
  | "navigate"
  | "waitForLoad"
  | "extractContent"
  | "click"
  | "fill"
  | "focus"
  | "typeText"
  | "pressKey"
  | "bringToFront";

export interface FakePageInit {
  url?: string;
  title?: string;
  content?: Partial<PageContent>;
}

/**
 * Scriptable page: `failNext` queues one error for a method, `calls` records
 * every call in order.
 */
export class FakePage implements DriverPage {
  currentUrl: string;
  currentTitle: string;
  content: Partial<PageContent>;
  closed = false;
  readonly calls: string[] = [];
  private readonly failures = new Map<FakePageMethod, Error[]>();

  constructor(
    readonly id: string,
    init: FakePageInit = {},
  ) {
    this.currentUrl = init.url ?? "about:blank";
    this.currentTitle = init.title ?? "";
    this.content = init.content ?? {};
  }

  failNext(method: FakePageMethod, error: Error): this {
    const queue = this.failures.get(method) ?? [];
    queue.push(error);
    this.failures.set(method, queue);
    return this;
  }

  terminateNext(method: FakePageMethod): this {
    return this.failNext(method, new PageTerminatedError("Target page, context or browser has been closed"));
  }

  url(): string {
    return this.currentUrl;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async title(): Promise<string> {
    this.check("title");
    return this.currentTitle;
  }

  async navigate(url: string): Promise<void> {
    this.record("navigate", url);
    this.currentUrl = url;
  }

  async waitForLoad(): Promise<void> {
    this.record("waitForLoad");
  }

  async extractContent(options: { bodyExcerptChars: number }): Promise<PageContent> {
    this.record("extractContent");
    return {
      title: this.content.title ?? this.currentTitle,
      url: this.content.url ?? this.currentUrl,
      elements: this.content.elements ?? [],
      bodyExcerpt: (this.content.bodyExcerpt ?? "").slice(0, options.bodyExcerptChars),
    };
  }

  async click(selector: string): Promise<void> {
    this.record("click", selector);
  }

  async fill(selector: string, text: string): Promise<void> {
    this.record("fill", selector, text);
  }

  async focus(selector: string): Promise<void> {
    this.record("focus", selector);
  }

  async typeText(selector: string, text: string): Promise<void> {
    this.record("typeText", selector, text);
  }

  async pressKey(key: string): Promise<void> {
    this.record("pressKey", key);
  }

  async bringToFront(): Promise<void> {
    this.record("bringToFront");
  }

  private record(method: FakePageMethod, ...args: string[]): void {
    this.check(method);
    this.calls.push([method, ...args].join(" "));
  }

  private check(method: FakePageMethod): void {
    if (this.closed) {
      throw new PageTerminatedError("Target page, context or browser has been closed", {
        pageId: this.id,
      });
    }
    const error = this.failures.get(method)?.shift();
    if (error) throw error;
  }
}

export interface FakeDriverOptions {
  engine?: BrowserEngineName;
  pages?: FakePage[];
}

/**
 * In-process stand-in for the Playwright driver. Recovery tiers can be made
 * to fail with `failRecreate` / `failRestart`.
 */
export class FakeBrowserDriver implements BrowserDriver {
  readonly engine: BrowserEngineName;
  pages: FakePage[];
  failRecreate: Error | null = null;
  failRestart: Error | null = null;
  launches = 0;
  recreates = 0;
  restarts = 0;
  shutdowns = 0;
  readonly savedStates: string[] = [];
  private readonly listeners = new Set<DriverEventListener>();
  private nextId = 1;

  constructor(options: FakeDriverOptions = {}) {
    this.engine = options.engine ?? "chromium";
    this.pages = options.pages ?? [];
  }

  createPage(init: FakePageInit = {}): FakePage {
    return new FakePage(`fake-${this.nextId++}`, init);
  }

  async launch(): Promise<void> {
    this.launches += 1;
  }

  async recreateContext(): Promise<void> {
    this.recreates += 1;
    if (this.failRecreate) throw this.failRecreate;
    this.pages = [];
  }

  async restart(): Promise<void> {
    this.restarts += 1;
    if (this.failRestart) throw this.failRestart;
    this.pages = [];
  }

  async shutdown(): Promise<void> {
    this.shutdowns += 1;
    this.pages = [];
  }

  listPages(): DriverPage[] {
    return this.pages.filter((page) => !page.closed);
  }

  async newPage(): Promise<DriverPage> {
    const page = this.createPage();
    this.pages.push(page);
    return page;
  }

  async saveStorageState(path: string): Promise<void> {
    this.savedStates.push(path);
  }

  subscribe(listener: DriverEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Simulate a popup or new tab opened by the page. */
  openPage(init: FakePageInit = {}): FakePage {
    const page = this.createPage(init);
    this.pages.push(page);
    this.emit({ type: "page-opened", page });
    return page;
  }

  closePage(page: FakePage): void {
    page.closed = true;
    this.emit({ type: "page-closed", pageId: page.id });
  }

  crashPage(page: FakePage): void {
    page.closed = true;
    this.emit({ type: "page-crashed", pageId: page.id });
  }

  emit(event: DriverEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}
