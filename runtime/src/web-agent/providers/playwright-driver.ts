import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import {
  chromium,
  firefox,
  webkit,
  type BrowserContext,
  type BrowserType,
  type Page,
} from "playwright";
import type {
  BrowserDriver,
  BrowserEngineName,
  DriverEvent,
  DriverEventListener,
  DriverPage,
  ElementDescriptor,
  PageContent,
} from "../contracts.js";
import {
  BrowserDriverError,
  PageTerminatedError,
  errorMessage,
  isPageTerminatedError,
} from "../browser-driver.js";
import { silentLogger, type Logger } from "../../logger.js";

const ENGINES: Record<BrowserEngineName, BrowserType> = { chromium, firefox, webkit };
const FALLBACK_ORDER: BrowserEngineName[] = ["chromium", "firefox", "webkit"];

export interface PlaywrightDriverOptions {
  engine?: BrowserEngineName;
  userDataDir?: string;
  headless?: boolean;
  launchArgs?: string[];
  navigationTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Runs in the page. Must stay self-contained: Playwright serializes it.
 */
function collectPageContent(bodyExcerptChars: number): PageContent {
  const collapse = (value: string | null | undefined): string =>
    String(value || "").replace(/\s+/g, " ").trim();

  const escapeAttr = (value: string): string =>
    value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

  const selectorFor = (element: Element): string => {
    const id = element.getAttribute("id");
    if (id) return `[id="${escapeAttr(id)}"]`;

    const name = element.getAttribute("name");
    if (name) return `${element.tagName.toLowerCase() || "*"}[name="${escapeAttr(name)}"]`;

    const path: string[] = [];
    let current: Element | null = element;
    while (current && current.tagName !== "BODY" && current.tagName !== "HTML") {
      let index = 1;
      let sibling = current.previousElementSibling;
      while (sibling) {
        if (sibling.tagName === current.tagName) index += 1;
        sibling = sibling.previousElementSibling;
      }
      path.unshift(`${current.tagName.toLowerCase()}:nth-of-type(${index})`);
      current = current.parentElement;
    }
    return path.join(" > ");
  };

  const elements: ElementDescriptor[] = [];

  document.querySelectorAll("button").forEach((button) => {
    const label = collapse(button.textContent);
    if (label) elements.push({ kind: "button", label, selector: selectorFor(button) });
  });

  document.querySelectorAll("a[href]").forEach((link) => {
    const label = collapse(link.textContent);
    if (!label) return;
    elements.push({
      kind: "link",
      label,
      selector: selectorFor(link),
      href: link.getAttribute("href") || undefined,
    });
  });

  document.querySelectorAll("input").forEach((input) => {
    const label = input.getAttribute("placeholder") || input.getAttribute("type") || "input";
    elements.push({ kind: "input", label, selector: selectorFor(input) });
  });

  document.querySelectorAll("textarea").forEach((textarea) => {
    const label = textarea.getAttribute("placeholder") || "textarea";
    elements.push({ kind: "textarea", label, selector: selectorFor(textarea) });
  });

  document.querySelectorAll('[contenteditable], [role="textbox"]').forEach((editable) => {
    const label =
      editable.getAttribute("aria-label") || editable.getAttribute("placeholder") || "text field";
    elements.push({ kind: "editable", label, selector: selectorFor(editable) });
  });

  const bodyText = collapse(document.body ? document.body.innerText : "");

  return {
    title: document.title,
    url: location.href,
    elements,
    bodyExcerpt: bodyText.slice(0, Math.max(0, bodyExcerptChars)),
  };
}

class PlaywrightPage implements DriverPage {
  constructor(
    readonly id: string,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number,
  ) {}

  url(): string {
    return this.page.url();
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  async title(): Promise<string> {
    return await this.guard(() => this.page.title());
  }

  async navigate(url: string): Promise<void> {
    await this.guard(() =>
      this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs }),
    );
  }

  async waitForLoad(): Promise<void> {
    await this.guard(() =>
      this.page.waitForLoadState("load", { timeout: this.navigationTimeoutMs }),
    );
  }

  async extractContent(options: { bodyExcerptChars: number }): Promise<PageContent> {
    return await this.guard(() => this.page.evaluate(collectPageContent, options.bodyExcerptChars));
  }

  async click(selector: string): Promise<void> {
    await this.guard(() => this.page.click(selector));
  }

  async fill(selector: string, text: string): Promise<void> {
    await this.guard(() => this.page.fill(selector, text));
  }

  async focus(selector: string): Promise<void> {
    await this.guard(() => this.page.focus(selector));
  }

  async typeText(selector: string, text: string): Promise<void> {
    await this.guard(() => this.page.locator(selector).pressSequentially(text));
  }

  async pressKey(key: string): Promise<void> {
    await this.guard(() => this.page.keyboard.press(key));
  }

  async bringToFront(): Promise<void> {
    await this.guard(() => this.page.bringToFront());
  }

  private async guard<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (this.page.isClosed() || isPageTerminatedError(error)) {
        throw new PageTerminatedError(`Page closed: ${errorMessage(error)}`, {
          pageId: this.id,
          cause: error,
        });
      }
      throw error;
    }
  }
}

/**
 * Persistent-profile Playwright driver. The user-data dir keeps manual logins
 * across runs; launch walks the engine fallback chain until one starts.
 */
export class PlaywrightDriver implements BrowserDriver {
  private context: BrowserContext | null = null;
  private activeEngine: BrowserEngineName;
  private readonly wrappers = new WeakMap<Page, PlaywrightPage>();
  private readonly attachedPages = new WeakSet<Page>();
  private readonly listeners = new Set<DriverEventListener>();
  private readonly logger: Logger;
  private pageCounter = 0;

  constructor(private readonly options: PlaywrightDriverOptions = {}) {
    this.activeEngine = options.engine ?? "chromium";
    this.logger = (options.logger ?? silentLogger).child("playwright");
  }

  get engine(): BrowserEngineName {
    return this.activeEngine;
  }

  async launch(): Promise<void> {
    if (this.context) return;
    await this.launchWithFallback(this.options.engine ?? "chromium");
  }

  async recreateContext(): Promise<void> {
    await this.closeContext();
    const context = await this.launchEngine(this.activeEngine);
    this.context = context;
    this.attachContext(context);
  }

  async restart(): Promise<void> {
    await this.closeContext();
    await this.launchWithFallback(this.options.engine ?? "chromium");
  }

  async shutdown(): Promise<void> {
    await this.closeContext();
    this.listeners.clear();
  }

  listPages(): DriverPage[] {
    if (!this.context) return [];
    return this.context.pages().map((page) => this.wrap(page));
  }

  async newPage(): Promise<DriverPage> {
    const context = this.requireContext();
    return this.wrap(await context.newPage());
  }

  async saveStorageState(path: string): Promise<void> {
    const context = this.requireContext();
    mkdirSync(dirname(resolve(path)), { recursive: true });
    await context.storageState({ path });
    this.logger.info("Saved storage state", { path });
  }

  subscribe(listener: DriverEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private requireContext(): BrowserContext {
    if (!this.context) {
      throw new BrowserDriverError("Browser is not running", { engine: this.activeEngine });
    }
    return this.context;
  }

  private async launchWithFallback(requested: BrowserEngineName): Promise<void> {
    const attempts = Array.from(new Set<BrowserEngineName>([requested, ...FALLBACK_ORDER]));
    const failures: string[] = [];

    for (const engine of attempts) {
      let context: BrowserContext;
      try {
        context = await this.launchEngine(engine);
      } catch (error) {
        failures.push(`${engine}: ${errorMessage(error)}`);
        this.logger.warn(`${engine} launch failed`, { error: errorMessage(error) });
        continue;
      }
      if (engine !== requested) {
        this.logger.warn(`Requested browser ${requested} unavailable, using ${engine} fallback`);
      }
      this.activeEngine = engine;
      this.context = context;
      this.attachContext(context);
      return;
    }

    throw new BrowserDriverError(
      `Failed to launch a persistent browser context (tried ${attempts.join(", ")}): ${failures.join("; ")}`,
      { engine: requested },
    );
  }

  private async launchEngine(engine: BrowserEngineName): Promise<BrowserContext> {
    const userDataDir = resolve(this.options.userDataDir ?? ".pw_user_data");
    mkdirSync(userDataDir, { recursive: true });

    const context = await ENGINES[engine].launchPersistentContext(userDataDir, {
      headless: this.options.headless ?? false,
      args: engine === "chromium" ? this.options.launchArgs ?? [] : [],
    });
    const timeout = this.options.navigationTimeoutMs ?? 60_000;
    context.setDefaultTimeout(timeout);
    context.setDefaultNavigationTimeout(timeout);
    this.logger.info("Browser context launched", { engine, userDataDir });
    return context;
  }

  private attachContext(context: BrowserContext): void {
    for (const page of context.pages()) {
      this.attachPage(page);
    }

    context.on("page", (page) => {
      const wrapped = this.attachPage(page);
      this.logger.debug("Browser emitted a new page", { url: page.url() });
      this.emit({ type: "page-opened", page: wrapped });
    });

    context.on("close", () => {
      if (this.context === context) this.context = null;
      this.emit({ type: "context-closed" });
    });
  }

  private attachPage(page: Page): PlaywrightPage {
    const wrapped = this.wrap(page);
    if (this.attachedPages.has(page)) return wrapped;
    this.attachedPages.add(page);

    page.on("close", () => this.emit({ type: "page-closed", pageId: wrapped.id }));
    page.on("crash", () => this.emit({ type: "page-crashed", pageId: wrapped.id }));
    return wrapped;
  }

  private wrap(page: Page): PlaywrightPage {
    const existing = this.wrappers.get(page);
    if (existing) return existing;
    const wrapped = new PlaywrightPage(
      `page-${++this.pageCounter}`,
      page,
      this.options.navigationTimeoutMs ?? 60_000,
    );
    this.wrappers.set(page, wrapped);
    return wrapped;
  }

  private async closeContext(): Promise<void> {
    const context = this.context;
    this.context = null;
    if (!context) return;
    try {
      await context.close();
    } catch (error) {
      this.logger.warn("Failed to close browser context", { error: errorMessage(error) });
    }
  }

  private emit(event: DriverEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error("Driver event listener failed", {
          event: event.type,
          error: errorMessage(error),
        });
      }
    }
  }
}
