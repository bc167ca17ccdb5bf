import type {
  ActionOutcome,
  BrowserDriver,
  DriverEvent,
  DriverPage,
  PageActionKind,
  PageContent,
  TabInfo,
} from "./contracts.js";
import {
  ActionFailedError,
  BrowserDriverError,
  SessionUnrecoverableError,
  TargetNotFoundError,
  errorMessage,
  isPageTerminatedError,
} from "./browser-driver.js";
import { PageRegistry } from "./page-registry.js";
import { normalizeUrl } from "./url-utils.js";
import { silentLogger, type Logger } from "../logger.js";

export interface SessionManagerOptions {
  bodyExcerptChars?: number;
  logger?: Logger;
}

/**
 * Owns the open tabs of one browser session and the active page.
 *
 * Commands and driver notifications both mutate the page registry, so every
 * registry access runs inside `exclusive`, a promise-chained queue. Helpers
 * prefixed with `locked` assume the queue is already held.
 */
export class BrowserSessionManager {
  private readonly registry = new PageRegistry();
  private readonly logger: Logger;
  private readonly bodyExcerptChars: number;
  private tail: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;
  private started = false;

  constructor(
    private readonly driver: BrowserDriver,
    options: SessionManagerOptions = {},
  ) {
    this.logger = (options.logger ?? silentLogger).child("session");
    this.bodyExcerptChars = options.bodyExcerptChars ?? 2000;
  }

  async start(): Promise<void> {
    await this.exclusive(async () => {
      if (this.started) return;
      await this.driver.launch();
      this.unsubscribe = this.driver.subscribe((event) => this.onDriverEvent(event));
      await this.lockedRebuild();
      this.started = true;
      this.logger.info("Browser session started", { engine: this.driver.engine });
    });
  }

  /**
   * Load `url` (scheme defaults to https) in the active page and wait for it.
   * Teardown of the page during the load is reported as a warning outcome.
   */
  async navigate(url: string): Promise<ActionOutcome> {
    const target = normalizeUrl(url);
    if (!target) {
      throw new ActionFailedError("navigate", "navigate requires a url");
    }
    return await this.exclusive(async () => {
      const page = await this.lockedEnsureAlive();
      return await this.tolerateTermination("navigate", async () => {
        await page.navigate(target);
        await page.waitForLoad();
      });
    });
  }

  async currentContent(): Promise<PageContent> {
    return await this.exclusive(async () => {
      const page = await this.lockedEnsureAlive();
      try {
        return await page.extractContent({ bodyExcerptChars: this.bodyExcerptChars });
      } catch (error) {
        if (!isPageTerminatedError(error)) {
          throw new BrowserDriverError(`Failed to read page content: ${errorMessage(error)}`, {
            engine: this.driver.engine,
            cause: error,
          });
        }
        this.logger.warn("Page closed while reading content, retrying on a live page", {
          pageId: page.id,
        });
        const retry = await this.lockedEnsureAlive();
        return await retry.extractContent({ bodyExcerptChars: this.bodyExcerptChars });
      }
    });
  }

  async dispatchAction(
    kind: PageActionKind,
    selector: string,
    text?: string,
  ): Promise<ActionOutcome> {
    return await this.exclusive(async () => {
      const page = await this.lockedEnsureAlive();
      return await this.tolerateTermination(kind, async () => {
        switch (kind) {
          case "click":
            requireValue(kind, "selector", selector);
            await page.click(selector);
            await page.waitForLoad();
            return;
          case "fill":
            requireValue(kind, "selector", selector);
            await page.fill(selector, requireValue(kind, "text", text));
            return;
          case "focus":
            requireValue(kind, "selector", selector);
            await page.focus(selector);
            return;
          case "type":
            requireValue(kind, "selector", selector);
            await page.typeText(selector, requireValue(kind, "text", text));
            return;
          case "press":
            await page.pressKey(requireValue(kind, "key", text || selector));
            return;
        }
      });
    });
  }

  async waitForLoad(): Promise<ActionOutcome> {
    return await this.exclusive(async () => {
      const page = this.registry.active();
      if (!page) return { status: "ok" };
      try {
        return await this.tolerateTermination("wait", () => page.waitForLoad());
      } catch (error) {
        if (!(error instanceof ActionFailedError)) throw error;
        this.logger.warn("Page did not finish loading", { error: error.message });
        return { status: "not-settled", warning: error.message };
      }
    });
  }

  async listTabs(): Promise<TabInfo[]> {
    return await this.exclusive(() => this.lockedListTabs());
  }

  /**
   * Select the active tab: empty target picks the most recently opened tab,
   * digits pick a 1-based position, anything else is a case-insensitive
   * substring of the title or url that must match exactly one tab.
   */
  async switchActiveTab(target: string): Promise<TabInfo> {
    return await this.exclusive(async () => {
      const tabs = await this.lockedListTabs();
      if (tabs.length === 0) {
        throw new TargetNotFoundError(target, "no open tabs to switch to");
      }

      const trimmed = String(target || "").trim();
      const chosen = pickTab(tabs, trimmed);

      const page = this.registry.list().find((candidate) => candidate.id === chosen.id);
      if (!page) {
        throw new TargetNotFoundError(trimmed, `tab ${chosen.index} is no longer open`);
      }
      try {
        await page.bringToFront();
      } catch (error) {
        if (!isPageTerminatedError(error)) throw error;
        throw new TargetNotFoundError(trimmed, `tab ${chosen.index} closed while switching`);
      }
      this.registry.activate(page.id, true);
      this.logger.info("Switched active tab", { index: chosen.index, url: chosen.url });
      return { ...chosen, active: true };
    });
  }

  async saveStorageState(path: string): Promise<void> {
    await this.exclusive(() => this.driver.saveStorageState(path));
  }

  async close(): Promise<void> {
    await this.exclusive(async () => {
      this.unsubscribe?.();
      this.unsubscribe = null;
      this.registry.clear();
      if (!this.started) return;
      this.started = false;
      await this.driver.shutdown();
      this.logger.info("Browser session closed");
    });
  }

  /**
   * Resolves once every queued command and notification has been applied.
   */
  async whenIdle(): Promise<void> {
    await this.exclusive(async () => undefined);
  }

  private exclusive<T>(run: () => Promise<T>): Promise<T> {
    const next = this.tail.then(run, run);
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private onDriverEvent(event: DriverEvent): void {
    void this.exclusive(async () => this.applyDriverEvent(event)).catch((error: unknown) => {
      this.logger.error("Failed to apply browser event", {
        event: event.type,
        error: errorMessage(error),
      });
    });
  }

  private applyDriverEvent(event: DriverEvent): void {
    switch (event.type) {
      case "page-opened": {
        if (event.page.isClosed()) return;
        const activated = this.registry.register(event.page);
        this.logger.debug("Page opened", { pageId: event.page.id, activated });
        return;
      }
      case "page-closed": {
        const { removed, activeChanged } = this.registry.remove(event.pageId);
        if (removed) {
          this.logger.debug("Page closed", {
            pageId: event.pageId,
            active: this.registry.active()?.id ?? null,
            activeChanged,
          });
        }
        return;
      }
      case "page-crashed": {
        this.logger.error("Page crashed", { pageId: event.pageId });
        this.registry.remove(event.pageId);
        return;
      }
      case "context-closed":
        this.logger.warn("Browsing context closed");
        return;
    }
  }

  private async lockedListTabs(): Promise<TabInfo[]> {
    const active = this.registry.active();
    const tabs: TabInfo[] = [];
    for (const page of this.registry.list()) {
      tabs.push({
        index: tabs.length + 1,
        id: page.id,
        title: await this.safeTitle(page),
        url: page.url(),
        active: page.id === active?.id,
      });
    }
    return tabs;
  }

  private async lockedEnsureAlive(): Promise<DriverPage> {
    if (!this.started) {
      throw new BrowserDriverError("Browser session has not been started", {
        engine: this.driver.engine,
      });
    }

    let active = this.registry.active();
    while (active && active.isClosed()) {
      this.registry.remove(active.id);
      active = this.registry.active();
    }
    if (active && (await this.probe(active))) return active;

    return await this.lockedRecover();
  }

  private async probe(page: DriverPage): Promise<boolean> {
    if (page.isClosed()) return false;
    try {
      await page.title();
      return true;
    } catch (error) {
      this.logger.debug("Liveness probe failed", { pageId: page.id, error: errorMessage(error) });
      return false;
    }
  }

  private async lockedRecover(): Promise<DriverPage> {
    this.logger.warn("No responsive page, re-creating browsing context");
    try {
      await this.driver.recreateContext();
      return await this.lockedRebuild();
    } catch (error) {
      this.logger.warn("Context recovery failed, restarting browser", {
        error: errorMessage(error),
      });
    }

    try {
      await this.driver.restart();
      return await this.lockedRebuild();
    } catch (error) {
      this.logger.error("Browser restart failed", { error: errorMessage(error) });
      throw new SessionUnrecoverableError(
        `Browser session could not be recovered: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async lockedRebuild(): Promise<DriverPage> {
    this.registry.clear();
    let pages = this.driver.listPages().filter((page) => !page.isClosed());
    if (pages.length === 0) {
      pages = [await this.driver.newPage()];
    }
    for (const page of pages) {
      this.registry.register(page);
    }
    const first = pages[0];
    this.registry.activate(first.id, false);

    if (!(await this.probe(first))) {
      throw new BrowserDriverError("Browser has no responsive page", {
        engine: this.driver.engine,
      });
    }
    return first;
  }

  private async safeTitle(page: DriverPage): Promise<string> {
    try {
      return await page.title();
    } catch (error) {
      this.logger.debug("Could not read tab title", { pageId: page.id, error: errorMessage(error) });
      return "";
    }
  }

  private async tolerateTermination(
    action: string,
    run: () => Promise<void>,
  ): Promise<ActionOutcome> {
    try {
      await run();
      return { status: "ok" };
    } catch (error) {
      if (error instanceof ActionFailedError) throw error;
      if (isPageTerminatedError(error)) {
        const warning = `page closed during ${action} (possibly a challenge): ${errorMessage(error)}`;
        this.logger.warn(warning);
        return { status: "page-terminated", warning };
      }
      throw new ActionFailedError(action, `${action} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

function pickTab(tabs: TabInfo[], target: string): TabInfo {
  if (!target) return tabs[tabs.length - 1];

  if (/^\d+$/.test(target)) {
    const position = Number(target);
    const byIndex = tabs.find((tab) => tab.index === position);
    if (!byIndex) {
      throw new TargetNotFoundError(target, `tab index ${position} out of range (1-${tabs.length})`);
    }
    return byIndex;
  }

  const needle = target.toLowerCase();
  const matches = tabs.filter(
    (tab) => tab.title.toLowerCase().includes(needle) || tab.url.toLowerCase().includes(needle),
  );
  if (matches.length === 0) {
    throw new TargetNotFoundError(target, `no tab matches "${target}"`);
  }
  if (matches.length > 1) {
    throw new TargetNotFoundError(
      target,
      `"${target}" matches ${matches.length} tabs: ${matches.map((tab) => tab.index).join(", ")}`,
    );
  }
  return matches[0];
}

function requireValue(action: string, field: string, value: string | undefined): string {
  if (!value) {
    throw new ActionFailedError(action, `${action} requires a ${field}`);
  }
  return value;
}
