import { describe, expect, it } from "vitest";
import { BrowserSessionManager } from "../../../runtime/src/web-agent/session-manager.js";
import {
  ActionFailedError,
  BrowserDriverError,
  SessionUnrecoverableError,
  TargetNotFoundError,
} from "../../../runtime/src/web-agent/browser-driver.js";
import { FakeBrowserDriver, FakePage } from "../../helpers/fake-browser.js";
import { RecordingLogger } from "../../helpers/recording-logger.js";

function threeTabs() {
  const home = new FakePage("p1", { title: "Home", url: "https://home.test/" });
  const docs = new FakePage("p2", { title: "Docs", url: "https://docs.test/guide" });
  const shop = new FakePage("p3", { title: "Shop", url: "https://shop.example/cart" });
  const driver = new FakeBrowserDriver({ pages: [home, docs, shop] });
  return { home, docs, shop, driver };
}

async function startedSession(driver: FakeBrowserDriver, logger = new RecordingLogger()) {
  const session = new BrowserSessionManager(driver, { bodyExcerptChars: 10, logger });
  await session.start();
  return session;
}

describe("BrowserSessionManager", () => {
  it("opens a page on start when the browser has none", async () => {
    const driver = new FakeBrowserDriver();
    const session = await startedSession(driver);

    expect(driver.launches).toBe(1);
    expect(await session.listTabs()).toEqual([
      { index: 1, id: "fake-1", title: "", url: "about:blank", active: true },
    ]);
  });

  it("activates the first existing page on start", async () => {
    const { driver } = threeTabs();
    const session = await startedSession(driver);

    const tabs = await session.listTabs();
    expect(tabs.map((tab) => tab.id)).toEqual(["p1", "p2", "p3"]);
    expect(tabs.filter((tab) => tab.active).map((tab) => tab.id)).toEqual(["p1"]);
  });

  it("navigates the active page with an https default and waits for load", async () => {
    const { driver, home } = threeTabs();
    const session = await startedSession(driver);

    const outcome = await session.navigate("  example.com/search ");

    expect(outcome).toEqual({ status: "ok" });
    expect(home.calls).toEqual(["navigate https://example.com/search", "waitForLoad"]);
  });

  it("reports a page torn down during navigation as a warning", async () => {
    const { driver, home } = threeTabs();
    const session = await startedSession(driver);
    home.terminateNext("navigate");

    const outcome = await session.navigate("https://example.com");

    expect(outcome).toEqual({
      status: "page-terminated",
      warning:
        "page closed during navigate (possibly a challenge): Target page, context or browser has been closed",
    });
  });

  it("wraps other navigation failures in ActionFailedError", async () => {
    const { driver, home } = threeTabs();
    const session = await startedSession(driver);
    home.failNext("navigate", new Error("net::ERR_NAME_NOT_RESOLVED"));

    await expect(session.navigate("https://nowhere.test")).rejects.toThrow(
      new ActionFailedError("navigate", "navigate failed: net::ERR_NAME_NOT_RESOLVED"),
    );
  });

  it("rejects an empty url", async () => {
    const { driver } = threeTabs();
    const session = await startedSession(driver);

    await expect(session.navigate("   ")).rejects.toBeInstanceOf(ActionFailedError);
  });

  it("returns a snapshot of the active page with a truncated body", async () => {
    const { driver, home } = threeTabs();
    home.content = {
      elements: [{ kind: "button", label: "Go", selector: '[id="go"]' }],
      bodyExcerpt: "0123456789abcdef",
    };
    const session = await startedSession(driver);

    expect(await session.currentContent()).toEqual({
      title: "Home",
      url: "https://home.test/",
      elements: [{ kind: "button", label: "Go", selector: '[id="go"]' }],
      bodyExcerpt: "0123456789",
    });
  });

  it("retries a snapshot once when the page closes while it is read", async () => {
    const { driver, home } = threeTabs();
    const session = await startedSession(driver);
    home.terminateNext("extractContent");

    const content = await session.currentContent();

    expect(content.title).toBe("Home");
    expect(driver.recreates).toBe(0);
  });

  it("reports a load wait that times out without throwing", async () => {
    const { driver, home } = threeTabs();
    const logger = new RecordingLogger();
    const session = await startedSession(driver, logger);
    home.failNext("waitForLoad", new Error("Timeout 60000ms exceeded."));

    const outcome = await session.waitForLoad();

    expect(outcome).toEqual({
      status: "not-settled",
      warning: "wait failed: Timeout 60000ms exceeded.",
    });
    expect(logger.messages("warn")).toEqual(["Page did not finish loading"]);
  });

  describe("actions", () => {
    it("waits for load after a click", async () => {
      const { driver, home } = threeTabs();
      const session = await startedSession(driver);

      await session.dispatchAction("click", "#submit");

      expect(home.calls).toEqual(["click #submit", "waitForLoad"]);
    });

    it("fills and types into the selected element", async () => {
      const { driver, home } = threeTabs();
      const session = await startedSession(driver);

      await session.dispatchAction("fill", "#q", "wayfarer");
      await session.dispatchAction("type", "#q", "!");
      await session.dispatchAction("focus", "#q");

      expect(home.calls).toEqual(["fill #q wayfarer", "typeText #q !", "focus #q"]);
    });

    it("presses the key given as text, falling back to the selector", async () => {
      const { driver, home } = threeTabs();
      const session = await startedSession(driver);

      await session.dispatchAction("press", "", "Enter");
      await session.dispatchAction("press", "Tab");

      expect(home.calls).toEqual(["pressKey Enter", "pressKey Tab"]);
    });

    it("requires text for fill", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);

      await expect(session.dispatchAction("fill", "#q")).rejects.toThrow("fill requires a text");
    });

    it("tolerates a page that closes during a click", async () => {
      const { driver, home } = threeTabs();
      const session = await startedSession(driver);
      home.terminateNext("click");

      const outcome = await session.dispatchAction("click", "#pay");

      expect(outcome.status).toBe("page-terminated");
    });
  });

  describe("tabs", () => {
    it("switches by 1-based position and brings the page to front", async () => {
      const { driver, docs } = threeTabs();
      const session = await startedSession(driver);

      const tab = await session.switchActiveTab("2");

      expect(tab).toEqual({
        index: 2,
        id: "p2",
        title: "Docs",
        url: "https://docs.test/guide",
        active: true,
      });
      expect(docs.calls).toEqual(["bringToFront"]);
      expect((await session.listTabs()).find((t) => t.active)?.id).toBe("p2");
    });

    it("switches by case-insensitive title or url substring", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);

      expect((await session.switchActiveTab("SHOP")).id).toBe("p3");
      expect((await session.switchActiveTab("docs.test")).id).toBe("p2");
    });

    it("switches to the most recently opened tab for an empty target", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);

      expect((await session.switchActiveTab("")).id).toBe("p3");
    });

    it("rejects an out-of-range position and keeps the active tab", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);

      await expect(session.switchActiveTab("5")).rejects.toThrow(
        new TargetNotFoundError("5", "tab index 5 out of range (1-3)"),
      );
      expect((await session.listTabs()).find((t) => t.active)?.id).toBe("p1");
    });

    it("lists a tab with an unreadable title under an empty title", async () => {
      const { driver, docs } = threeTabs();
      const logger = new RecordingLogger();
      const session = await startedSession(driver, logger);
      docs.failNext("title", new Error("Execution context was destroyed"));

      const tabs = await session.listTabs();

      expect(tabs.map((tab) => tab.title)).toEqual(["Home", "", "Shop"]);
      expect(logger.entries).toContainEqual({
        level: "debug",
        scope: "session",
        message: "Could not read tab title",
        meta: { pageId: "p2", error: "Execution context was destroyed" },
      });
    });

    it("rejects a substring that matches nothing", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);

      await expect(session.switchActiveTab("mail")).rejects.toThrow('no tab matches "mail"');
    });

    it("rejects a substring that matches more than one tab", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);

      await expect(session.switchActiveTab(".test")).rejects.toThrow(
        '".test" matches 2 tabs: 1, 2',
      );
      expect((await session.listTabs()).find((t) => t.active)?.id).toBe("p1");
    });
  });

  describe("driver events", () => {
    it("activates a newly opened page", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);

      const popup = driver.openPage({ title: "Popup", url: "https://home.test/popup" });
      await session.whenIdle();

      const tabs = await session.listTabs();
      expect(tabs).toHaveLength(4);
      expect(tabs.find((t) => t.active)?.id).toBe(popup.id);
    });

    it("keeps an explicitly selected tab active when a page opens", async () => {
      const { driver } = threeTabs();
      const session = await startedSession(driver);
      await session.switchActiveTab("2");

      driver.openPage({ title: "Popup" });
      await session.whenIdle();

      expect((await session.listTabs()).find((t) => t.active)?.id).toBe("p2");
    });

    it("falls back to the most recent remaining page when the active one closes", async () => {
      const { driver, home, docs, shop } = threeTabs();
      const session = await startedSession(driver);

      driver.closePage(home);
      await session.whenIdle();
      expect((await session.listTabs()).find((t) => t.active)?.id).toBe("p3");

      driver.closePage(shop);
      await session.whenIdle();
      expect((await session.listTabs()).find((t) => t.active)?.id).toBe("p2");

      driver.closePage(docs);
      await session.whenIdle();
      expect(await session.listTabs()).toEqual([]);
    });

    it("logs a crashed page and drops it", async () => {
      const { driver, docs } = threeTabs();
      const logger = new RecordingLogger();
      const session = await startedSession(driver, logger);

      driver.crashPage(docs);
      await session.whenIdle();

      expect((await session.listTabs()).map((t) => t.id)).toEqual(["p1", "p3"]);
      expect(logger.entries).toContainEqual({
        level: "error",
        scope: "session",
        message: "Page crashed",
        meta: { pageId: "p2" },
      });
    });

    it("applies a page event only after the running command finishes", async () => {
      const { driver, home } = threeTabs();
      const session = await startedSession(driver);

      const navigation = session.navigate("https://home.test/next");
      const popup = driver.openPage({ title: "Popup" });
      await navigation;
      await session.whenIdle();

      expect(home.calls).toEqual(["navigate https://home.test/next", "waitForLoad"]);
      expect(popup.calls).toEqual([]);
      expect((await session.listTabs()).find((t) => t.active)?.id).toBe(popup.id);
    });
  });

  describe("recovery", () => {
    it("re-creates the browsing context when no live page is left", async () => {
      const { driver, home, docs, shop } = threeTabs();
      const session = await startedSession(driver);
      home.closed = true;
      docs.closed = true;
      shop.closed = true;

      const content = await session.currentContent();

      expect(driver.recreates).toBe(1);
      expect(driver.restarts).toBe(0);
      expect(content.url).toBe("about:blank");
    });

    it("recovers when the liveness probe fails", async () => {
      const driver = new FakeBrowserDriver();
      const session = await startedSession(driver);
      const [first] = driver.pages;
      first.failNext("title", new Error("Execution context was destroyed"));

      await session.currentContent();

      expect(driver.recreates).toBe(1);
    });

    it("restarts the browser when context re-creation fails", async () => {
      const driver = new FakeBrowserDriver();
      const session = await startedSession(driver);
      driver.pages[0].closed = true;
      driver.failRecreate = new Error("context launch failed");

      await session.currentContent();

      expect(driver.recreates).toBe(1);
      expect(driver.restarts).toBe(1);
    });

    it("gives up when both recovery tiers fail", async () => {
      const driver = new FakeBrowserDriver();
      const session = await startedSession(driver);
      driver.pages[0].closed = true;
      driver.failRecreate = new Error("context launch failed");
      driver.failRestart = new Error("browser launch failed");

      await expect(session.currentContent()).rejects.toThrow(
        new SessionUnrecoverableError("Browser session could not be recovered: browser launch failed"),
      );
    });
  });

  it("saves storage state through the driver", async () => {
    const driver = new FakeBrowserDriver();
    const session = await startedSession(driver);

    await session.saveStorageState("/tmp/state.json");

    expect(driver.savedStates).toEqual(["/tmp/state.json"]);
  });

  it("shuts the driver down on close and refuses further commands", async () => {
    const { driver } = threeTabs();
    const session = await startedSession(driver);

    await session.close();

    expect(driver.shutdowns).toBe(1);
    expect(await session.listTabs()).toEqual([]);
    await expect(session.currentContent()).rejects.toBeInstanceOf(BrowserDriverError);
  });
});
