import { describe, expect, it } from "vitest";
import { PageRegistry } from "../../../runtime/src/web-agent/page-registry.js";
import { FakePage } from "../../helpers/fake-browser.js";

function ids(registry: PageRegistry): string[] {
  return registry.list().map((page) => page.id);
}

describe("PageRegistry", () => {
  it("activates each registered page until one is chosen explicitly", () => {
    const registry = new PageRegistry();

    expect(registry.register(new FakePage("a"))).toBe(true);
    expect(registry.register(new FakePage("b"))).toBe(true);
    registry.activate("a", true);

    expect(registry.register(new FakePage("c"))).toBe(false);
    expect(registry.active()?.id).toBe("a");
    expect(ids(registry)).toEqual(["a", "b", "c"]);
  });

  it("ignores a page registered twice", () => {
    const registry = new PageRegistry();
    const page = new FakePage("a");
    registry.register(page);

    expect(registry.register(page)).toBe(false);
    expect(registry.size()).toBe(1);
  });

  it("hands the active slot to the most recently opened page on removal", () => {
    const registry = new PageRegistry();
    for (const id of ["a", "b", "c"]) registry.register(new FakePage(id));
    registry.activate("b", true);

    expect(registry.remove("b")).toEqual({ removed: true, activeChanged: true });
    expect(registry.active()?.id).toBe("c");
    expect(registry.activeIsExplicit()).toBe(false);
  });

  it("keeps the active page when another page is removed", () => {
    const registry = new PageRegistry();
    for (const id of ["a", "b"]) registry.register(new FakePage(id));
    registry.activate("a", false);

    expect(registry.remove("b")).toEqual({ removed: true, activeChanged: false });
    expect(registry.remove("missing")).toEqual({ removed: false, activeChanged: false });
    expect(registry.active()?.id).toBe("a");
  });

  it("empties the active slot when the last page goes", () => {
    const registry = new PageRegistry();
    registry.register(new FakePage("a"));
    registry.remove("a");

    expect(registry.active()).toBeNull();
    expect(registry.list()).toEqual([]);
  });

  it("refuses to activate an unknown page", () => {
    const registry = new PageRegistry();

    expect(() => registry.activate("ghost", true)).toThrow("Unknown page 'ghost'");
  });
});
