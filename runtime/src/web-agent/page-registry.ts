import type { DriverPage } from "./contracts.js";

/**
 * Ordered set of known pages plus the active slot. Not synchronized: the
 * session manager only touches it from inside its serializing queue.
 */
export class PageRegistry {
  private readonly pages = new Map<string, DriverPage>();
  private readonly order: string[] = [];
  private activeId: string | null = null;
  private activeExplicit = false;

  has(pageId: string): boolean {
    return this.pages.has(pageId);
  }

  size(): number {
    return this.order.length;
  }

  list(): DriverPage[] {
    const out: DriverPage[] = [];
    for (const id of this.order) {
      const page = this.pages.get(id);
      if (page) out.push(page);
    }
    return out;
  }

  active(): DriverPage | null {
    if (!this.activeId) return null;
    return this.pages.get(this.activeId) ?? null;
  }

  activeIsExplicit(): boolean {
    return this.activeExplicit;
  }

  /**
   * Add a page. It becomes active unless another page was explicitly
   * selected. Returns true when the page took the active slot.
   */
  register(page: DriverPage): boolean {
    if (this.pages.has(page.id)) return false;
    this.pages.set(page.id, page);
    this.order.push(page.id);

    if (this.activeId === null || !this.activeExplicit) {
      this.activeId = page.id;
      this.activeExplicit = false;
      return true;
    }
    return false;
  }

  /**
   * Drop a page. When it was active, the most recently opened remaining page
   * takes over (implicitly), or the slot is emptied.
   */
  remove(pageId: string): { removed: boolean; activeChanged: boolean } {
    if (!this.pages.has(pageId)) return { removed: false, activeChanged: false };
    this.pages.delete(pageId);
    const index = this.order.indexOf(pageId);
    if (index >= 0) this.order.splice(index, 1);

    if (this.activeId !== pageId) return { removed: true, activeChanged: false };

    this.activeId = this.order.length > 0 ? this.order[this.order.length - 1] : null;
    this.activeExplicit = false;
    return { removed: true, activeChanged: true };
  }

  activate(pageId: string, explicit: boolean): void {
    if (!this.pages.has(pageId)) {
      throw new Error(`Unknown page '${pageId}'`);
    }
    this.activeId = pageId;
    this.activeExplicit = explicit;
  }

  clear(): void {
    this.pages.clear();
    this.order.length = 0;
    this.activeId = null;
    this.activeExplicit = false;
  }
}
