export type BrowserEngineName = "chromium" | "firefox" | "webkit";

export type ElementKind = "button" | "link" | "input" | "textarea" | "editable";

export interface ElementDescriptor {
  kind: ElementKind;
  label: string;
  selector: string;
  href?: string;
}

/**
 * Read-only snapshot of one page. Never reused across decisions.
 */
export interface PageContent {
  title: string;
  url: string;
  elements: ElementDescriptor[];
  bodyExcerpt: string;
}

export interface TabInfo {
  /** 1-based position in opening order. */
  index: number;
  id: string;
  title: string;
  url: string;
  active: boolean;
}

export type PageActionKind = "click" | "fill" | "focus" | "type" | "press";

export type ActionOutcome =
  | { status: "ok" }
  | { status: "page-terminated"; warning: string }
  | { status: "not-settled"; warning: string };

/**
 * One browsing context tab as exposed by a driver.
 */
export interface DriverPage {
  readonly id: string;
  url(): string;
  title(): Promise<string>;
  isClosed(): boolean;
  navigate(url: string): Promise<void>;
  waitForLoad(): Promise<void>;
  extractContent(options: { bodyExcerptChars: number }): Promise<PageContent>;
  click(selector: string): Promise<void>;
  fill(selector: string, text: string): Promise<void>;
  focus(selector: string): Promise<void>;
  typeText(selector: string, text: string): Promise<void>;
  pressKey(key: string): Promise<void>;
  bringToFront(): Promise<void>;
}

export type DriverEvent =
  | { type: "page-opened"; page: DriverPage }
  | { type: "page-closed"; pageId: string }
  | { type: "page-crashed"; pageId: string }
  | { type: "context-closed" };

export type DriverEventListener = (event: DriverEvent) => void;

/**
 * Browser-control collaborator consumed by the session manager.
 *
 * `recreateContext` is the light recovery tier: it replaces the browsing
 * context but keeps the underlying browser process. `restart` is the full tier.
 */
export interface BrowserDriver {
  readonly engine: BrowserEngineName;
  launch(): Promise<void>;
  recreateContext(): Promise<void>;
  restart(): Promise<void>;
  shutdown(): Promise<void>;
  listPages(): DriverPage[];
  newPage(): Promise<DriverPage>;
  saveStorageState(path: string): Promise<void>;
  subscribe(listener: DriverEventListener): () => void;
}
