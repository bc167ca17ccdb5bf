import type { BrowserEngineName } from "./contracts.js";

export class BrowserDriverError extends Error {
  readonly engine?: BrowserEngineName;

  constructor(message: string, options?: { engine?: BrowserEngineName; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "BrowserDriverError";
    this.engine = options?.engine;
  }
}

/**
 * The target page was torn down while an operation was running on it, for
 * example when a challenge script closes the tab.
 */
export class PageTerminatedError extends BrowserDriverError {
  readonly pageId?: string;

  constructor(message: string, options?: { pageId?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "PageTerminatedError";
    this.pageId = options?.pageId;
  }
}

export class ActionFailedError extends Error {
  readonly action: string;

  constructor(action: string, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ActionFailedError";
    this.action = action;
  }
}

export class TargetNotFoundError extends Error {
  readonly target: string;

  constructor(target: string, message: string) {
    super(message);
    this.name = "TargetNotFoundError";
    this.target = target;
  }
}

export class SessionUnrecoverableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SessionUnrecoverableError";
  }
}

const TERMINATED_MARKERS = [
  "page closed",
  "target closed",
  "target page, context or browser has been closed",
  "has been closed",
  "browser has disconnected",
];

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isPageTerminatedError(error: unknown): boolean {
  if (error instanceof PageTerminatedError) return true;
  const message = errorMessage(error).toLowerCase();
  return TERMINATED_MARKERS.some((marker) => message.includes(marker));
}
