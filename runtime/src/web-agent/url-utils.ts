const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Trim the input and default the scheme to https. Values that already carry a
 * scheme (http:, https:, about:, file:, ...) are left untouched.
 */
export function normalizeUrl(rawUrl: string): string {
  const trimmed = String(rawUrl || "").trim();
  if (!trimmed) return "";
  if (trimmed.startsWith("//")) return `https:${trimmed}`;
  if (SCHEME_PATTERN.test(trimmed) && !/^[^:/]+:\d+(\/|$)/.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

/**
 * True for inputs that do not name a real start page.
 */
export function isBlankUrl(url: string | undefined): boolean {
  const trimmed = String(url || "").trim().toLowerCase();
  return trimmed === "" || trimmed === "about:blank";
}
