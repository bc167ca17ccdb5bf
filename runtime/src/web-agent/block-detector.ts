export interface PageIdentity {
  title: string;
  url: string;
}

/**
 * Lower-case phrases of anti-bot interstitials, CAPTCHAs and access-denied
 * pages, matched as substrings of the title or the URL.
 */
export const BLOCK_INDICATORS: readonly string[] = [
  "captcha",
  "showcaptcha",
  "recaptcha",
  "hcaptcha",
  "security check",
  "bot-check",
  "bot check",
  "are you a robot",
  "are you human",
  "verify you are human",
  "verifying you are human",
  "human verification",
  "attention required",
  "just a moment",
  "access denied",
  "403 forbidden",
  "forbidden",
  "you have been blocked",
  "request blocked",
  "unusual traffic",
];

export function matchBlockIndicator(page: PageIdentity): string | null {
  const title = String(page.title || "").toLowerCase();
  const url = String(page.url || "").toLowerCase();
  for (const indicator of BLOCK_INDICATORS) {
    if (title.includes(indicator) || url.includes(indicator)) {
      return indicator;
    }
  }
  return null;
}

export function isBlockedPage(page: PageIdentity): boolean {
  return matchBlockIndicator(page) !== null;
}
