import { describe, expect, it } from "vitest";
import {
  isBlockedPage,
  matchBlockIndicator,
} from "../../../runtime/src/web-agent/block-detector.js";

describe("block detector", () => {
  it("flags a CAPTCHA title", () => {
    expect(isBlockedPage({ title: "Please complete the CAPTCHA", url: "https://example.com" })).toBe(
      true,
    );
  });

  it("passes an ordinary page", () => {
    expect(isBlockedPage({ title: "Welcome", url: "https://example.com" })).toBe(false);
  });

  it("matches indicators in the url", () => {
    expect(
      matchBlockIndicator({ title: "", url: "https://shop.test/showcaptcha?retpath=/" }),
    ).toBe("captcha");
  });

  it("reports the matched indicator", () => {
    expect(matchBlockIndicator({ title: "Just a moment...", url: "https://news.test" })).toBe(
      "just a moment",
    );
    expect(matchBlockIndicator({ title: "Access Denied", url: "https://news.test" })).toBe(
      "access denied",
    );
  });

  it("does not flag pages that merely mention verification", () => {
    expect(isBlockedPage({ title: "Verify your email address", url: "https://mail.test" })).toBe(
      false,
    );
  });
});
