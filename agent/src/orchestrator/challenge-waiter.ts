import { ChallengeTimeoutError } from "../errors.js";
import type { BrowserSession } from "./types.js";
import type { PageContent } from "../../../runtime/src/web-agent/contracts.js";
import { isBlockedPage } from "../../../runtime/src/web-agent/block-detector.js";
import { SessionUnrecoverableError } from "../../../runtime/src/web-agent/browser-driver.js";
import { CancelledError, sleep, throwIfCancelled } from "../../../runtime/src/utils/abort.js";
import { silentLogger, type Logger } from "../../../runtime/src/logger.js";

export interface ChallengeWaiterOptions {
  pollMs: number;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Timed poll for a human to clear a CAPTCHA or block page in the visible
 * browser.
 */
export class ChallengeWaiter {
  private readonly logger: Logger;

  constructor(
    private readonly session: Pick<BrowserSession, "currentContent">,
    private readonly options: ChallengeWaiterOptions,
  ) {
    this.logger = (options.logger ?? silentLogger).child("challenge");
  }

  /**
   * Resolves with the first snapshot that is no longer blocked. Rejects with
   * ChallengeTimeoutError after `timeoutMs`, or CancelledError on abort.
   */
  async waitUntilCleared(signal?: AbortSignal): Promise<PageContent> {
    const startedAt = Date.now();
    const deadline = startedAt + this.options.timeoutMs;

    for (;;) {
      throwIfCancelled(signal);
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ChallengeTimeoutError(Date.now() - startedAt);
      }

      await sleep(Math.min(this.options.pollMs, remaining), signal);

      let content: PageContent;
      try {
        content = await this.session.currentContent();
      } catch (error) {
        if (error instanceof SessionUnrecoverableError || error instanceof CancelledError) {
          throw error;
        }
        this.logger.debug("Checking page failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (!isBlockedPage(content)) {
        this.logger.info("Challenge cleared", { url: content.url });
        return content;
      }
      this.logger.info("Waiting for challenge to be solved...", { url: content.url });
    }
  }
}
