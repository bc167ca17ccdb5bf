import { join } from "path";
import { LlmClient } from "../../../agent/src/index.js";
import { LlmDecisionOracle } from "../../../agent/src/oracle/decision-oracle.js";
import { AuditLog } from "../../../agent/src/security/audit-log.js";
import {
  SecurityGate,
  type ConfirmationPrompter,
} from "../../../agent/src/security/security-gate.js";
import { TaskOrchestrator } from "../../../agent/src/orchestrator/task-orchestrator.js";
import { defaultModelFor, type WayfarerConfig } from "../../../runtime/src/config.js";
import { createLogger, type Logger } from "../../../runtime/src/logger.js";
import { BrowserSessionManager } from "../../../runtime/src/web-agent/session-manager.js";
import { PlaywrightDriver } from "../../../runtime/src/web-agent/providers/playwright-driver.js";
import { errorMessage } from "../../../runtime/src/web-agent/browser-driver.js";

export interface AgentRuntime {
  config: WayfarerConfig;
  logger: Logger;
  session: BrowserSessionManager;
  oracle: LlmDecisionOracle;
  orchestrator: TaskOrchestrator;
  close(): Promise<void>;
}

export function storageStatePath(config: WayfarerConfig): string {
  return join(config.browser.userDataDir, "storage-state.json");
}

/**
 * Wire every component from one resolved config and launch the browser.
 * The model client is built first so a missing API key fails before launch.
 */
export async function createAgentRuntime(
  config: WayfarerConfig,
  prompter: ConfirmationPrompter,
): Promise<AgentRuntime> {
  const logger = createLogger({
    scope: "wayfarer",
    level: config.logging.level,
    filePath: config.logging.filePath,
  });

  const model = new LlmClient({
    provider: config.llm.provider,
    model: config.llm.model ?? defaultModelFor(config.llm.provider),
    apiKey: config.llm.apiKey,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxOutputTokens,
  });
  const oracle = new LlmDecisionOracle(model);

  const driver = new PlaywrightDriver({
    engine: config.browser.engine,
    userDataDir: config.browser.userDataDir,
    headless: config.browser.headless,
    launchArgs: config.browser.launchArgs,
    navigationTimeoutMs: config.browser.navigationTimeoutMs,
    logger,
  });
  const session = new BrowserSessionManager(driver, {
    bodyExcerptChars: config.browser.bodyExcerptChars,
    logger,
  });
  await session.start();

  const gate = new SecurityGate(prompter, new AuditLog(config.security.auditLogPath, logger));
  const orchestrator = new TaskOrchestrator({
    session,
    oracle,
    gate,
    config: config.agent,
    logger,
  });

  return {
    config,
    logger,
    session,
    oracle,
    orchestrator,
    async close() {
      try {
        await session.saveStorageState(storageStatePath(config));
      } catch (error) {
        logger.warn("Could not save browser storage state", { error: errorMessage(error) });
      }
      await session.close();
    },
  };
}
