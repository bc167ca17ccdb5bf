import { config } from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { existsSync, readFileSync } from "fs";
import { z } from "zod";

export const WAYFARER_HOME = join(homedir(), ".wayfarer");

/**
 * Load environment variables from ~/.wayfarer/.env, then ./.env.
 * Only the first call has any effect.
 */
let envLoaded = false;
export function ensureEnvLoaded(): void {
  if (envLoaded) return;
  config({ path: join(WAYFARER_HOME, ".env") });
  config();
  envLoaded = true;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const llmSchema = z
  .object({
    provider: z.enum(["openai", "anthropic"]).default("openai"),
    model: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0.7),
    maxOutputTokens: z.number().int().positive().default(3000),
  })
  .default({});

const browserSchema = z
  .object({
    engine: z.enum(["chromium", "firefox", "webkit"]).default("chromium"),
    userDataDir: z.string().min(1).default(".pw_user_data"),
    headless: z.boolean().default(false),
    launchArgs: z
      .array(z.string())
      .default(["--disable-gpu", "--disable-features=IsolatedSiteInstances"]),
    bodyExcerptChars: z.number().int().positive().default(2000),
    navigationTimeoutMs: z.number().int().positive().default(60_000),
  })
  .default({});

const agentSchema = z
  .object({
    maxIterations: z.number().int().positive().default(20),
    maxContextTokens: z.number().int().positive().default(8000),
    maxHistoryEntries: z.number().int().positive().default(20),
    completionReserveTokens: z.number().int().nonnegative().default(400),
    actionDelayMs: z.number().int().nonnegative().default(1000),
    waitActionMs: z.number().int().nonnegative().default(2000),
    errorPauseMs: z.number().int().nonnegative().default(1000),
    challengePollMs: z.number().int().positive().default(2000),
    challengeTimeoutMs: z.number().int().positive().default(5 * 60 * 1000),
    maxPromptElements: z.number().int().positive().default(80),
  })
  .default({});

const loggingSchema = z
  .object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    filePath: z.string().min(1).optional(),
  })
  .default({});

const securitySchema = z
  .object({
    auditLogPath: z.string().min(1).default(join(WAYFARER_HOME, "audit.jsonl")),
    autoApprove: z.boolean().default(false),
  })
  .default({});

export const wayfarerConfigSchema = z.object({
  llm: llmSchema,
  browser: browserSchema,
  agent: agentSchema,
  logging: loggingSchema,
  security: securitySchema,
});

export type WayfarerConfig = z.infer<typeof wayfarerConfigSchema>;
export type LlmConfig = WayfarerConfig["llm"];
export type BrowserConfig = WayfarerConfig["browser"];
export type AgentLoopConfig = WayfarerConfig["agent"];

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeRecords(base: ConfigRecord, patch: ConfigRecord): ConfigRecord {
  const merged: ConfigRecord = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeRecords(current, value) : value;
  }
  return merged;
}

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Translate the recognised environment variables into a partial config record.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const provider = nonEmpty(env.WAYFARER_LLM_PROVIDER)?.toLowerCase();
  const apiKey =
    provider === "anthropic"
      ? nonEmpty(env.ANTHROPIC_API_KEY)
      : nonEmpty(env.OPENAI_API_KEY) ?? nonEmpty(env.ANTHROPIC_API_KEY);
  const logLevel = nonEmpty(env.WAYFARER_LOG_LEVEL)?.toLowerCase();

  return {
    llm: {
      provider,
      model: nonEmpty(env.WAYFARER_MODEL),
      apiKey,
    },
    browser: {
      engine: nonEmpty(env.PLAYWRIGHT_BROWSER)?.toLowerCase(),
      userDataDir: nonEmpty(env.BROWSER_USER_DATA_DIR),
      headless: parseBool(env.WAYFARER_HEADLESS),
    },
    agent: {
      maxIterations: parseInteger(env.WAYFARER_MAX_ITERATIONS),
    },
    logging: {
      level: parseBool(env.DEBUG) ? "debug" : logLevel,
    },
  };
}

/**
 * Load ~/.wayfarer/config.json (or the given path).
 * A missing file yields an empty record; unreadable JSON is a ConfigError.
 */
export function loadConfigFile(path = join(WAYFARER_HOME, "config.json")): ConfigRecord {
  if (!existsSync(path)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read config file ${path}`, [reason]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  file?: ConfigRecord;
  overrides?: ConfigRecord;
}

/**
 * Build the single configuration object for a process: defaults, then the
 * config file, then environment variables, then explicit overrides.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): WayfarerConfig {
  const env = options.env ?? process.env;
  const file = options.file ?? loadConfigFile();
  const merged = mergeRecords(
    mergeRecords(file, configFromEnv(env)),
    options.overrides ?? {},
  );

  const result = wayfarerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}

export function defaultModelFor(provider: LlmConfig["provider"]): string {
  return provider === "anthropic" ? "claude-3-5-sonnet-20241022" : "gpt-4o-mini";
}

/**
 * Copy of the config safe to print: secrets are masked.
 */
export function redactConfig(cfg: WayfarerConfig): WayfarerConfig {
  const apiKey = cfg.llm.apiKey;
  return {
    ...cfg,
    llm: {
      ...cfg.llm,
      apiKey: apiKey ? `${apiKey.slice(0, 4)}…${"*".repeat(4)}` : undefined,
    },
  };
}
