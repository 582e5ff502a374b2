/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to environment variables. Parsed lazily on
 * first access and cached; tests call _resetConfigCache() after stubbing env.
 */

import { z } from "zod";
import { MIN_COMPACT_THRESHOLD } from "../resolver/transcript.js";
import { log } from "../utils/telemetry.js";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Optional string that treats empty as undefined
 */
const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

/**
 * Optional URL string that treats empty/undefined as undefined
 */
const optionalUrl = z
  .union([z.string(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") {
      return undefined;
    }
    try {
      new URL(val);
      return val;
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid url`,
      });
      return z.NEVER;
    }
  });

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
  }),

  llm: z.object({
    openaiApiKey: optionalString,
    baseUrl: optionalUrl,
    model: z.string().min(1).default("gpt-4o-mini"),
    maxTokens: z.coerce.number().int().positive().default(500),
    temperature: z.coerce.number().min(0).max(2).default(0.2),
  }),

  remote: z.object({
    // Force the rule-based path regardless of credentials
    demoMode: booleanString.default(false),
    // Credential check at boot; a failure pins the process to rules
    probeOnStartup: booleanString.default(true),
  }),

  transcript: z.object({
    windowTurns: z.coerce.number().int().min(0).default(8),
    compactThreshold: z.coerce.number().int().min(MIN_COMPACT_THRESHOLD).default(800),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
    },
    llm: {
      openaiApiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.LLM_MODEL,
      maxTokens: env.LLM_MAX_TOKENS,
      temperature: env.LLM_TEMPERATURE,
    },
    remote: {
      demoMode: env.DEMO_MODE,
      probeOnStartup: env.REMOTE_PROBE_ON_STARTUP,
    },
    transcript: {
      windowTurns: env.TRANSCRIPT_WINDOW_TURNS,
      compactThreshold: env.TRANSCRIPT_COMPACT_THRESHOLD,
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    log.fatal({ issues: parsed.error.issues }, "Configuration validation failed");
    throw new Error("Invalid configuration. Please check environment variables.");
  }
  return parsed.data;
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing it on first access.
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Lazy view over the cached configuration.
 *
 * Each section is read through getConfig(), so tests can set environment
 * variables before first access:
 * ```
 * import { config } from './config/index.js';
 * const port = config.server.port;
 * ```
 */
export const config: Config = {
  get server() {
    return getConfig().server;
  },
  get llm() {
    return getConfig().llm;
  },
  get remote() {
    return getConfig().remote;
  },
  get transcript() {
    return getConfig().transcript;
  },
};

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
