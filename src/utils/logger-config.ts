/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino redaction paths, shared by the Fastify
 * logger in server.ts and the standalone logger in telemetry.ts.
 *
 * SECURITY: add new secret headers or credential fields here.
 */

import type { LoggerOptions } from "pino";

export const REDACT_PATHS = [
  // Credentials (at any depth)
  "*.apiKey",
  "*.api_key",
  "*.openaiApiKey",
  "*.authorization",
  "*.token",
  "*.secret",

  // Headers
  "*.headers.authorization",
  '*.headers["x-api-key"]',
  "*.headers.cookie",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    level,
    redact: createRedactConfig(),
  };
}
