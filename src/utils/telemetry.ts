import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction (paths in logger-config.ts).
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only usable when NODE_ENV=test or under Vitest.
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check: config imports this module
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * Dashboards key off these; rename only together with them.
 */
export const TelemetryEvents = {
  ResolutionCompleted: "resolver.resolution.completed",
  RemoteSucceeded: "resolver.remote.succeeded",
  RemoteFailed: "resolver.remote.failed",
  RemoteFallback: "resolver.remote.fallback",
  RemoteProbeFailed: "resolver.remote.probe_failed",
} as const;

/**
 * StatsD client (optional, configured via DD_AGENT_HOST)
 */
let statsdClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  statsdClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "intent_resolver.",
    globalTags: {
      service: env.DD_SERVICE || "sales-intent-resolver",
      env: env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "StatsD client initialized");
}

// ============================================================================
// Sanitisation
// ============================================================================

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      // Nested arrays are flattened away; telemetry keeps one level
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    const sanitizedObj: TelemetryShape = {};
    for (const [key, v] of Object.entries(value)) {
      const sanitizedChild = sanitizeTelemetryValue(v);
      if (sanitizedChild !== undefined) {
        sanitizedObj[key] = sanitizedChild;
      }
    }
    return sanitizedObj;
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryShape[string], fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

// ============================================================================
// Emit
// ============================================================================

/**
 * Emit telemetry event (logs + StatsD metrics)
 *
 * @param event Event name (use TelemetryEvents)
 */
export function emit(event: string, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!statsdClient) return;

  try {
    switch (event) {
      case TelemetryEvents.ResolutionCompleted: {
        const tags = {
          source: tag(eventData.source, "unknown"),
          result_type: tag(eventData.result_type, "unknown"),
          function_name: tag(eventData.function_name, "none"),
          fallback_reason: tag(eventData.fallback_reason, "none"),
        };
        statsdClient.increment("resolution.completed", 1, tags);
        if (typeof eventData.elapsed_ms === "number") {
          statsdClient.histogram("resolution.latency_ms", eventData.elapsed_ms, { source: tags.source });
        }
        break;
      }
      case TelemetryEvents.RemoteSucceeded:
        statsdClient.increment("remote.succeeded", 1);
        if (typeof eventData.elapsed_ms === "number") {
          statsdClient.histogram("remote.latency_ms", eventData.elapsed_ms);
        }
        break;
      case TelemetryEvents.RemoteFailed:
        statsdClient.increment("remote.failed", 1, { reason: tag(eventData.reason, "unknown") });
        break;
      case TelemetryEvents.RemoteFallback:
        statsdClient.increment("remote.fallback", 1, { reason: tag(eventData.fallback_reason, "unknown") });
        break;
      case TelemetryEvents.RemoteProbeFailed:
        statsdClient.increment("remote.probe_failed", 1);
        break;
    }
  } catch (error) {
    log.warn({ error, event }, "Failed to send StatsD metric");
  }
}
