import { describe, it, expect, afterEach } from "vitest";
import pino from "pino";
import { createLoggerConfig, REDACT_CENSOR } from "../../src/utils/logger-config.js";
import { emit, setTestSink, TelemetryEvents } from "../../src/utils/telemetry.js";

function captureLogger() {
  const lines: string[] = [];
  const logger = pino(createLoggerConfig("info"), {
    write(line: string) {
      lines.push(line);
    },
  });
  return { logger, lines };
}

describe("logger redaction", () => {
  it("censors credentials at any depth", () => {
    const { logger, lines } = captureLogger();

    logger.info({ llm: { openaiApiKey: "test-secret", model: "gpt-4o-mini" } }, "config loaded");

    const entry = JSON.parse(lines[0] ?? "{}");
    expect(entry.llm).toEqual({ openaiApiKey: REDACT_CENSOR, model: "gpt-4o-mini" });
  });

  it("censors secret headers", () => {
    const { logger, lines } = captureLogger();

    logger.info({ req: { headers: { authorization: "Bearer test-secret", "x-api-key": "test-secret", accept: "*/*" } } });

    const entry = JSON.parse(lines[0] ?? "{}");
    expect(entry.req.headers).toEqual({
      authorization: REDACT_CENSOR,
      "x-api-key": REDACT_CENSOR,
      accept: "*/*",
    });
  });
});

describe("telemetry events", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("keeps event names stable", () => {
    expect(TelemetryEvents).toEqual({
      ResolutionCompleted: "resolver.resolution.completed",
      RemoteSucceeded: "resolver.remote.succeeded",
      RemoteFailed: "resolver.remote.failed",
      RemoteFallback: "resolver.remote.fallback",
      RemoteProbeFailed: "resolver.remote.probe_failed",
    });
  });

  it("drops values that are not serialisable before reaching the sink", () => {
    const received: Array<Record<string, unknown>> = [];
    setTestSink((_name, data) => received.push(data));

    emit(TelemetryEvents.RemoteFallback, {
      request_id: undefined,
      fallback_reason: "timeout",
      callback: () => "x",
      nested: { ok: true, when: undefined },
    });

    expect(received).toEqual([{ fallback_reason: "timeout", nested: { ok: true } }]);
  });
});
