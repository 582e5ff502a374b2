// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import { config } from "./config/index.js";
import { remoteResolveTimeoutMs } from "./config/timeouts.js";
import { createOrchestratorWithProbe } from "./resolver/orchestrator.js";
import type { ResolutionOrchestrator } from "./resolver/orchestrator.js";
import { healthRoute, SERVICE_NAME } from "./routes/health.js";
import { resolveRoute } from "./routes/resolve.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { getOrGenerateRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { SERVICE_VERSION } from "./version.js";

const BODY_LIMIT_BYTES = 256 * 1024;

export interface BuildOptions {
  /** Injected in tests; built from configuration otherwise. */
  orchestrator?: ResolutionOrchestrator;
}

function statusCodeOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(opts: BuildOptions = {}) {
  const orchestrator = opts.orchestrator ?? (await createOrchestratorWithProbe());

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: BODY_LIMIT_BYTES,
    genReqId: (req) => getOrGenerateRequestId(req),
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    return payload;
  });

  // Centralized error handler: structured error envelope with request_id
  app.setErrorHandler((error, request, reply) => {
    const statusCode = statusCodeOf(error);
    const message = error instanceof Error ? error.message : "Unexpected error";

    if (statusCode >= 500) {
      app.log.error({ error, request_id: request.id, method: request.method, url: request.url }, message);
      return reply.status(500).send({
        error: { code: "INTERNAL" as const, message: "Internal server error", request_id: request.id },
      });
    }

    app.log.warn({ request_id: request.id, method: request.method, url: request.url }, message);
    return reply.status(statusCode).send({
      error: { code: "INVALID_REQUEST" as const, message, request_id: request.id },
    });
  });

  await healthRoute(app, orchestrator);
  await resolveRoute(app, orchestrator);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          node_env: config.server.nodeEnv,
          model: config.llm.model,
          remote_resolve_timeout_ms: remoteResolveTimeoutMs(),
          transcript_window_turns: config.transcript.windowTurns,
        },
        "Sales intent resolver starting",
      );

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
