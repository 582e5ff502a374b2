import type { FastifyInstance } from "fastify";
import type { ResolutionOrchestrator } from "../resolver/orchestrator.js";
import { SERVICE_VERSION } from "../version.js";

export const SERVICE_NAME = "sales-intent-resolver";

export async function healthRoute(app: FastifyInstance, orchestrator: ResolutionOrchestrator): Promise<void> {
  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    mode: orchestrator.mode,
    model: orchestrator.model,
  }));
}
