/**
 * POST /v1/resolve
 *
 * Validates the request with Zod, resolves the utterance through the
 * orchestrator and returns the result with the path that produced it.
 * The transcript is caller-owned: the response does not append to it.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { ResolutionOrchestrator } from "../resolver/orchestrator.js";
import { FUNCTION_NAMES } from "../resolver/types.js";
import { log } from "../utils/telemetry.js";

// ============================================================================
// Request Validation Schema
// ============================================================================

export const MAX_UTTERANCE_LENGTH = 2_000;

const StoredFunctionCallSchema = z.object({
  name: z.enum(FUNCTION_NAMES),
  arguments: z
    .object({
      drug: z.string().nullish(),
      region: z.string().nullish(),
      question: z.string().nullish(),
    })
    .default({}),
});

const TranscriptTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  function_call: StoredFunctionCallSchema.optional(),
});

const ResolveRequestSchema = z.object({
  utterance: z.string().trim().min(1).max(MAX_UTTERANCE_LENGTH),
  data_context: z.string().max(10_000).default(""),
  transcript: z.array(TranscriptTurnSchema).max(500).default([]),
});

export type ResolveRequest = z.infer<typeof ResolveRequestSchema>;

// ============================================================================
// Route Registration
// ============================================================================

export async function resolveRoute(app: FastifyInstance, orchestrator: ResolutionOrchestrator): Promise<void> {
  app.post("/v1/resolve", async (req, reply) => {
    const requestId = req.id;

    const parsed = ResolveRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.flatten();
      log.warn({ request_id: requestId, errors: details }, "Resolve request validation failed");

      reply.code(400);
      return reply.send({
        error: {
          code: "INVALID_REQUEST" as const,
          message: "Request validation failed",
          details,
        },
      });
    }

    const { utterance, data_context, transcript } = parsed.data;
    const trace = await orchestrator.resolveWithTrace(utterance, data_context, transcript, { requestId });

    return reply.send({
      result: trace.result,
      source: trace.source,
      fallback_reason: trace.fallback_reason,
      request_id: requestId,
    });
  });
}
