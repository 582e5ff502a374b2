/**
 * Response Parser for remote resolution
 *
 * Turns a chat-completions message into a ResolutionResult:
 * - no tool call → conversational reply (empty text is a failure)
 * - tool call → validated function call
 *
 * Safety rules:
 * - Only the first tool call is used.
 * - Function names outside the registry are rejected, never passed through.
 * - Argument keys outside a function's schema are dropped; wrong types are rejected.
 * - Drug and region values are mapped onto the catalog; anything else becomes null.
 *
 * Throws RemoteResponseError; the adapter converts it into a tagged failure.
 */

import { z } from "zod";
import { canonicalDrug, canonicalRegion } from "../../resolver/catalog.js";
import type { DrugName, RegionName } from "../../resolver/catalog.js";
import {
  autoInsightsCall,
  compareDrugsCall,
  conversational,
  directQuestionCall,
  regionalAnalysisCall,
  salesTrendCall,
} from "../../resolver/calls.js";
import { isFunctionName } from "../../resolver/types.js";
import type { FunctionName, ResolutionResult } from "../../resolver/types.js";
import { log } from "../../utils/telemetry.js";
import { RemoteResponseError } from "./errors.js";

export const DEFAULT_ACKNOWLEDGEMENT = "Let me analyze that data for you.";

/** The parts of a chat-completions message the parser reads. */
export interface RemoteMessage {
  content: string | null;
  tool_calls?: ReadonlyArray<{
    type: string;
    function?: { name: string; arguments: string };
  }>;
}

// ============================================================================
// Argument schemas
// ============================================================================

const OptionalText = z.string().nullish();

const ArgumentSchemas = {
  analyze_sales_trend: z.object({ drug_name: OptionalText, region: OptionalText }),
  compare_drugs: z.object({ region: OptionalText }),
  regional_analysis: z.object({ drug_name: OptionalText }),
  generate_auto_insights: z.object({}),
  answer_direct_question: z.object({ question: OptionalText }),
} satisfies Record<FunctionName, z.ZodTypeAny>;

function parseJsonArguments(raw: string): unknown {
  if (raw.trim() === "") return {};
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new RemoteResponseError("Function arguments are not valid JSON", "malformed_arguments", error);
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, name: FunctionName): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RemoteResponseError(
      `Invalid arguments for ${name}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      "malformed_arguments",
      parsed.error,
    );
  }
  return parsed.data;
}

function toDrug(value: string | null | undefined): DrugName | null {
  const drug = canonicalDrug(value);
  if (drug === null && value) {
    log.warn({ value }, "Remote resolver returned a drug outside the catalog; dropping it");
  }
  return drug;
}

function toRegion(value: string | null | undefined): RegionName | null {
  const region = canonicalRegion(value);
  if (region === null && value) {
    log.warn({ value }, "Remote resolver returned a region outside the catalog; dropping it");
  }
  return region;
}

function withAcknowledgement(result: ResolutionResult, text: string | null): ResolutionResult {
  if (result.type !== "function_call") return result;
  return { ...result, acknowledgement: text?.trim() || DEFAULT_ACKNOWLEDGEMENT };
}

function buildCall(name: FunctionName, args: unknown, utterance: string): ResolutionResult {
  switch (name) {
    case "analyze_sales_trend": {
      const parsed = validate(ArgumentSchemas.analyze_sales_trend, args, name);
      return salesTrendCall(toDrug(parsed.drug_name), toRegion(parsed.region));
    }
    case "compare_drugs": {
      const parsed = validate(ArgumentSchemas.compare_drugs, args, name);
      return compareDrugsCall(toRegion(parsed.region));
    }
    case "regional_analysis": {
      const parsed = validate(ArgumentSchemas.regional_analysis, args, name);
      return regionalAnalysisCall(toDrug(parsed.drug_name));
    }
    case "generate_auto_insights":
      validate(ArgumentSchemas.generate_auto_insights, args, name);
      return autoInsightsCall();
    case "answer_direct_question": {
      const parsed = validate(ArgumentSchemas.answer_direct_question, args, name);
      return directQuestionCall(parsed.question?.trim() || utterance);
    }
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse the model's message.
 *
 * @param utterance Used as the question when answer_direct_question arrives without one.
 */
export function parseRemoteMessage(message: RemoteMessage, utterance: string): ResolutionResult {
  const toolCall = message.tool_calls?.[0];

  if (!toolCall) {
    const text = message.content?.trim();
    if (!text) {
      throw new RemoteResponseError("Remote response had neither text nor a function call", "empty_response");
    }
    return conversational(text);
  }

  if (toolCall.type !== "function" || !toolCall.function) {
    throw new RemoteResponseError(`Unsupported tool call type: ${toolCall.type}`, "unknown_function");
  }

  const { name, arguments: rawArguments } = toolCall.function;
  if (!isFunctionName(name)) {
    throw new RemoteResponseError(`Unknown function requested: ${name}`, "unknown_function");
  }

  if ((message.tool_calls?.length ?? 0) > 1) {
    log.debug({ tool_calls: message.tool_calls?.length }, "Remote resolver returned several tool calls; using the first");
  }

  const result = buildCall(name, parseJsonArguments(rawArguments), utterance);
  return withAcknowledgement(result, message.content);
}
