/**
 * Resolver Types
 *
 * Shared shapes for the intent-resolution engine: the five analysis functions,
 * resolution results, transcript turns and prior-call records.
 */

import type { DrugName, RegionName } from "./catalog.js";

// ============================================================================
// Analysis Functions
// ============================================================================

export const FUNCTION_NAMES = [
  "analyze_sales_trend",
  "compare_drugs",
  "regional_analysis",
  "generate_auto_insights",
  "answer_direct_question",
] as const;

export type FunctionName = (typeof FUNCTION_NAMES)[number];

/**
 * Argument contract per function. Absent entity filters are null, never "",
 * so the analytics layer can tell "no filter" from "filter by empty string".
 */
export interface FunctionArguments {
  analyze_sales_trend: { drug: DrugName | null; region: RegionName | null };
  compare_drugs: { region: RegionName | null };
  regional_analysis: { drug: DrugName | null };
  generate_auto_insights: Record<string, never>;
  answer_direct_question: { question: string };
}

export type FunctionCallOf<K extends FunctionName> = {
  type: "function_call";
  name: K;
  arguments: FunctionArguments[K];
  /** Short natural-language acknowledgement shown before the analysis runs. */
  acknowledgement: string;
};

export type FunctionCallResult = { [K in FunctionName]: FunctionCallOf<K> }[FunctionName];

export interface ConversationalResult {
  type: "conversational";
  reply: string;
}

export type ResolutionResult = ConversationalResult | FunctionCallResult;

// ============================================================================
// Transcript
// ============================================================================

/**
 * Structured record of the function an assistant turn executed.
 * Written by the caller after every function-call resolution.
 */
export interface StoredFunctionCall {
  name: FunctionName;
  arguments: {
    drug?: string | null;
    region?: string | null;
    question?: string | null;
  };
}

export interface TranscriptTurn {
  role: "user" | "assistant";
  content: string;
  function_call?: StoredFunctionCall;
}

export type Transcript = readonly TranscriptTurn[];

/** What the context tracker recovers from the most recent function-call turn. */
export interface PriorCallRecord {
  functionName: FunctionName;
  drug: DrugName | null;
  region: RegionName | null;
  question: string | null;
}

// ============================================================================
// Orchestration
// ============================================================================

export type RemoteFailureReason =
  | "timeout"
  | "aborted"
  | "transport"
  | "upstream_http"
  | "malformed_arguments"
  | "unknown_function"
  | "empty_response";

export interface RemoteFailure {
  kind: "remote_call_failed";
  reason: RemoteFailureReason;
  message: string;
  elapsed_ms: number;
}

export type RemoteOutcome =
  | { ok: true; result: ResolutionResult; elapsed_ms: number }
  | { ok: false; failure: RemoteFailure };

export type ResolutionSource = "remote" | "rules";

export type FallbackReason = RemoteFailureReason | "remote_unavailable";

export interface ResolutionTrace {
  result: ResolutionResult;
  source: ResolutionSource;
  /** Why the rule-based path answered; null when the remote answered. */
  fallback_reason: FallbackReason | null;
  elapsed_ms: number;
}

export interface ResolveOptions {
  requestId?: string;
  /** Caller cancellation (e.g. a newer utterance superseded this one). */
  signal?: AbortSignal;
}

export function isFunctionName(value: unknown): value is FunctionName {
  return typeof value === "string" && (FUNCTION_NAMES as readonly string[]).includes(value);
}
