/**
 * Rule-Based Resolver
 *
 * Deterministic, offline resolution. `resolve` runs the ordered rule table;
 * `resolveWithContext` first tries to read the utterance as a follow-up to the
 * last executed function call, then falls back to the same table.
 *
 * Both are total: every input yields a result, the last resort being the
 * clarification reply.
 */

import { log } from "../utils/telemetry.js";
import { lastCall } from "./context-tracker.js";
import {
  autoInsightsCall,
  compareDrugsCall,
  directQuestionCall,
  regionalAnalysisCall,
  salesTrendCall,
} from "./calls.js";
import { analyseUtterance, containsAny, containsWord, RULES } from "./rules.js";
import type { ResolutionRule, RuleId, UtteranceSignal } from "./rules.js";
import type { PriorCallRecord, ResolutionResult, Transcript } from "./types.js";

export const FOLLOW_UP_CUES = [
  "what about",
  "show that for",
  "show me that",
  "for the same",
  "but for",
  "do the same",
  "same thing",
  "similar analysis",
] as const;

const DEICTIC_WORDS = ["show", "that", "for"] as const;

/** Rules that name their own function; a region plus "for" does not turn these into follow-ups. */
const EXPLICIT_RULES: readonly RuleId[] = ["direct_question", "comparison", "regional", "insights"];

function firstMatchingRule(signal: UtteranceSignal): ResolutionRule {
  const rule = RULES.find((candidate) => candidate.matches(signal));
  if (!rule) {
    // The table ends with a catch-all rule.
    throw new Error("Rule table has no catch-all entry");
  }
  return rule;
}

function runCascade(signal: UtteranceSignal): ResolutionResult {
  const rule = firstMatchingRule(signal);
  log.debug({ rule: rule.id, utterance_length: signal.raw.length }, "Rule resolver: matched");
  return rule.build(signal);
}

/**
 * Resolve a single utterance with no conversational context.
 */
export function resolve(utterance: string): ResolutionResult {
  return runCascade(analyseUtterance(utterance));
}

/**
 * True when the utterance names its own analysis ("compare drugs for Europe"),
 * in which case context only fills in through an explicit follow-up cue.
 */
function hasExplicitIntent(signal: UtteranceSignal): boolean {
  return EXPLICIT_RULES.includes(firstMatchingRule(signal).id);
}

function isFollowUp(signal: UtteranceSignal, explicit: boolean): boolean {
  if (containsAny(signal.lowered, FOLLOW_UP_CUES)) return true;
  return !explicit && signal.entities.region !== null && containsWord(signal.lowered, DEICTIC_WORDS);
}

/**
 * Re-issue the prior function with newly detected entities overriding the
 * inherited ones. Entities the function has no slot for are ignored.
 */
function reissue(prior: PriorCallRecord, signal: UtteranceSignal): ResolutionResult {
  const { drug, region } = signal.entities;

  switch (prior.functionName) {
    case "analyze_sales_trend":
      return salesTrendCall(drug ?? prior.drug, region ?? prior.region);
    case "compare_drugs":
      return compareDrugsCall(region ?? prior.region);
    case "regional_analysis":
      return regionalAnalysisCall(drug ?? prior.drug);
    case "answer_direct_question":
      return directQuestionCall(prior.question ?? signal.raw);
    case "generate_auto_insights":
      return autoInsightsCall();
  }
}

/**
 * Resolve an utterance against the conversation so far.
 *
 * Elliptical follow-ups ("what about Europe?", "show that for Asia") inherit the
 * last executed function and its arguments; anything else, bare drug mentions
 * included, goes through the ordered rule table.
 */
export function resolveWithContext(utterance: string, transcript: Transcript): ResolutionResult {
  const signal = analyseUtterance(utterance);
  const prior = lastCall(transcript);
  if (!prior) return runCascade(signal);

  const explicit = hasExplicitIntent(signal);

  if (isFollowUp(signal, explicit)) {
    log.debug({ prior_function: prior.functionName }, "Rule resolver: follow-up re-issues the prior call");
    return reissue(prior, signal);
  }

  // A bare region after a trend or comparison narrows that analysis
  const { drug, region } = signal.entities;
  if (!explicit && region !== null && drug === null) {
    if (prior.functionName === "analyze_sales_trend" && prior.drug !== null) {
      return salesTrendCall(prior.drug, region);
    }
    if (prior.functionName === "compare_drugs") {
      return compareDrugsCall(region);
    }
  }

  return runCascade(signal);
}
