/**
 * Rule Table: deterministic intent classification
 *
 * An ordered list of (predicate, builder) pairs evaluated top to bottom; the first
 * rule whose predicate holds produces the resolution. Rules overlap on purpose, so
 * the order below is the policy:
 *
 * | #  | Rule              | Produces                              |
 * |----|-------------------|---------------------------------------|
 * | 1  | greeting          | conversational (welcome)              |
 * | 2  | how_are_you       | conversational                        |
 * | 3  | capabilities      | conversational (capability list)      |
 * | 4  | thanks            | conversational                        |
 * | 5  | farewell          | conversational                        |
 * | 6  | direct_question   | answer_direct_question {question}     |
 * | 7  | comparison        | compare_drugs {region}                |
 * | 8  | trend             | analyze_sales_trend {drug, region}    |
 * | 9  | regional          | regional_analysis {drug}              |
 * | 10 | insights          | generate_auto_insights {}             |
 * | 11 | bare_entity       | analyze_sales_trend {drug, region}    |
 * | 12 | fallback          | conversational (clarification)        |
 *
 * Keyword matching is substring-based on the lowercased utterance, except the
 * greeting words, which must stand alone ("hi" must not fire inside "which").
 */

import { matchEntities } from "./catalog.js";
import type { EntitySet } from "./catalog.js";
import {
  autoInsightsCall,
  compareDrugsCall,
  conversational,
  directQuestionCall,
  regionalAnalysisCall,
  REPLIES,
  salesTrendCall,
} from "./calls.js";
import type { ResolutionResult } from "./types.js";

// ============================================================================
// Keyword configuration
// ============================================================================

export const KEYWORDS = {
  greetingWords: ["hi", "hello", "hey"],
  greetingPhrases: ["good morning", "good afternoon"],
  howAreYou: ["how are you", "how's it going", "what's up"],
  capabilities: ["what can you do", "what can you help", "how can you help", "what are your capabilities"],
  thanks: ["thank you", "thanks", "appreciate"],
  farewell: ["goodbye", "bye", "see you", "farewell"],
  directPhrases: [
    "best seller",
    "top performer",
    "highest sales",
    "worst seller",
    "total sales",
    "revenue",
    "how much",
    "how many",
  ],
  whichSuperlatives: ["best", "top", "highest", "lowest", "worst"],
  whatSuperlatives: ["best", "top", "highest", "total"],
  comparison: ["compare", "comparison", "vs", "versus"],
  trend: ["trend", "over time", "performance", "show me sales"],
  displayVerbs: ["show", "display"],
  regional: ["region", "geography", "where", "location"],
  insights: ["insight", "interesting", "findings", "summary", "overview", "tell me about", "business", "general"],
  genericNouns: ["sales", "performance", "data", "info", "information", "trend", "trends"],
} as const;

// ============================================================================
// Utterance analysis
// ============================================================================

export interface UtteranceSignal {
  /** The utterance exactly as received. */
  raw: string;
  lowered: string;
  tokens: string[];
  entities: EntitySet;
}

export function analyseUtterance(utterance: string): UtteranceSignal {
  const lowered = utterance.toLowerCase();
  return {
    raw: utterance,
    lowered,
    tokens: lowered.split(/\s+/).filter((token) => token.length > 0),
    entities: matchEntities(lowered),
  };
}

export function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => text.includes(phrase));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function containsWord(text: string, words: readonly string[]): boolean {
  return words.some((word) => new RegExp(`\\b${escapeRegExp(word)}\\b`).test(text));
}

function isGreeting(s: UtteranceSignal): boolean {
  return containsWord(s.lowered, KEYWORDS.greetingWords) || containsAny(s.lowered, KEYWORDS.greetingPhrases);
}

function isCapabilityQuestion(s: UtteranceSignal): boolean {
  return containsAny(s.lowered, KEYWORDS.capabilities);
}

/** Greeting, thanks or farewell anywhere in the utterance. */
function isSocial(s: UtteranceSignal): boolean {
  return isGreeting(s) || containsAny(s.lowered, KEYWORDS.thanks) || containsAny(s.lowered, KEYWORDS.farewell);
}

function isDirectQuestion(s: UtteranceSignal): boolean {
  const t = s.lowered;
  return (
    containsAny(t, KEYWORDS.directPhrases) ||
    (t.includes("which") && containsAny(t, KEYWORDS.whichSuperlatives)) ||
    (t.includes("what") && containsAny(t, KEYWORDS.whatSuperlatives))
  );
}

function isComparison(s: UtteranceSignal): boolean {
  const t = s.lowered;
  return (
    containsAny(t, KEYWORDS.comparison) ||
    (t.includes("all drug") && t.includes("performance")) ||
    (t.includes("drug performance") && t.includes("all"))
  );
}

function isTrend(s: UtteranceSignal): boolean {
  return (
    containsAny(s.lowered, KEYWORDS.trend) ||
    (s.entities.drug !== null && containsAny(s.lowered, KEYWORDS.displayVerbs))
  );
}

/**
 * A drug named on its own: three tokens or fewer, or nothing but the drug
 * name plus generic nouns ("blood pressure med sales data").
 */
export function isBareDrugMention(s: UtteranceSignal): boolean {
  const { drug } = s.entities;
  if (drug === null || isSocial(s)) return false;
  if (s.tokens.length <= 3) return true;

  const remainder = s.lowered
    .replace(drug.toLowerCase(), " ")
    .split(/\s+/)
    .map((token) => token.replace(/[^\w]/g, ""))
    .filter((token) => token.length > 0);
  const generic: readonly string[] = KEYWORDS.genericNouns;
  return remainder.every((token) => generic.includes(token));
}

// ============================================================================
// Rule table
// ============================================================================

export type RuleId =
  | "greeting"
  | "how_are_you"
  | "capabilities"
  | "thanks"
  | "farewell"
  | "direct_question"
  | "comparison"
  | "trend"
  | "regional"
  | "insights"
  | "bare_entity"
  | "fallback";

export interface ResolutionRule {
  id: RuleId;
  matches(signal: UtteranceSignal): boolean;
  build(signal: UtteranceSignal): ResolutionResult;
}

export const RULES: readonly ResolutionRule[] = [
  {
    id: "greeting",
    matches: isGreeting,
    build: () => conversational(REPLIES.greeting),
  },
  {
    id: "how_are_you",
    matches: (s) => containsAny(s.lowered, KEYWORDS.howAreYou),
    build: () => conversational(REPLIES.howAreYou),
  },
  {
    id: "capabilities",
    matches: isCapabilityQuestion,
    build: () => conversational(REPLIES.capabilities),
  },
  {
    id: "thanks",
    matches: (s) => containsAny(s.lowered, KEYWORDS.thanks),
    build: () => conversational(REPLIES.thanks),
  },
  {
    id: "farewell",
    matches: (s) => containsAny(s.lowered, KEYWORDS.farewell),
    build: () => conversational(REPLIES.farewell),
  },
  {
    id: "direct_question",
    matches: isDirectQuestion,
    build: (s) => directQuestionCall(s.raw),
  },
  {
    id: "comparison",
    matches: isComparison,
    build: (s) => compareDrugsCall(s.entities.region),
  },
  {
    id: "trend",
    matches: isTrend,
    build: (s) => salesTrendCall(s.entities.drug, s.entities.region),
  },
  {
    id: "regional",
    matches: (s) => containsAny(s.lowered, KEYWORDS.regional) && !isCapabilityQuestion(s),
    build: (s) => regionalAnalysisCall(s.entities.drug),
  },
  {
    id: "insights",
    matches: (s) => containsAny(s.lowered, KEYWORDS.insights),
    build: () => autoInsightsCall(),
  },
  {
    id: "bare_entity",
    matches: isBareDrugMention,
    build: (s) => salesTrendCall(s.entities.drug, s.entities.region),
  },
  {
    id: "fallback",
    matches: () => true,
    build: () => conversational(REPLIES.clarification),
  },
];
