/**
 * Resolution builders
 *
 * One constructor per analysis function so each result is typed against its own
 * argument contract, plus the acknowledgement line the caller shows before the
 * analysis runs. Acknowledgements drop the clause for an absent entity instead of
 * printing a placeholder.
 */

import type { DrugName, RegionName } from "./catalog.js";
import type { ConversationalResult, FunctionCallOf } from "./types.js";

export function salesTrendCall(
  drug: DrugName | null,
  region: RegionName | null,
): FunctionCallOf<"analyze_sales_trend"> {
  return {
    type: "function_call",
    name: "analyze_sales_trend",
    arguments: { drug, region },
    acknowledgement: `I'll analyze the sales trends for ${drug ?? "all drugs"}${region ? ` in ${region}` : ""}.`,
  };
}

export function compareDrugsCall(region: RegionName | null): FunctionCallOf<"compare_drugs"> {
  return {
    type: "function_call",
    name: "compare_drugs",
    arguments: { region },
    acknowledgement: region
      ? `I'll compare drug performance in ${region}.`
      : "I'll compare the drug performance data for you.",
  };
}

export function regionalAnalysisCall(drug: DrugName | null): FunctionCallOf<"regional_analysis"> {
  return {
    type: "function_call",
    name: "regional_analysis",
    arguments: { drug },
    acknowledgement: `I'll analyze regional performance${drug ? ` for ${drug}` : ""}.`,
  };
}

export function autoInsightsCall(): FunctionCallOf<"generate_auto_insights"> {
  return {
    type: "function_call",
    name: "generate_auto_insights",
    arguments: {},
    acknowledgement: "Let me analyze the data and show you some interesting insights about the business.",
  };
}

export function directQuestionCall(question: string): FunctionCallOf<"answer_direct_question"> {
  return {
    type: "function_call",
    name: "answer_direct_question",
    arguments: { question },
    acknowledgement: "Let me look that up for you in our sales data.",
  };
}

export function conversational(reply: string): ConversationalResult {
  return { type: "conversational", reply };
}

// ============================================================================
// Canned conversational replies
// ============================================================================

export const REPLIES = {
  greeting:
    "Hello! I'm your sales analysis assistant. I can analyze sales data, build charts and surface business insights. What would you like to look at today?",
  howAreYou:
    "I'm doing great, thanks for asking! I can show you trends, compare drug performance, break sales down by region, or answer specific questions about the business. What would you like to explore?",
  capabilities: [
    "I can help with several kinds of sales analysis:",
    "",
    "**Sales Trend Analysis** - how a drug performs over time",
    "**Drug Comparisons** - performance across medications",
    "**Regional Analysis** - how each region is doing",
    "**Business Insights** - automatic findings from the data",
    "**Direct Questions** - answers like \"What's our best seller?\"",
    "",
    "Try asking something like:",
    "- \"Show me sales trends for Aspirin\"",
    "- \"Compare drug performance\"",
    "- \"Which is our best selling drug?\"",
    "- \"Tell me something interesting about our business\"",
  ].join("\n"),
  thanks:
    "You're welcome! Ask me anything else about sales trends, drug performance or business insights whenever you like.",
  farewell:
    "Goodbye! Come back any time you need insight into your sales performance.",
  clarification:
    "I'm not sure I understand what you're looking for. Could you be more specific? For example, you could ask about sales trends, drug comparisons, regional performance, or specific questions about the business data.",
} as const;
