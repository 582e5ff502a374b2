/**
 * Prompt Assembly for remote resolution
 *
 * Zone 1: static instructions (role, catalogs, function-calling guidance).
 *         Byte-identical on every call.
 * Zone 2: the data context supplied by the caller for this request.
 *
 * History follows as alternating user/assistant messages, then the new utterance.
 */

import type OpenAI from "openai";
import { DRUG_CATALOG, REGION_CATALOG } from "../../resolver/catalog.js";
import { getFunctionDefinitions } from "../../resolver/functions.js";
import { renderTurn, windowTurns } from "../../resolver/transcript.js";
import type { Transcript } from "../../resolver/types.js";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

// ============================================================================
// System Prompt
// ============================================================================

const STATIC_INSTRUCTIONS = [
  "You are a sales analysis assistant for a pharmaceutical business. You route each user message either to one of the analysis functions or to a short conversational reply.",
  "",
  `KNOWN DRUGS: ${DRUG_CATALOG.join(", ")}`,
  `KNOWN REGIONS: ${REGION_CATALOG.join(", ")}`,
  "",
  "FUNCTION CALLING:",
  "1. Any request for data analysis must call a function. Never answer a data question from memory.",
  "2. Greetings, thanks and general chat get a brief conversational reply with no function call.",
  "3. Call at most one function per message.",
  "",
  "FOLLOW-UPS:",
  "- \"Which is our best seller?\" -> answer_direct_question",
  "- then \"what about aspirin?\" -> analyze_sales_trend for Aspirin",
  "- \"show that for Europe\" -> repeat the previous analysis with region Europe",
  "- just \"aspirin\" or \"aspirin sales\" -> analyze_sales_trend for Aspirin",
  "- \"compare them\" after discussing drugs -> compare_drugs",
  "- trends or performance -> analyze_sales_trend",
  "- insights or interesting findings -> generate_auto_insights",
  "- regions or geography -> regional_analysis",
  "",
  "Use the earlier turns to fill in parameters the user leaves out. Only use drug and region names from the lists above; leave a parameter empty rather than guessing. When you call a function, add one short sentence telling the user what you are about to do.",
].join("\n");

export function assembleSystemPrompt(dataContext: string): string {
  const trimmed = dataContext.trim();
  if (!trimmed) return STATIC_INSTRUCTIONS;
  return `${STATIC_INSTRUCTIONS}\n\nAVAILABLE DATA:\n${trimmed}`;
}

// ============================================================================
// Messages & Tools
// ============================================================================

export interface MessageAssemblyOptions {
  windowTurns: number;
  compactThreshold: number;
}

export function assembleMessages(
  utterance: string,
  dataContext: string,
  transcript: Transcript,
  opts: MessageAssemblyOptions,
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: assembleSystemPrompt(dataContext) }];

  for (const turn of windowTurns(transcript, opts.windowTurns)) {
    const content = renderTurn(turn, opts.compactThreshold);
    messages.push(turn.role === "user" ? { role: "user", content } : { role: "assistant", content });
  }

  messages.push({ role: "user", content: utterance });
  return messages;
}

/** The function registry in the chat-completions tool format. */
export function assembleTools(): ChatTool[] {
  return getFunctionDefinitions().map((def): ChatTool => ({
    type: "function",
    function: {
      name: def.name,
      description: def.description,
      parameters: {
        type: def.parameters.type,
        properties: def.parameters.properties,
        required: [],
      },
    },
  }));
}
