/**
 * Context Tracker
 *
 * Recovers the most recent executed function call from a transcript so a
 * follow-up ("what about Europe?") can inherit what the user was looking at.
 *
 * Assistant turns carry a structured `function_call` record when the caller
 * stored one. Older transcripts only have a "Function: <name>" marker embedded
 * in the content; those are still honoured, with entities re-detected from the
 * same text and, for any still missing, from the nearest user turn before it.
 */

import { canonicalDrug, canonicalRegion, matchEntities } from "./catalog.js";
import { isFunctionName } from "./types.js";
import type { PriorCallRecord, StoredFunctionCall, Transcript, TranscriptTurn } from "./types.js";

const LEGACY_MARKER = /Function:\s*([a-z_]+)/;

function fromStored(call: StoredFunctionCall): PriorCallRecord {
  const question = call.arguments.question;
  return {
    functionName: call.name,
    drug: canonicalDrug(call.arguments.drug),
    region: canonicalRegion(call.arguments.region),
    question: typeof question === "string" && question.trim() !== "" ? question : null,
  };
}

function precedingUserTurn(transcript: Transcript, index: number): TranscriptTurn | undefined {
  for (let i = index - 1; i >= 0; i--) {
    const turn = transcript[i];
    if (turn?.role === "user") return turn;
  }
  return undefined;
}

/**
 * Most recent function call in the transcript, or null when the conversation
 * has not executed one yet. Scans newest to oldest and stops at the first
 * assistant turn that names a function.
 */
export function lastCall(transcript: Transcript): PriorCallRecord | null {
  for (let i = transcript.length - 1; i >= 0; i--) {
    const turn = transcript[i];
    if (!turn || turn.role !== "assistant") continue;

    if (turn.function_call && isFunctionName(turn.function_call.name)) {
      return fromStored(turn.function_call);
    }

    const marker = LEGACY_MARKER.exec(turn.content);
    const name = marker?.[1];
    if (!isFunctionName(name)) continue;

    const user = precedingUserTurn(transcript, i);
    const own = matchEntities(turn.content);
    const asked = user ? matchEntities(user.content) : { drug: null, region: null };
    return {
      functionName: name,
      drug: own.drug ?? asked.drug,
      region: own.region ?? asked.region,
      question: name === "answer_direct_question" && user ? user.content : null,
    };
  }
  return null;
}
