/**
 * Transcript helpers
 *
 * Windowing and compaction for the remote request, and the one place that
 * writes prior-call records so callers store them consistently.
 */

import type { ResolutionResult, StoredFunctionCall, Transcript, TranscriptTurn } from "./types.js";

export const DEFAULT_WINDOW_TURNS = 8;
export const DEFAULT_COMPACT_THRESHOLD = 800;

const HEAD_CHARS = 400;
const TAIL_CHARS = 200;
export const COMPACTION_MARKER = "\n...[analysis results]...\n";

/** Smallest threshold at which a compacted excerpt is shorter than its input. */
export const MIN_COMPACT_THRESHOLD = HEAD_CHARS + TAIL_CHARS + COMPACTION_MARKER.length;

export function windowTurns(transcript: Transcript, size: number = DEFAULT_WINDOW_TURNS): TranscriptTurn[] {
  if (size <= 0) return [];
  return transcript.slice(-size);
}

/**
 * Long assistant turns (analysis write-ups) keep their opening and closing
 * lines only. User turns are never compacted.
 */
export function compactContent(content: string, threshold: number = DEFAULT_COMPACT_THRESHOLD): string {
  if (content.length <= Math.max(threshold, MIN_COMPACT_THRESHOLD)) return content;
  return content.slice(0, HEAD_CHARS) + COMPACTION_MARKER + content.slice(-TAIL_CHARS);
}

export function renderCallRecord(call: StoredFunctionCall): string {
  return `Function: ${call.name} Args: ${JSON.stringify(call.arguments)}`;
}

/** Text the remote model sees for one turn. */
export function renderTurn(turn: TranscriptTurn, threshold: number = DEFAULT_COMPACT_THRESHOLD): string {
  if (turn.role === "user") return turn.content;
  const content = compactContent(turn.content, threshold);
  return turn.function_call ? `${content}\n${renderCallRecord(turn.function_call)}` : content;
}

export function toStoredCall(result: ResolutionResult): StoredFunctionCall | undefined {
  if (result.type !== "function_call") return undefined;
  return { name: result.name, arguments: { ...result.arguments } };
}

/**
 * Append the user utterance and the assistant's answer to a transcript.
 * Returns a new array; the input is left untouched.
 *
 * @param reply Assistant text to store instead of the acknowledgement, e.g. the
 *   rendered analysis once the function has run.
 */
export function recordResolution(
  transcript: Transcript,
  utterance: string,
  result: ResolutionResult,
  reply?: string,
): TranscriptTurn[] {
  const call = toStoredCall(result);
  const content = reply ?? (result.type === "function_call" ? result.acknowledgement : result.reply);
  const assistant: TranscriptTurn = call
    ? { role: "assistant", content, function_call: call }
    : { role: "assistant", content };
  return [...transcript, { role: "user", content: utterance }, assistant];
}
