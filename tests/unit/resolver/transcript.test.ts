import { describe, it, expect } from "vitest";
import { autoInsightsCall, conversational, salesTrendCall } from "../../../src/resolver/calls.js";
import { lastCall } from "../../../src/resolver/context-tracker.js";
import {
  COMPACTION_MARKER,
  compactContent,
  MIN_COMPACT_THRESHOLD,
  recordResolution,
  renderCallRecord,
  renderTurn,
  windowTurns,
} from "../../../src/resolver/transcript.js";
import type { Transcript, TranscriptTurn } from "../../../src/resolver/types.js";

describe("Transcript: windowTurns", () => {
  const turns: Transcript = Array.from({ length: 12 }, (_, i): TranscriptTurn => ({ role: "user", content: `t${i}` }));

  it("keeps the last 8 turns by default", () => {
    const window = windowTurns(turns);
    expect(window).toHaveLength(8);
    expect(window[0]?.content).toBe("t4");
    expect(window[7]?.content).toBe("t11");
  });

  it("returns everything when shorter than the window", () => {
    expect(windowTurns(turns.slice(0, 3))).toHaveLength(3);
  });

  it("returns nothing for a zero window", () => {
    expect(windowTurns(turns, 0)).toEqual([]);
  });
});

describe("Transcript: compaction", () => {
  it("leaves content at the threshold untouched", () => {
    const content = "a".repeat(800);
    expect(compactContent(content)).toBe(content);
  });

  it("keeps the first 400 and last 200 characters of long content", () => {
    const content = "h".repeat(400) + "m".repeat(300) + "t".repeat(200);
    const compacted = compactContent(content);
    expect(compacted).toBe("h".repeat(400) + COMPACTION_MARKER + "t".repeat(200));
    expect(compacted).toHaveLength(400 + COMPACTION_MARKER.length + 200);
  });

  it("never makes content longer than it was", () => {
    const content = "x".repeat(300);
    expect(compactContent(content, 100)).toBe(content);
    expect(MIN_COMPACT_THRESHOLD).toBe(400 + 200 + COMPACTION_MARKER.length);
  });

  it("compacts above the floor when given a low threshold", () => {
    const content = "h".repeat(400) + "m".repeat(MIN_COMPACT_THRESHOLD - 599) + "t".repeat(200);
    expect(compactContent(content, 100)).toBe("h".repeat(400) + COMPACTION_MARKER + "t".repeat(200));
  });

  it("compacts assistant turns but not user turns", () => {
    const long = "x".repeat(1_000);
    expect(renderTurn({ role: "user", content: long })).toBe(long);
    expect(renderTurn({ role: "assistant", content: long })).toContain(COMPACTION_MARKER);
  });

  it("renders a structured record after the assistant text", () => {
    const rendered = renderTurn({
      role: "assistant",
      content: "On it.",
      function_call: { name: "compare_drugs", arguments: { region: "Asia" } },
    });
    expect(rendered).toBe('On it.\nFunction: compare_drugs Args: {"region":"Asia"}');
  });

  it("renders a record with its arguments as JSON", () => {
    expect(renderCallRecord({ name: "analyze_sales_trend", arguments: { drug: "Aspirin", region: null } })).toBe(
      'Function: analyze_sales_trend Args: {"drug":"Aspirin","region":null}',
    );
  });
});

describe("Transcript: recordResolution", () => {
  it("appends the utterance and a structured record for function calls", () => {
    const next = recordResolution([], "Show me sales trends for Aspirin", salesTrendCall("Aspirin", null));
    expect(next).toEqual([
      { role: "user", content: "Show me sales trends for Aspirin" },
      {
        role: "assistant",
        content: "I'll analyze the sales trends for Aspirin.",
        function_call: { name: "analyze_sales_trend", arguments: { drug: "Aspirin", region: null } },
      },
    ]);
  });

  it("stores a supplied reply instead of the acknowledgement", () => {
    const next = recordResolution([], "insights", autoInsightsCall(), "Aspirin grew 12% last quarter.");
    expect(next[1]?.content).toBe("Aspirin grew 12% last quarter.");
    expect(next[1]?.function_call).toEqual({ name: "generate_auto_insights", arguments: {} });
  });

  it("stores conversational replies without a record", () => {
    const next = recordResolution([], "hi", conversational("Hello!"));
    expect(next[1]).toEqual({ role: "assistant", content: "Hello!" });
  });

  it("leaves the input transcript untouched", () => {
    const transcript: Transcript = [{ role: "user", content: "hi" }];
    recordResolution(transcript, "aspirin", salesTrendCall("Aspirin", null));
    expect(transcript).toHaveLength(1);
  });

  it("writes records the context tracker reads back", () => {
    const next = recordResolution([], "Europe", salesTrendCall(null, "Europe"));
    expect(lastCall(next)).toEqual({
      functionName: "analyze_sales_trend",
      drug: null,
      region: "Europe",
      question: null,
    });
  });
});
