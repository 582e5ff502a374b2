import { describe, it, expect } from "vitest";
import { lastCall } from "../../../src/resolver/context-tracker.js";
import type { Transcript, TranscriptTurn } from "../../../src/resolver/types.js";

describe("Context Tracker: lastCall", () => {
  it("returns null for an empty transcript", () => {
    expect(lastCall([])).toBeNull();
  });

  it("returns null when no assistant turn records a call", () => {
    const transcript: Transcript = [
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello! How can I help?" },
    ];
    expect(lastCall(transcript)).toBeNull();
  });

  it("reads a structured record and canonicalises its entities", () => {
    const transcript: Transcript = [
      { role: "user", content: "aspirin in europe" },
      {
        role: "assistant",
        content: "On it.",
        function_call: { name: "analyze_sales_trend", arguments: { drug: "aspirin", region: "EUROPE" } },
      },
    ];
    expect(lastCall(transcript)).toEqual({
      functionName: "analyze_sales_trend",
      drug: "Aspirin",
      region: "Europe",
      question: null,
    });
  });

  it("uses the most recent call and stops there", () => {
    const transcript: Transcript = [
      {
        role: "assistant",
        content: "Earlier.",
        function_call: { name: "regional_analysis", arguments: { drug: "Ibuprofen" } },
      },
      { role: "user", content: "compare them" },
      {
        role: "assistant",
        content: "Comparing.",
        function_call: { name: "compare_drugs", arguments: { region: "Asia" } },
      },
      { role: "user", content: "thanks" },
      { role: "assistant", content: "You're welcome!" },
    ];
    expect(lastCall(transcript)).toEqual({
      functionName: "compare_drugs",
      drug: null,
      region: "Asia",
      question: null,
    });
  });

  it("prefers a structured record over a marker in the same turn's text", () => {
    const transcript: Transcript = [
      {
        role: "assistant",
        content: "Function: compare_drugs",
        function_call: { name: "generate_auto_insights", arguments: {} },
      },
    ];
    expect(lastCall(transcript)?.functionName).toBe("generate_auto_insights");
  });

  it("reads a legacy marker with entities from the same text", () => {
    const transcript: Transcript = [
      { role: "user", content: "Show me sales trends" },
      {
        role: "assistant",
        content: "Vitamin D3 in South America looks strong.\nFunction: analyze_sales_trend",
      },
    ];
    expect(lastCall(transcript)).toEqual({
      functionName: "analyze_sales_trend",
      drug: "Vitamin D3",
      region: "South America",
      question: null,
    });
  });

  it("recovers the question of a legacy direct-question turn from the user turn", () => {
    const transcript: Transcript = [
      { role: "user", content: "Which is our best seller?" },
      { role: "assistant", content: "Aspirin leads.\nFunction: answer_direct_question" },
    ];
    expect(lastCall(transcript)).toEqual({
      functionName: "answer_direct_question",
      drug: "Aspirin",
      region: null,
      question: "Which is our best seller?",
    });
  });

  it("ignores markers naming unknown functions", () => {
    const transcript: Transcript = [{ role: "assistant", content: "Function: delete_everything" }];
    expect(lastCall(transcript)).toBeNull();
  });

  it("ignores markers in user turns", () => {
    const transcript: Transcript = [{ role: "user", content: "Function: compare_drugs" }];
    expect(lastCall(transcript)).toBeNull();
  });

  it("handles long histories", () => {
    const filler: Transcript = Array.from({ length: 5_000 }, (_, i): TranscriptTurn => ({
      role: i % 2 === 0 ? "user" : "assistant",
      content: `turn ${i}`,
    }));
    const transcript: Transcript = [
      { role: "assistant", content: "x", function_call: { name: "compare_drugs", arguments: {} } },
      ...filler,
    ];
    expect(lastCall(transcript)?.functionName).toBe("compare_drugs");
  });
});
