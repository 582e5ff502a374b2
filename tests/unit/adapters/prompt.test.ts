import { describe, it, expect } from "vitest";
import { assembleMessages, assembleSystemPrompt, assembleTools } from "../../../src/adapters/llm/prompt.js";
import type { Transcript } from "../../../src/resolver/types.js";

const OPTS = { windowTurns: 8, compactThreshold: 800 };

describe("Prompt Assembly", () => {
  describe("assembleSystemPrompt", () => {
    it("lists both catalogs", () => {
      const prompt = assembleSystemPrompt("");
      expect(prompt).toContain(
        "KNOWN DRUGS: Aspirin, Ibuprofen, Medication X, Allergy Relief, Blood Pressure Med, Diabetes Control, Antibiotic Plus, Vitamin D3",
      );
      expect(prompt).toContain("KNOWN REGIONS: North America, Europe, Asia, South America");
    });

    it("omits the data section when there is no context", () => {
      expect(assembleSystemPrompt("   ")).not.toContain("AVAILABLE DATA");
    });

    it("appends the trimmed data context", () => {
      const prompt = assembleSystemPrompt("  4,000 rows, 2023-2024 \n");
      expect(prompt.endsWith("\n\nAVAILABLE DATA:\n4,000 rows, 2023-2024")).toBe(true);
    });

    it("is identical across calls for the same context", () => {
      expect(assembleSystemPrompt("x")).toBe(assembleSystemPrompt("x"));
    });
  });

  describe("assembleMessages", () => {
    it("places history between the system prompt and the utterance", () => {
      const transcript: Transcript = [
        { role: "user", content: "Compare drugs" },
        {
          role: "assistant",
          content: "Comparing.",
          function_call: { name: "compare_drugs", arguments: { region: null } },
        },
      ];

      const messages = assembleMessages("what about Europe?", "", transcript, OPTS);

      expect(messages).toHaveLength(4);
      expect(messages[0]?.role).toBe("system");
      expect(messages[1]).toEqual({ role: "user", content: "Compare drugs" });
      expect(messages[2]).toEqual({
        role: "assistant",
        content: 'Comparing.\nFunction: compare_drugs Args: {"region":null}',
      });
      expect(messages[3]).toEqual({ role: "user", content: "what about Europe?" });
    });

    it("sends no history with a zero window", () => {
      const transcript: Transcript = [{ role: "user", content: "hi" }];
      expect(assembleMessages("aspirin", "", transcript, { ...OPTS, windowTurns: 0 })).toHaveLength(2);
    });
  });

  describe("assembleTools", () => {
    it("exposes the five functions with no required parameters", () => {
      const tools = assembleTools();
      expect(tools.map((tool) => tool.type === "function" && tool.function.name)).toEqual([
        "analyze_sales_trend",
        "compare_drugs",
        "regional_analysis",
        "generate_auto_insights",
        "answer_direct_question",
      ]);
      for (const tool of tools) {
        expect(tool.type === "function" && tool.function.parameters?.required).toEqual([]);
      }
    });

    it("names the trend parameters", () => {
      const trend = assembleTools()[0];
      const properties = trend?.type === "function" ? trend.function.parameters?.properties : undefined;
      expect(Object.keys(properties ?? {})).toEqual(["drug_name", "region"]);
    });
  });
});
