/**
 * Function Registry
 *
 * The five analysis functions the resolver can hand to the analytics layer,
 * with the parameter schema exposed to the remote model.
 */

import { DRUG_CATALOG, REGION_CATALOG } from "./catalog.js";
import type { FunctionName } from "./types.js";

export interface FunctionDefinition {
  name: FunctionName;
  description: string;
  /** JSON Schema for the remote tool-calling request. */
  parameters: {
    type: "object";
    properties: Record<string, { type: "string"; description: string }>;
  };
}

const DRUG_LIST = DRUG_CATALOG.join(", ");
const REGION_LIST = REGION_CATALOG.join(", ");

const FUNCTION_DEFINITIONS: readonly FunctionDefinition[] = [
  {
    name: "analyze_sales_trend",
    description:
      "Analyze sales trends and performance over time. Use when the user asks about trends, performance or sales data for a drug, or simply names a drug (\"aspirin\", \"aspirin sales\").",
    parameters: {
      type: "object",
      properties: {
        drug_name: {
          type: "string",
          description: `Drug to analyze. Available drugs: ${DRUG_LIST}. Leave empty for all drugs.`,
        },
        region: {
          type: "string",
          description: `Region to filter by. Available regions: ${REGION_LIST}. Leave empty for all regions.`,
        },
      },
    },
  },
  {
    name: "compare_drugs",
    description:
      "Compare performance between drugs. Use when the user wants to compare drugs, see which drugs perform better, or asks for a comparative analysis.",
    parameters: {
      type: "object",
      properties: {
        region: {
          type: "string",
          description: `Region to filter the comparison by. Available regions: ${REGION_LIST}. Leave empty for a global comparison.`,
        },
      },
    },
  },
  {
    name: "regional_analysis",
    description:
      "Analyze sales performance across regions. Use for questions about regional performance, geography, or how regions compare.",
    parameters: {
      type: "object",
      properties: {
        drug_name: {
          type: "string",
          description: `Drug to break down by region. Available drugs: ${DRUG_LIST}. Leave empty for all drugs.`,
        },
      },
    },
  },
  {
    name: "generate_auto_insights",
    description:
      "Generate business insights and interesting findings from all available data. Use for requests for insights, findings, an overview or general analysis.",
    parameters: { type: "object", properties: {} },
  },
  {
    name: "answer_direct_question",
    description:
      "Answer a direct factual question about the business data, such as the best seller, total revenue or the worst performer.",
    parameters: {
      type: "object",
      properties: {
        question: {
          type: "string",
          description: "The specific question the user asked.",
        },
      },
    },
  },
];

export function getFunctionDefinitions(): readonly FunctionDefinition[] {
  return FUNCTION_DEFINITIONS;
}
