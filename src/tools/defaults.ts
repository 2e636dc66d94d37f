/**
 * Default Tool Descriptors
 *
 * Descriptors every agent starts with. They are scored and "used", never invoked.
 */

import type { ToolCapability } from "../types.js";

export function createDefaultTools(): ToolCapability[] {
  return [
    {
      name: "web_search",
      description: "Search the web for information",
      parameters: { query: "string", max_results: "number" },
      usageExamples: ["Looking up current news", "Researching technical details"],
      effectivenessScore: 0,
    },
    {
      name: "code_analysis",
      description: "Code analysis and improvement suggestions",
      parameters: { code: "string", language: "string" },
      usageExamples: ["Finding bugs", "Performance analysis"],
      effectivenessScore: 0,
    },
    {
      name: "planning",
      description: "Task planning and strategic thinking",
      parameters: { objective: "string", constraints: "string[]" },
      usageExamples: ["Project planning", "Problem-solving strategy"],
      effectivenessScore: 0,
    },
  ];
}
