/**
 * Tool Discovery
 *
 * Scores tool descriptors by keyword overlap with a task description.
 */

import type { ExternalApi, SuitableTool, ToolCapability } from "../types.js";
import { MAX_SUITABLE_TOOLS } from "../constants.js";
import { splitKeywords } from "../text.js";

/**
 * Count task keywords that occur in the description
 */
export function keywordHits(keywords: string[], description: string): number {
  const lower = description.toLowerCase();
  return keywords.filter((keyword) => lower.includes(keyword)).length;
}

/**
 * Rank known tools and external APIs for a task.
 *
 * Known tools earn a +0.5 bonus once their effectiveness exceeds 0.5.
 * Only tools with a positive score are kept; the best five are returned,
 * ties keeping registration order.
 */
export function identifySuitableTools(
  taskDescription: string,
  knownTools: Iterable<ToolCapability>,
  externalApis: ExternalApi[] = []
): SuitableTool[] {
  const keywords = splitKeywords(taskDescription);
  const suitable: SuitableTool[] = [];

  for (const tool of knownTools) {
    let score = keywordHits(keywords, tool.description);
    if (tool.effectivenessScore > 0.5) {
      score += 0.5;
    }
    if (score > 0) {
      suitable.push({
        name: tool.name,
        description: tool.description,
        relevanceScore: score,
        parameters: { ...tool.parameters },
      });
    }
  }

  for (const api of externalApis) {
    // An API without a description cannot match any keyword
    const description = api.description ?? "";
    const score = keywordHits(keywords, description);
    if (score > 0) {
      suitable.push({
        name: api.name,
        description,
        relevanceScore: score,
        parameters: { ...(api.parameters ?? {}) },
      });
    }
  }

  // Array.prototype.sort is stable, so ties keep insertion order
  suitable.sort((a, b) => b.relevanceScore - a.relevanceScore);

  return suitable.slice(0, MAX_SUITABLE_TOOLS);
}
