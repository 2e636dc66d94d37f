/**
 * Plugin Tools
 *
 * Exposes the host functions as tools with JSON schemas, so a chat host can
 * list them and call them with raw JSON arguments.
 */

import type { z } from "zod";
import type { Tool, ToolContext, ToolResult, UserContext } from "../types.js";
import type { PluginFunctions } from "../functions.js";
import {
  AdaptationInputSchema,
  formatIssues,
  PlanningInputSchema,
  ThinkingInputSchema,
  ToolDiscoveryInputSchema,
  UserContextSchema,
} from "../schemas.js";

/**
 * Resolve the caller: an explicit "__user__" argument wins over the tool context
 */
function resolveUser(params: Record<string, unknown>, context: ToolContext): UserContext | undefined {
  const parsed = UserContextSchema.safeParse(params.__user__);
  if (parsed.success) return parsed.data;
  return context.userId ? { id: context.userId } : undefined;
}

/**
 * Validate the arguments and render the report, or describe what was wrong
 */
function runWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: Record<string, unknown>,
  render: (input: T) => string
): ToolResult {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    return { success: false, error: `Invalid arguments: ${formatIssues(parsed.error)}` };
  }
  return { success: true, data: render(parsed.data) };
}

export function createEnhancedThinkingTool(functions: PluginFunctions): Tool {
  return {
    name: "enhanced_thinking",
    description: `Staged thinking over a question or task: analysis, planning, execution, critical evaluation and reflection.

Returns a markdown report with an overall confidence score and every thinking step.`,
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", description: "Question or task to think through" },
        reasoning_depth: { type: "number", description: "Thinking depth from 1 to 5 (default 3)" },
        enable_critical_thinking: { type: "boolean", description: "Run the critical evaluation phase (default true)" },
      },
      required: ["query"],
    },
    execute: async (params, context) =>
      runWith(ThinkingInputSchema, params, (input) =>
        functions.enhancedThinking(input.query, {
          reasoningDepth: input.reasoning_depth,
          enableCriticalThinking: input.enable_critical_thinking,
          user: resolveUser(params, context),
        })
      ),
  };
}

export function createToolDiscoveryTool(functions: PluginFunctions): Tool {
  return {
    name: "discover_and_use_tools",
    description: `Pick the tools that best match a task by keyword overlap and simulate using them.

External APIs are objects with a name and an optional description and parameters.`,
    parameters: {
      type: "object",
      properties: {
        task_description: { type: "string", description: "Task to find tools for" },
        available_apis: {
          type: "array",
          description: "Extra APIs to consider: { name, description?, parameters? }",
          items: { type: "object" },
        },
      },
      required: ["task_description"],
    },
    execute: async (params, context) =>
      runWith(ToolDiscoveryInputSchema, params, (input) =>
        functions.discoverAndUseTools(input.task_description, input.available_apis, resolveUser(params, context))
      ),
  };
}

export function createPlanningTool(functions: PluginFunctions): Tool {
  return {
    name: "agentic_planning",
    description: `Build a step plan for an objective with a duration estimate and a risk review.

The objective is tracked as a goal on the agent.`,
    parameters: {
      type: "object",
      properties: {
        objective: { type: "string", description: "Main objective" },
        constraints: { type: "array", description: "Constraints such as budget or deadline", items: { type: "string" } },
        time_horizon: {
          type: "string",
          description: "Planning horizon (default short)",
          enum: ["short", "medium", "long"],
        },
      },
      required: ["objective"],
    },
    execute: async (params, context) =>
      runWith(PlanningInputSchema, params, (input) =>
        functions.agenticPlanning(input.objective, input.constraints, input.time_horizon, resolveUser(params, context))
      ),
  };
}

export function createAdaptationTool(functions: PluginFunctions): Tool {
  return {
    name: "real_world_adaptation",
    description: "Match a situation against known context patterns and suggest adaptation strategies and learning steps.",
    parameters: {
      type: "object",
      properties: {
        context: { type: "string", description: "Current situation" },
        environmental_factors: { type: "array", description: "Outside factors, e.g. deadlines or competition", items: { type: "string" } },
        adaptation_goals: { type: "array", description: "What the adaptation should achieve", items: { type: "string" } },
      },
      required: ["context"],
    },
    execute: async (params, context) =>
      runWith(AdaptationInputSchema, params, (input) =>
        functions.realWorldAdaptation(
          input.context,
          input.environmental_factors,
          input.adaptation_goals,
          resolveUser(params, context)
        )
      ),
  };
}

export function createPluginInfoTool(functions: PluginFunctions): Tool {
  return {
    name: "plugin_info",
    description: "Describe the plugin's functions and the agent's current state.",
    parameters: { type: "object", properties: {} },
    execute: async () => ({ success: true, data: functions.getPluginInfo() }),
  };
}

/**
 * Create every host tool for a set of plugin functions
 */
export function createPluginTools(functions: PluginFunctions): Tool[] {
  return [
    createEnhancedThinkingTool(functions),
    createToolDiscoveryTool(functions),
    createPlanningTool(functions),
    createAdaptationTool(functions),
    createPluginInfoTool(functions),
  ];
}
