/**
 * Deliberate Agent
 *
 * Holds the agent's process-lifetime state (thinking history, tool descriptors,
 * learned patterns, goals, per-user memory) and runs the heuristic pipelines
 * over it.
 */

import type {
  AdaptationStrategies,
  AgentConfig,
  AgentGoal,
  ContextAnalysis,
  EntryPoint,
  ExternalApi,
  LearningRecommendations,
  LogProvider,
  ObjectiveAnalysis,
  PatternRecord,
  ReasoningPhase,
  ReasoningResult,
  RiskAssessment,
  StrategicPlan,
  SuitableTool,
  ThinkingStep,
  ToolCapability,
  ToolUsageSummary,
  ToolUseRecord,
  UserContext,
  UserMemory,
} from "./types.js";
import {
  DEFAULT_REASONING_DEPTH,
  MAX_REASONING_DEPTH,
  MIN_REASONING_DEPTH,
} from "./constants.js";
import {
  analyzeQuery,
  calculateOverallConfidence,
  createExecutionPlan,
  criticalEvaluation,
  executePlan,
  reflectionInsights,
} from "./reasoning.js";
import {
  analyzeObjective,
  assessRisks,
  COMPLEXITY_PRIORITY,
  createStrategicPlan,
} from "./planning.js";
import {
  analyzeContext,
  developAdaptationStrategies,
  generateLearningRecommendations,
} from "./adaptation.js";
import { createDefaultTools } from "./tools/defaults.js";
import { identifySuitableTools } from "./tools/discovery.js";
import { formatThinkingProcess } from "./report/templates.js";
import { clamp, countWords, joinOrNone } from "./text.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Round a reasoning depth into the 1..5 range; non-finite values are rejected
 */
export function normalizeReasoningDepth(depth: number): number | undefined {
  if (!Number.isFinite(depth)) return undefined;
  return clamp(Math.round(depth), MIN_REASONING_DEPTH, MAX_REASONING_DEPTH);
}

/**
 * Deliberate Agent Class
 */
export class Agent {
  readonly thinkingHistory: ThinkingStep[] = [];
  readonly goals: AgentGoal[] = [];
  readonly availableTools = new Map<string, ToolCapability>();
  readonly learnedPatterns = new Map<string, PatternRecord[]>();
  readonly contextMemory = new Map<string, UserMemory>();

  reasoningDepth: number;
  criticalThinkingEnabled: boolean;

  private readonly logger?: LogProvider;

  constructor(config: AgentConfig = {}) {
    this.logger = config.logger;
    this.reasoningDepth =
      normalizeReasoningDepth(config.reasoningDepth ?? DEFAULT_REASONING_DEPTH) ??
      DEFAULT_REASONING_DEPTH;
    this.criticalThinkingEnabled = config.criticalThinking ?? true;

    for (const tool of [...createDefaultTools(), ...(config.tools ?? [])]) {
      this.availableTools.set(tool.name, { ...tool });
    }
  }

  get log(): LogProvider | undefined {
    return this.logger;
  }

  /**
   * Apply per-call settings. Settings persist on the agent for later calls.
   */
  configure(options: { reasoningDepth?: number; criticalThinking?: boolean }): void {
    if (options.reasoningDepth !== undefined) {
      const depth = normalizeReasoningDepth(options.reasoningDepth);
      if (depth === undefined) {
        this.logger?.warn(`Ignoring invalid reasoning depth: ${options.reasoningDepth}`);
      } else {
        this.reasoningDepth = depth;
      }
    }
    if (options.criticalThinking !== undefined) {
      this.criticalThinkingEnabled = options.criticalThinking;
    }
  }

  // ==========================================================================
  // Thinking
  // ==========================================================================

  addThinkingStep(
    phase: ReasoningPhase,
    content: string,
    confidence: number = 0.8,
    dependencies: ReasoningPhase[] = []
  ): ThinkingStep {
    const step: ThinkingStep = {
      phase,
      content,
      timestamp: Date.now(),
      confidence: clamp(confidence, 0, 1),
      dependencies: [...dependencies],
    };
    this.thinkingHistory.push(step);
    this.logger?.onThinkingStep?.(step);
    return step;
  }

  /**
   * Run analysis → planning → execution → (evaluation) → reflection on a query
   */
  chainOfThoughtReasoning(query: string): ReasoningResult {
    const chain: ThinkingStep[] = [];

    const analysis = analyzeQuery(query, this.reasoningDepth + 2);
    chain.push(
      this.addThinkingStep(
        "analysis",
        `Query analysis: ${analysis.interpretation}. Key concepts: ${joinOrNone(analysis.keyConcepts)}`,
        analysis.confidence
      )
    );

    const plan = createExecutionPlan(analysis);
    chain.push(
      this.addThinkingStep(
        "planning",
        `Execution plan: ${plan.strategy}. Required steps: ${plan.steps.join("; ")}`,
        plan.confidence,
        ["analysis"]
      )
    );

    const execution = executePlan(plan);
    chain.push(
      this.addThinkingStep(
        "execution",
        `Plan execution result: ${execution.summary}`,
        execution.confidence,
        ["planning"]
      )
    );

    if (this.criticalThinkingEnabled) {
      const evaluation = criticalEvaluation(execution);
      chain.push(
        this.addThinkingStep(
          "evaluation",
          `Critical evaluation: ${evaluation.assessment}`,
          evaluation.confidence,
          ["execution"]
        )
      );
    }

    const insights = reflectionInsights(chain);
    this.recordPattern(`query_type_${analysis.wordCount}_words`, {
      kind: "query",
      queryLength: query.length,
      stepsTaken: chain.length,
      success: chain.some((step) => step.content.toLowerCase().includes("success")),
      timestamp: Date.now(),
    });
    chain.push(
      this.addThinkingStep(
        "reflection",
        `Lessons learned: ${insights.length > 0 ? insights.join("; ") : "The process went as expected"}`,
        0.75,
        chain.map((step) => step.phase)
      )
    );

    return {
      reasoningChain: chain,
      finalAnswer: execution.answer,
      confidenceScore: calculateOverallConfidence(chain),
      thinkingProcess: formatThinkingProcess(chain),
    };
  }

  // ==========================================================================
  // Tools
  // ==========================================================================

  identifySuitableTools(taskDescription: string, externalApis: ExternalApi[] = []): SuitableTool[] {
    return identifySuitableTools(taskDescription, this.availableTools.values(), externalApis);
  }

  /**
   * Simulate using the selected tools. Every use succeeds; known tools get
   * their effectiveness bumped.
   */
  useToolsIntelligently(taskDescription: string, tools: SuitableTool[]): ToolUsageSummary {
    const results: ToolUseRecord[] = [];

    for (const tool of tools) {
      const record: ToolUseRecord = {
        tool: tool.name,
        result: `'${tool.name}' tool used successfully`,
        success: true,
      };
      results.push(record);
      this.logger?.onToolUse?.(record);

      const known = this.availableTools.get(tool.name);
      if (known) {
        // Rounded so repeated 0.1 steps stay exact
        known.effectivenessScore = Math.min(1, Math.round((known.effectivenessScore + 0.1) * 100) / 100);
        known.lastUsed = Date.now();
      }
    }

    const successful = results.filter((r) => r.success);
    const successRate = tools.length > 0 ? successful.length / tools.length : 0;

    const created = this.recordPattern(`task_type_${countWords(taskDescription)}_words`, {
      kind: "task",
      successfulTools: successful.map((r) => r.tool),
      taskComplexity: tools.length,
      successRate,
      timestamp: Date.now(),
    });

    return {
      summary: `${successful.length}/${tools.length} tools used successfully`,
      successRate,
      newPatterns: created ? 1 : 0,
      toolResults: results,
    };
  }

  // ==========================================================================
  // Planning
  // ==========================================================================

  analyzeObjective(objective: string, constraints: string[], timeHorizon: string): ObjectiveAnalysis {
    return analyzeObjective(objective, constraints, timeHorizon);
  }

  createStrategicPlan(analysis: ObjectiveAnalysis): StrategicPlan {
    return createStrategicPlan(analysis);
  }

  assessRisks(plan: StrategicPlan): RiskAssessment {
    return assessRisks(plan);
  }

  /**
   * Register a pending goal for a planned objective
   */
  trackGoal(objective: string, analysis: ObjectiveAnalysis, plan: StrategicPlan): AgentGoal {
    const goal: AgentGoal = {
      id: `goal_${this.goals.length + 1}`,
      description: objective,
      priority: COMPLEXITY_PRIORITY[analysis.complexity],
      deadline: Date.now() + analysis.estimatedDays * DAY_MS,
      status: "pending",
      subGoals: plan.mainSteps.map((step) => step.title),
      progress: 0,
    };
    this.goals.push(goal);
    return goal;
  }

  // ==========================================================================
  // Adaptation
  // ==========================================================================

  analyzeContext(context: string, environmentalFactors: string[]): ContextAnalysis {
    return analyzeContext(context, environmentalFactors);
  }

  developAdaptationStrategies(analysis: ContextAnalysis, adaptationGoals: string[]): AdaptationStrategies {
    return developAdaptationStrategies(analysis, adaptationGoals);
  }

  generateLearningRecommendations(
    analysis: ContextAnalysis,
    strategies: AdaptationStrategies
  ): LearningRecommendations {
    return generateLearningRecommendations(analysis, strategies);
  }

  // ==========================================================================
  // Memory
  // ==========================================================================

  /**
   * Append a record to a pattern bucket. Returns true when the bucket is new.
   */
  recordPattern(key: string, record: PatternRecord): boolean {
    const bucket = this.learnedPatterns.get(key);
    if (bucket) {
      bucket.push(record);
      return false;
    }
    this.learnedPatterns.set(key, [record]);
    return true;
  }

  /**
   * Note a call from a user. Calls without a user id are not remembered.
   */
  rememberUser(user: UserContext | null | undefined, entryPoint: EntryPoint): UserMemory | undefined {
    if (!user?.id) return undefined;

    const existing = this.contextMemory.get(user.id);
    const memory: UserMemory = {
      userId: user.id,
      name: user.name ?? existing?.name,
      calls: (existing?.calls ?? 0) + 1,
      lastEntryPoint: entryPoint,
      lastSeen: Date.now(),
    };
    this.contextMemory.set(user.id, memory);
    this.logger?.debug(`Call ${memory.calls} from user ${user.id}`, { entryPoint });
    return memory;
  }
}
