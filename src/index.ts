/**
 * Deliberate
 *
 * Demo reasoning-agent plugin for chat UIs. Produces staged markdown reports
 * from keyword and word-count heuristics.
 */

// Agent
export { Agent, normalizeReasoningDepth } from './agent.js'

// Host functions
export {
  createPluginFunctions,
  parseExternalApis,
  sharedAgent,
  enhancedThinking,
  discoverAndUseTools,
  agenticPlanning,
  realWorldAdaptation,
  getPluginInfo,
  type PluginFunctions
} from './functions.js'

// Types
export type {
  // Thinking types
  ReasoningPhase,
  ThinkingStep,
  Complexity,
  QuestionType,
  QueryAnalysis,
  ExecutionPlan,
  StepOutcome,
  ExecutionResult,
  CriticalEvaluation,
  ReasoningResult,

  // Tool descriptor types
  ToolCapability,
  ExternalApi,
  SuitableTool,
  ToolUseRecord,
  ToolUsageSummary,

  // Pattern types
  PatternRecord,
  QueryPatternRecord,
  TaskPatternRecord,

  // Planning types
  TimeHorizon,
  StepPriority,
  ObjectiveAnalysis,
  PlanStep,
  StrategicPlan,
  IdentifiedRisk,
  RiskAssessment,
  GoalStatus,
  AgentGoal,

  // Adaptation types
  ContextAnalysis,
  RiskLevel,
  AdaptationApproach,
  AdaptationStrategies,
  LearningRecommendation,
  LearningRecommendations,

  // Host types
  EntryPoint,
  UserContext,
  UserMemory,
  JSONSchema,
  Tool,
  ToolResult,
  ToolContext,

  // Provider and config types
  LogProvider,
  AgentConfig,
  ThinkingOptions
} from './types.js'

// Pipelines
export {
  analyzeQuery,
  classifyComplexity,
  createExecutionPlan,
  executeStep,
  executePlan,
  synthesizeResults,
  criticalEvaluation,
  reflectionInsights,
  calculateOverallConfidence
} from './reasoning.js'

export {
  analyzeObjective,
  createStrategicPlan,
  assessRisks,
  horizonMultiplier
} from './planning.js'

export {
  analyzeContext,
  developAdaptationStrategies,
  generateLearningRecommendations
} from './adaptation.js'

// Tools
export {
  createDefaultTools,
  identifySuitableTools,
  keywordHits,
  createPluginTools,
  createEnhancedThinkingTool,
  createToolDiscoveryTool,
  createPlanningTool,
  createAdaptationTool,
  createPluginInfoTool
} from './tools/index.js'

// Reports
export {
  formatThinkingProcess,
  thinkingReport,
  toolUsageReport,
  planningReport,
  adaptationReport,
  pluginInfoReport,
  errorMessage,
  type AgentStatus
} from './report/templates.js'

// Providers
export {
  ConsoleLogger,
  type ConsoleLoggerConfig,
  type LogLevel
} from './providers/logger/console.js'

// Config
export { resolveLogLevel, LOG_LEVEL_ENV, DEFAULT_LOG_LEVEL } from './config.js'

// Schemas
export {
  ExternalApiSchema,
  UserContextSchema,
  TimeHorizonSchema,
  ThinkingInputSchema,
  ToolDiscoveryInputSchema,
  PlanningInputSchema,
  AdaptationInputSchema,
  formatIssues
} from './schemas.js'
