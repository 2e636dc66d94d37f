/**
 * Deliberate - Type Definitions
 */

// ============================================================================
// Thinking Types
// ============================================================================

export type ReasoningPhase = 'analysis' | 'planning' | 'execution' | 'evaluation' | 'reflection'

export interface ThinkingStep {
  phase: ReasoningPhase
  content: string
  /** Epoch milliseconds */
  timestamp: number
  /** Always within [0, 1] */
  confidence: number
  /** Phases this step builds on */
  dependencies: ReasoningPhase[]
}

export type Complexity = 'simple' | 'medium' | 'complex'

export type QuestionType = 'question' | 'explanation'

export interface QueryAnalysis {
  interpretation: string
  keyConcepts: string[]
  questionType: QuestionType
  complexity: Complexity
  wordCount: number
  confidence: number
}

export interface ExecutionPlan {
  strategy: string
  steps: string[]
  requiredTools: string[]
  /** Seconds */
  estimatedTime: number
  confidence: number
}

export interface StepOutcome {
  step: number
  description: string
  result?: string
  error?: string
  success: boolean
}

export interface ExecutionResult {
  stepsExecuted: StepOutcome[]
  answer: string
  success: boolean
  summary: string
  confidence: number
}

export interface CriticalEvaluation {
  assessment: string
  needsImprovement: boolean
  confidence: number
}

export interface ReasoningResult {
  reasoningChain: ThinkingStep[]
  finalAnswer: string
  confidenceScore: number
  thinkingProcess: string
}

// ============================================================================
// Tool Descriptor Types
// ============================================================================

export interface ToolCapability {
  name: string
  description: string
  parameters: Record<string, string>
  usageExamples: string[]
  /** Grows by 0.1 per simulated use, capped at 1 */
  effectivenessScore: number
  lastUsed?: number
}

/**
 * Descriptor of an API the host offers alongside the built-in tools
 */
export interface ExternalApi {
  name: string
  description?: string
  parameters?: Record<string, unknown>
}

export interface SuitableTool {
  name: string
  description: string
  relevanceScore: number
  parameters: Record<string, unknown>
}

export interface ToolUseRecord {
  tool: string
  result: string
  success: boolean
}

export interface ToolUsageSummary {
  summary: string
  /** successes / selected tools, 0 when nothing was selected */
  successRate: number
  /** 1 when this call opened a new pattern bucket */
  newPatterns: number
  toolResults: ToolUseRecord[]
}

// ============================================================================
// Learned Patterns
// ============================================================================

export interface QueryPatternRecord {
  kind: 'query'
  queryLength: number
  stepsTaken: number
  success: boolean
  timestamp: number
}

export interface TaskPatternRecord {
  kind: 'task'
  successfulTools: string[]
  taskComplexity: number
  successRate: number
  timestamp: number
}

export type PatternRecord = QueryPatternRecord | TaskPatternRecord

// ============================================================================
// Planning Types
// ============================================================================

export type TimeHorizon = 'short' | 'medium' | 'long'

export type StepPriority = 'critical' | 'high' | 'medium' | 'low'

export interface ObjectiveAnalysis {
  interpretation: string
  complexity: Complexity
  /** Raw horizon as given by the caller, unknown values included */
  timeHorizon: string
  estimatedDays: number
  estimatedDuration: string
  constraintImpact: 'high' | 'low'
  constraints: string[]
}

export interface PlanStep {
  title: string
  description: string
  duration: string
  priority: StepPriority
}

export interface StrategicPlan {
  mainSteps: PlanStep[]
  progressMetrics: string[]
  checkpoints: string[]
  adaptationTriggers: string[]
}

export interface IdentifiedRisk {
  type: string
  description: string
  probability: number
}

export interface RiskAssessment {
  summary: string
  identifiedRisks: IdentifiedRisk[]
  overallRiskLevel: 'medium' | 'low'
}

export type GoalStatus = 'pending' | 'in_progress' | 'completed'

export interface AgentGoal {
  id: string
  description: string
  /** 1 (simple) to 3 (complex) */
  priority: number
  deadline?: number
  status: GoalStatus
  subGoals: string[]
  progress: number
}

// ============================================================================
// Adaptation Types
// ============================================================================

export interface ContextAnalysis {
  interpretation: string
  identifiedPatterns: string[]
  criticalFactors: string[]
}

export type RiskLevel = 'low' | 'medium' | 'medium-high'

export interface AdaptationApproach {
  name: string
  description: string
  implementation: string
  expectedBenefit: string
  riskLevel: RiskLevel
}

export interface AdaptationStrategies {
  approaches: AdaptationApproach[]
  goals: string[]
  shortTermMetrics: string[]
  longTermMetrics: string[]
}

export interface LearningRecommendation {
  category: string
  suggestion: string
}

export interface LearningRecommendations {
  recommendations: LearningRecommendation[]
  observationStrategy: string
  analysisMethod: string
  implementationApproach: string
  evaluationCriteria: string
  learningSpeedIndicators: string[]
}

// ============================================================================
// Host Types
// ============================================================================

export type EntryPoint =
  | 'enhanced_thinking'
  | 'discover_and_use_tools'
  | 'agentic_planning'
  | 'real_world_adaptation'
  | 'plugin_info'

/**
 * User record the chat host passes along with a call
 */
export interface UserContext {
  id?: string
  name?: string
  email?: string
  role?: string
}

export interface UserMemory {
  userId: string
  name?: string
  calls: number
  lastEntryPoint: EntryPoint
  lastSeen: number
}

export interface JSONSchema {
  type: 'object'
  properties: Record<string, {
    type: string
    description?: string
    enum?: string[]
    items?: { type: string }
  }>
  required?: string[]
  additionalProperties?: boolean
}

export interface ToolResult {
  success: boolean
  data?: unknown
  error?: string
}

export interface ToolContext {
  userId?: string
}

/**
 * A function exposed to the chat host
 */
export interface Tool {
  name: string
  description: string
  parameters: JSONSchema
  execute: (params: Record<string, unknown>, context: ToolContext) => Promise<ToolResult>
}

// ============================================================================
// Provider Interfaces
// ============================================================================

export interface LogProvider {
  debug(message: string, data?: unknown): void
  info(message: string, data?: unknown): void
  warn(message: string, data?: unknown): void
  error(message: string, data?: unknown): void

  onThinkingStep?(step: ThinkingStep): void
  onToolUse?(record: ToolUseRecord): void
  onComplete?(entryPoint: EntryPoint, durationMs: number): void
}

// ============================================================================
// Agent Configuration
// ============================================================================

export interface AgentConfig {
  logger?: LogProvider
  /** Extra tool descriptors; a name already registered replaces the default */
  tools?: ToolCapability[]
  /** 1 to 5, defaults to 3 */
  reasoningDepth?: number
  /** Run the evaluation phase, defaults to true */
  criticalThinking?: boolean
}

export interface ThinkingOptions {
  reasoningDepth?: number
  enableCriticalThinking?: boolean
  user?: UserContext | null
}
