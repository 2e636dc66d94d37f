/**
 * Report Templates
 *
 * Template functions for the markdown reports returned to the chat host.
 */

import type {
  AdaptationStrategies,
  AgentGoal,
  ContextAnalysis,
  LearningRecommendations,
  ObjectiveAnalysis,
  ReasoningResult,
  RiskAssessment,
  StrategicPlan,
  SuitableTool,
  ThinkingStep,
  ToolUsageSummary
} from '../types.js'
import { ERROR_PREFIX, PHASE_EMOJI } from '../constants.js'
import { formatPercent, joinOrNone, titleCase } from '../text.js'

export interface AgentStatus {
  learnedPatterns: number
  availableTools: number
  thinkingSteps: number
  goals: number
  knownUsers: number
}

// ============================================================================
// Thinking
// ============================================================================

/**
 * Render the reasoning chain as an emoji-annotated step list
 */
export function formatThinkingProcess(chain: ThinkingStep[]): string {
  let formatted = '🧠 **Thinking Process:**\n\n'

  chain.forEach((step, index) => {
    const emoji = PHASE_EMOJI[step.phase] ?? '📝'
    formatted += `${emoji} **Step ${index + 1} - ${titleCase(step.phase)}:** ${step.content}\n`
    formatted += `   *Confidence: ${formatPercent(step.confidence)}*\n\n`
  })

  return formatted
}

export function thinkingReport(result: ReasoningResult): string {
  const lines = [
    '# 🧠 Enhanced Thinking Response',
    '',
    '## 📝 Summary',
    result.finalAnswer,
    '',
    `**Overall Confidence:** ${formatPercent(result.confidenceScore)}`,
    '',
    '## 🔄 Thinking Process',
    result.thinkingProcess,
    '## 📊 Detailed Analysis'
  ]

  result.reasoningChain.forEach((step, index) => {
    lines.push('')
    lines.push(`### Step ${index + 1}: ${titleCase(step.phase)}`)
    lines.push(`- **Content:** ${step.content}`)
    lines.push(`- **Confidence:** ${formatPercent(step.confidence)}`)
    lines.push(`- **Time:** ${new Date(step.timestamp).toISOString()}`)
  })

  return lines.join('\n') + '\n'
}

// ============================================================================
// Tools
// ============================================================================

export function toolUsageReport(taskDescription: string, tools: SuitableTool[], usage: ToolUsageSummary): string {
  const lines = [
    '# 🛠️ Smart Tool Usage',
    '',
    '## 📋 Task',
    taskDescription,
    '',
    '## 🔧 Selected Tools'
  ]

  if (tools.length === 0) {
    lines.push('_No matching tools found._')
  }
  for (const tool of tools) {
    lines.push(`- **${tool.name}**: ${tool.description}`)
  }

  lines.push(
    '',
    '## ⚡ Usage Results',
    usage.summary,
    '',
    '## 📊 Performance',
    `- **Tools Used:** ${tools.length}`,
    `- **Success Rate:** ${formatPercent(usage.successRate)}`,
    `- **New Patterns Learned:** ${usage.newPatterns}`
  )

  return lines.join('\n') + '\n'
}

// ============================================================================
// Planning
// ============================================================================

export function planningReport(
  analysis: ObjectiveAnalysis,
  plan: StrategicPlan,
  risks: RiskAssessment,
  goal: AgentGoal
): string {
  const lines = [
    '# 🎯 Agentic Planning Response',
    '',
    '## 🎪 Objective Analysis',
    analysis.interpretation,
    '',
    `**Complexity Level:** ${analysis.complexity}`,
    `**Estimated Duration:** ${analysis.estimatedDuration}`,
    `**Constraint Impact:** ${analysis.constraintImpact}`,
    `**Constraints:** ${joinOrNone(analysis.constraints, '; ')}`,
    `**Tracked Goal:** ${goal.id}`,
    '',
    '## 📋 Strategic Plan',
    '',
    '### Main Steps:'
  ]

  plan.mainSteps.forEach((step, index) => {
    lines.push(`${index + 1}. ${step.title}`)
    lines.push(`   - ${step.description}`)
    lines.push(`   - Duration: ${step.duration}`)
    lines.push(`   - Priority: ${step.priority}`)
    lines.push('')
  })

  lines.push(
    '## ⚠️ Risk Analysis',
    risks.summary,
    `**Overall Risk Level:** ${risks.overallRiskLevel}`,
    '',
    '### Identified Risks:'
  )
  for (const risk of risks.identifiedRisks) {
    lines.push(`- **${risk.type}**: ${risk.description} (Probability: ${formatPercent(risk.probability)})`)
  }

  lines.push(
    '',
    '## 🔄 Monitoring and Adaptation Strategy',
    `- **Progress Metrics:** ${plan.progressMetrics.join(', ')}`,
    `- **Checkpoints:** ${plan.checkpoints.join(', ')}`,
    `- **Adaptation Triggers:** ${plan.adaptationTriggers.join(', ')}`
  )

  return lines.join('\n') + '\n'
}

// ============================================================================
// Adaptation
// ============================================================================

export function adaptationReport(
  analysis: ContextAnalysis,
  strategies: AdaptationStrategies,
  learning: LearningRecommendations
): string {
  const lines = [
    '# 🌍 Real-World Adaptation Analysis',
    '',
    '## 🔍 Context Analysis',
    analysis.interpretation,
    '',
    `**Identified Patterns:** ${joinOrNone(analysis.identifiedPatterns)}`,
    `**Critical Factors:** ${joinOrNone(analysis.criticalFactors)}`,
    `**Adaptation Goals:** ${joinOrNone(strategies.goals)}`,
    '',
    '## 🎯 Adaptation Strategies',
    '',
    '### Recommended Approaches:'
  ]

  if (strategies.approaches.length === 0) {
    lines.push('_No specific adaptation patterns detected._')
  }
  strategies.approaches.forEach((approach, index) => {
    lines.push(
      '',
      `#### ${index + 1}. ${approach.name}`,
      `- **Description:** ${approach.description}`,
      `- **Implementation:** ${approach.implementation}`,
      `- **Expected Benefit:** ${approach.expectedBenefit}`,
      `- **Risk Level:** ${approach.riskLevel}`
    )
  })

  lines.push(
    '',
    '## 📚 Learning and Improvement',
    '',
    '### Recommendations:'
  )
  for (const rec of learning.recommendations) {
    lines.push(`- **${rec.category}**: ${rec.suggestion}`)
  }

  lines.push(
    '',
    '### Continuous Improvement Cycle:',
    `1. **Observe:** ${learning.observationStrategy}`,
    `2. **Analyze:** ${learning.analysisMethod}`,
    `3. **Apply:** ${learning.implementationApproach}`,
    `4. **Evaluate:** ${learning.evaluationCriteria}`,
    '',
    '## 📊 Adaptation Success Metrics',
    `- **Short-Term Goals:** ${strategies.shortTermMetrics.join(', ')}`,
    `- **Long-Term Goals:** ${strategies.longTermMetrics.join(', ')}`,
    `- **Learning Speed Indicators:** ${learning.learningSpeedIndicators.join(', ')}`
  )

  return lines.join('\n') + '\n'
}

// ============================================================================
// Plugin Info
// ============================================================================

export function pluginInfoReport(status: AgentStatus): string {
  return `# 🧠 Deliberate Plugin

## 📋 Features
- **Chain-of-Thought Reasoning**: staged analysis, planning, execution, evaluation and reflection
- **Dynamic Tool Discovery**: keyword-based tool selection and simulated use
- **Critical Thinking**: self-assessment of each reasoning run
- **Agentic Planning**: objective analysis, step plans and risk review
- **Real-World Adaptation**: context patterns mapped to adaptation strategies

## 🛠️ Available Functions
1. \`enhancedThinking()\` - Staged thinking and analysis
2. \`discoverAndUseTools()\` - Dynamic tool usage
3. \`agenticPlanning()\` - Strategic planning
4. \`realWorldAdaptation()\` - Real-world adaptation

## 📊 Status
- **Agent Status**: Active
- **Learned Patterns**: ${status.learnedPatterns}
- **Available Tools**: ${status.availableTools}
- **Thinking History**: ${status.thinkingSteps} steps
- **Tracked Goals**: ${status.goals}
- **Known Users**: ${status.knownUsers}
`
}

/**
 * User-visible error string
 */
export function errorMessage(label: string, error: unknown): string {
  const detail = error instanceof Error ? error.message : String(error)
  return `${ERROR_PREFIX} ${label}: ${detail}`
}
