/**
 * Real-World Adaptation
 *
 * Keyword groups over the context and environmental factors, mapped to canned
 * adaptation approaches and learning recommendations.
 */

import type {
  AdaptationApproach,
  AdaptationStrategies,
  ContextAnalysis,
  LearningRecommendation,
  LearningRecommendations
} from './types.js'
import { containsAny } from './text.js'

interface PatternRule {
  keywords: string[]
  pattern: string
  approach: AdaptationApproach
}

interface FactorRule {
  keywords: string[]
  factor: string
}

const PATTERN_RULES: PatternRule[] = [
  {
    keywords: ['change'],
    pattern: 'Change-driven situation',
    approach: {
      name: 'Flexible Adaptation',
      description: 'Adjust quickly to changing conditions',
      implementation: 'Continuous tuning through a modular approach',
      expectedBenefit: 'Fast response to change',
      riskLevel: 'medium'
    }
  },
  {
    keywords: ['problem', 'issue'],
    pattern: 'Problem-solving situation',
    approach: {
      name: 'Systematic Problem Solving',
      description: 'Step-by-step problem analysis and resolution',
      implementation: 'Root-cause analysis and iterative fixes',
      expectedBenefit: 'Lasting solutions',
      riskLevel: 'low'
    }
  },
  {
    keywords: ['opportunit', 'growth'],
    pattern: 'Opportunity evaluation situation',
    approach: {
      name: 'Proactive Opportunity Assessment',
      description: 'Identify and evaluate opportunities early',
      implementation: 'Continuous scanning and fast evaluation',
      expectedBenefit: 'Competitive advantage',
      riskLevel: 'medium-high'
    }
  }
]

// First match wins for each factor
const FACTOR_RULES: FactorRule[] = [
  { keywords: ['time'], factor: 'Time constraint' },
  { keywords: ['resource'], factor: 'Resource limitation' },
  { keywords: ['competit'], factor: 'Competitive environment' }
]

export function analyzeContext(context: string, environmentalFactors: string[]): ContextAnalysis {
  const identifiedPatterns = PATTERN_RULES
    .filter(rule => containsAny(context, rule.keywords))
    .map(rule => rule.pattern)

  const criticalFactors: string[] = []
  for (const factor of environmentalFactors) {
    const rule = FACTOR_RULES.find(r => containsAny(factor, r.keywords))
    if (rule) {
      criticalFactors.push(rule.factor)
    }
  }

  return {
    interpretation: `Context analysis: ${identifiedPatterns.length} key patterns, ${criticalFactors.length} critical factors`,
    identifiedPatterns,
    criticalFactors
  }
}

export function developAdaptationStrategies(analysis: ContextAnalysis, adaptationGoals: string[]): AdaptationStrategies {
  const approaches: AdaptationApproach[] = []
  for (const pattern of analysis.identifiedPatterns) {
    const rule = PATTERN_RULES.find(r => r.pattern === pattern)
    if (rule) {
      approaches.push({ ...rule.approach })
    }
  }

  return {
    approaches,
    goals: [...adaptationGoals],
    shortTermMetrics: ['Adaptation speed', 'Early results', 'Resource usage'],
    longTermMetrics: ['Sustainability', 'Learning rate', 'Performance improvement']
  }
}

export function generateLearningRecommendations(
  analysis: ContextAnalysis,
  strategies: AdaptationStrategies
): LearningRecommendations {
  const recommendations: LearningRecommendation[] = []

  if (analysis.criticalFactors.length > 0) {
    recommendations.push({
      category: 'Critical Factor Management',
      suggestion: 'Set up dedicated monitoring for the identified critical factors'
    })
  }

  if (strategies.approaches.length > 2) {
    recommendations.push({
      category: 'Strategy Diversity',
      suggestion: 'Run parallel tests and evaluations for the multi-strategy approach'
    })
  }

  recommendations.push({
    category: 'Continuous Improvement',
    suggestion: 'Track regular feedback loops and performance metrics'
  })

  return {
    recommendations,
    observationStrategy: 'Systematic data collection and trend analysis',
    analysisMethod: 'Statistical evaluation and pattern recognition',
    implementationApproach: 'Phased rollout with A/B testing',
    evaluationCriteria: 'Objective metrics and subjective assessments',
    learningSpeedIndicators: ['Pattern recognition speed', 'Adaptation time', 'Error reduction rate']
  }
}
