/**
 * Strategic Planning
 *
 * Objective analysis, fixed step templates and risk rules for agentic planning.
 */

import type {
  Complexity,
  IdentifiedRisk,
  ObjectiveAnalysis,
  PlanStep,
  RiskAssessment,
  StrategicPlan,
  TimeHorizon
} from './types.js'
import { TimeHorizonSchema } from './schemas.js'
import { countWords } from './text.js'

const HORIZON_MULTIPLIERS: Record<TimeHorizon, number> = {
  short: 1,
  medium: 3,
  long: 10
}

const BASE_DAYS: Record<Complexity, number> = {
  simple: 1,
  medium: 3,
  complex: 7
}

const STEP_TEMPLATES: Record<Complexity, PlanStep[]> = {
  complex: [
    { title: 'Detailed Planning', description: 'Thorough analysis and sub-goal definition', duration: '2 days', priority: 'high' },
    { title: 'Resource Gathering', description: 'Collect the required tools and information', duration: '1 day', priority: 'high' },
    { title: 'Step-by-Step Implementation', description: 'Carry out the plan systematically', duration: '3-5 days', priority: 'critical' },
    { title: 'Monitoring and Adaptation', description: 'Track progress and apply corrections', duration: 'ongoing', priority: 'medium' }
  ],
  medium: [
    { title: 'Preparation', description: 'Basic planning and resource identification', duration: '1 day', priority: 'high' },
    { title: 'Implementation', description: 'Achieve the main objective', duration: '2 days', priority: 'critical' },
    { title: 'Evaluation', description: 'Check the results', duration: '0.5 days', priority: 'medium' }
  ],
  simple: [
    { title: 'Direct Implementation', description: 'Achieve the objective directly', duration: '1 day', priority: 'critical' },
    { title: 'Verification', description: 'Check the outcome', duration: '0.2 days', priority: 'low' }
  ]
}

/** Complexity → goal priority */
export const COMPLEXITY_PRIORITY: Record<Complexity, number> = {
  simple: 1,
  medium: 2,
  complex: 3
}

/**
 * Multiplier for a horizon; unknown horizons weigh like "short"
 */
export function horizonMultiplier(timeHorizon: string): number {
  const parsed = TimeHorizonSchema.safeParse(timeHorizon)
  return parsed.success ? HORIZON_MULTIPLIERS[parsed.data] : 1
}

export function analyzeObjective(objective: string, constraints: string[], horizon: string): ObjectiveAnalysis {
  const timeHorizon = horizon.trim() || 'short'
  const words = countWords(objective)

  let complexity: Complexity = 'simple'
  if (words > 20 || constraints.length > 3) {
    complexity = 'complex'
  } else if (words > 10 || constraints.length > 1) {
    complexity = 'medium'
  }

  const estimatedDays = BASE_DAYS[complexity] * horizonMultiplier(timeHorizon)

  return {
    interpretation: `Objective analysis complete: ${complexity} complexity, ${timeHorizon} horizon`,
    complexity,
    timeHorizon,
    estimatedDays,
    estimatedDuration: `${estimatedDays} ${estimatedDays === 1 ? 'day' : 'days'}`,
    constraintImpact: constraints.length > 2 ? 'high' : 'low',
    constraints: [...constraints]
  }
}

export function createStrategicPlan(analysis: ObjectiveAnalysis): StrategicPlan {
  return {
    mainSteps: STEP_TEMPLATES[analysis.complexity].map(step => ({ ...step })),
    progressMetrics: ['Share of completed steps', 'Quality score', 'Schedule adherence'],
    checkpoints: ['After each step', 'Major milestones'],
    adaptationTriggers: ['Unexpected blockers', 'Resource changes', 'Priority shifts']
  }
}

export function assessRisks(plan: StrategicPlan): RiskAssessment {
  const risks: IdentifiedRisk[] = []

  if (plan.mainSteps.length > 3) {
    risks.push({
      type: 'Complexity Risk',
      description: 'A multi-step plan can be hard to coordinate',
      probability: 0.3
    })
  }

  if (plan.mainSteps.some(step => step.priority.includes('critical'))) {
    risks.push({
      type: 'Critical Point Risk',
      description: 'A delay in a critical step can affect the whole plan',
      probability: 0.4
    })
  }

  if (plan.mainSteps.some(step => step.duration.includes('ongoing'))) {
    risks.push({
      type: 'Continuous Monitoring Risk',
      description: 'Long-running monitoring can drain resources',
      probability: 0.2
    })
  }

  return {
    summary: `${risks.length} main risk ${risks.length === 1 ? 'category' : 'categories'} identified`,
    identifiedRisks: risks,
    overallRiskLevel: risks.length > 1 ? 'medium' : 'low'
  }
}
