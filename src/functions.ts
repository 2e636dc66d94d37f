/**
 * Host Functions
 *
 * The plugin's public entry points. Each one runs a heuristic pipeline on an
 * agent and returns a markdown report; any failure becomes a "❌" string.
 */

import type { EntryPoint, ExternalApi, ThinkingOptions, UserContext } from './types.js'
import { Agent } from './agent.js'
import { ConsoleLogger } from './providers/logger/console.js'
import { resolveLogLevel } from './config.js'
import { ExternalApiSchema, formatIssues, keepStrings } from './schemas.js'
import {
  adaptationReport,
  errorMessage,
  planningReport,
  pluginInfoReport,
  thinkingReport,
  toolUsageReport
} from './report/templates.js'

export interface PluginFunctions {
  readonly agent: Agent
  enhancedThinking(query: string | null | undefined, options?: ThinkingOptions | null): string
  discoverAndUseTools(
    taskDescription: string | null | undefined,
    availableApis?: readonly unknown[] | null,
    user?: UserContext | null
  ): string
  agenticPlanning(
    objective: string | null | undefined,
    constraints?: readonly unknown[] | null,
    timeHorizon?: string | null,
    user?: UserContext | null
  ): string
  realWorldAdaptation(
    context: string | null | undefined,
    environmentalFactors?: readonly unknown[] | null,
    adaptationGoals?: readonly unknown[] | null,
    user?: UserContext | null
  ): string
  getPluginInfo(): string
}

/**
 * Keep the entries that describe a named API; log and drop the rest
 */
export function parseExternalApis(entries: readonly unknown[], agent: Agent): ExternalApi[] {
  const apis: ExternalApi[] = []
  entries.forEach((entry, index) => {
    const parsed = ExternalApiSchema.safeParse(entry)
    if (parsed.success) {
      apis.push(parsed.data)
    } else {
      agent.log?.debug(`Skipping API entry ${index}: ${formatIssues(parsed.error)}`)
    }
  })
  return apis
}

/**
 * Bind the entry points to an agent
 */
export function createPluginFunctions(agent: Agent): PluginFunctions {
  function run(entryPoint: EntryPoint, label: string, user: UserContext | null | undefined, body: () => string): string {
    const startedAt = Date.now()
    try {
      agent.rememberUser(user, entryPoint)
      const report = body()
      agent.log?.onComplete?.(entryPoint, Date.now() - startedAt)
      return report
    } catch (error) {
      agent.log?.error(`${entryPoint} failed`, error)
      return errorMessage(label, error)
    }
  }

  return {
    agent,

    enhancedThinking(query, options) {
      const opts = options ?? {}
      return run('enhanced_thinking', 'Error during thinking process', opts.user, () => {
        agent.configure({
          reasoningDepth: opts.reasoningDepth,
          criticalThinking: opts.enableCriticalThinking ?? true
        })
        const result = agent.chainOfThoughtReasoning(query ?? '')
        return thinkingReport(result)
      })
    },

    discoverAndUseTools(taskDescription, availableApis, user) {
      return run('discover_and_use_tools', 'Tool discovery and usage error', user, () => {
        const task = taskDescription ?? ''
        const apis = parseExternalApis(availableApis ?? [], agent)
        const tools = agent.identifySuitableTools(task, apis)
        const usage = agent.useToolsIntelligently(task, tools)
        return toolUsageReport(task, tools, usage)
      })
    },

    agenticPlanning(objective, constraints, timeHorizon, user) {
      return run('agentic_planning', 'Agentic planning error', user, () => {
        const goalText = objective ?? ''
        const analysis = agent.analyzeObjective(goalText, keepStrings(constraints ?? []), timeHorizon ?? 'short')
        const plan = agent.createStrategicPlan(analysis)
        const risks = agent.assessRisks(plan)
        const goal = agent.trackGoal(goalText, analysis, plan)
        return planningReport(analysis, plan, risks, goal)
      })
    },

    realWorldAdaptation(context, environmentalFactors, adaptationGoals, user) {
      return run('real_world_adaptation', 'Real-world adaptation error', user, () => {
        const analysis = agent.analyzeContext(context ?? '', keepStrings(environmentalFactors ?? []))
        const strategies = agent.developAdaptationStrategies(analysis, keepStrings(adaptationGoals ?? []))
        const learning = agent.generateLearningRecommendations(analysis, strategies)
        return adaptationReport(analysis, strategies, learning)
      })
    },

    getPluginInfo() {
      return run('plugin_info', 'Plugin info error', undefined, () => pluginInfoReport({
        learnedPatterns: agent.learnedPatterns.size,
        availableTools: agent.availableTools.size,
        thinkingSteps: agent.thinkingHistory.length,
        goals: agent.goals.length,
        knownUsers: agent.contextMemory.size
      }))
    }
  }
}

/** Agent shared by the module-level functions for the life of the process */
export const sharedAgent = new Agent({
  logger: new ConsoleLogger({ level: resolveLogLevel() })
})

const shared = createPluginFunctions(sharedAgent)

export const enhancedThinking = shared.enhancedThinking
export const discoverAndUseTools = shared.discoverAndUseTools
export const agenticPlanning = shared.agenticPlanning
export const realWorldAdaptation = shared.realWorldAdaptation
export const getPluginInfo = shared.getPluginInfo
