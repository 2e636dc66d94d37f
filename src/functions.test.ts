import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Agent } from './agent.js'
import { createPluginFunctions, parseExternalApis, type PluginFunctions } from './functions.js'
import type { LogProvider } from './types.js'

function createMockLogger(): LogProvider {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    onComplete: vi.fn()
  }
}

describe('plugin functions', () => {
  let logger: LogProvider
  let agent: Agent
  let functions: PluginFunctions

  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'))
    logger = createMockLogger()
    agent = new Agent({ logger })
    functions = createPluginFunctions(agent)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('enhancedThinking', () => {
    it('returns the thinking report', () => {
      const report = functions.enhancedThinking('What is TypeScript?')

      expect(report.startsWith('# 🧠 Enhanced Thinking Response\n')).toBe(true)
      const lines = report.split('\n')
      expect(lines).toContain('**Overall Confidence:** 93.0%')
      expect(lines).toContain('### Step 5: Reflection')
      expect(lines).toContain('- **Time:** 2026-01-01T00:00:00.000Z')
      expect(lines).toContain('🔍 **Step 1 - Analysis:** Query analysis: question type, simple complexity. Key concepts: What, TypeScript')
      expect(logger.onComplete).toHaveBeenCalledWith('enhanced_thinking', 0)
    })

    it('applies the per-call options to the agent', () => {
      const report = functions.enhancedThinking('alpha beta gamma delta epsilon', {
        reasoningDepth: 1,
        enableCriticalThinking: false
      })

      expect(agent.reasoningDepth).toBe(1)
      expect(agent.criticalThinkingEnabled).toBe(false)
      const lines = report.split('\n')
      expect(lines).toContain(
        '- **Content:** Query analysis: explanation type, simple complexity. Key concepts: alpha, beta, gamma'
      )
      expect(lines).toContain('### Step 4: Reflection')
      expect(lines).not.toContain('### Step 5: Reflection')
    })

    it('re-enables critical thinking when the option is omitted', () => {
      functions.enhancedThinking('first', { enableCriticalThinking: false })
      functions.enhancedThinking('second')
      expect(agent.criticalThinkingEnabled).toBe(true)
      expect(agent.thinkingHistory).toHaveLength(9)
    })

    it('treats null options as defaults', () => {
      agent.configure({ criticalThinking: false })
      const report = functions.enhancedThinking('hi', null)

      expect(report.startsWith('# 🧠 Enhanced Thinking Response\n')).toBe(true)
      expect(agent.criticalThinkingEnabled).toBe(true)
      expect(agent.contextMemory.size).toBe(0)
    })

    it('treats a null query as empty', () => {
      const report = functions.enhancedThinking(null)
      expect(report.split('\n')).toContain('- **Content:** Query analysis: explanation type, simple complexity. Key concepts: none')
    })

    it('turns a failure into an error string and logs it', () => {
      const failure = new Error('boom')
      vi.spyOn(agent, 'chainOfThoughtReasoning').mockImplementation(() => {
        throw failure
      })

      expect(functions.enhancedThinking('anything')).toBe('❌ Error during thinking process: boom')
      expect(logger.error).toHaveBeenCalledWith('enhanced_thinking failed', failure)
      expect(logger.onComplete).not.toHaveBeenCalled()
    })
  })

  describe('discoverAndUseTools', () => {
    it('reports the selected tools and the usage summary', () => {
      const report = functions.discoverAndUseTools('search the web for code', [
        { name: 'review_api', description: 'code review' }
      ])
      const lines = report.split('\n')

      expect(lines[0]).toBe('# 🛠️ Smart Tool Usage')
      expect(lines).toContain('- **web_search**: Search the web for information')
      expect(lines).toContain('- **review_api**: code review')
      expect(lines).toContain('3/3 tools used successfully')
      expect(lines).toContain('- **Tools Used:** 3')
      expect(lines).toContain('- **Success Rate:** 100.0%')
      expect(lines).toContain('- **New Patterns Learned:** 1')
    })

    it('skips invalid API entries', () => {
      const report = functions.discoverAndUseTools('weather forecast', [
        'not an api',
        { description: 'weather without a name' },
        { name: 'weather_api', description: 'Weather forecast data' }
      ])

      expect(report.split('\n')).toContain('- **weather_api**: Weather forecast data')
      expect(logger.debug).toHaveBeenCalledWith('Skipping API entry 0: (root): Expected object, received string')
      expect(logger.debug).toHaveBeenCalledWith('Skipping API entry 1: name: Required')
    })

    it('reports when nothing matches', () => {
      const report = functions.discoverAndUseTools(undefined, null)
      const lines = report.split('\n')
      expect(lines).toContain('_No matching tools found._')
      expect(lines).toContain('- **Success Rate:** 0.0%')
    })
  })

  describe('parseExternalApis', () => {
    it('keeps extra fields on valid entries', () => {
      expect(parseExternalApis([{ name: 'a', version: 2 }], agent)).toEqual([{ name: 'a', version: 2 }])
    })
  })

  describe('agenticPlanning', () => {
    it('plans, assesses risks and tracks the goal', () => {
      const report = functions.agenticPlanning(
        'Improve website performance',
        ['Budget: $10K', 'Time: 2 months'],
        'medium'
      )
      const lines = report.split('\n')

      expect(lines[0]).toBe('# 🎯 Agentic Planning Response')
      expect(lines).toContain('Objective analysis complete: medium complexity, medium horizon')
      expect(lines).toContain('**Complexity Level:** medium')
      expect(lines).toContain('**Estimated Duration:** 9 days')
      expect(lines).toContain('**Constraint Impact:** low')
      expect(lines).toContain('**Constraints:** Budget: $10K; Time: 2 months')
      expect(lines).toContain('**Tracked Goal:** goal_1')
      expect(lines).toContain('2. Implementation')
      expect(lines).toContain('1 main risk category identified')
      expect(lines).toContain('- **Critical Point Risk**: A delay in a critical step can affect the whole plan (Probability: 40.0%)')
      expect(agent.goals).toHaveLength(1)
    })

    it('defaults to a short horizon with no constraints', () => {
      const lines = functions.agenticPlanning('Ship it').split('\n')
      expect(lines).toContain('**Estimated Duration:** 1 day')
      expect(lines).toContain('**Constraints:** none')
    })
  })

  describe('realWorldAdaptation', () => {
    it('reports patterns, factors, goals and strategies', () => {
      const report = functions.realWorldAdaptation(
        'Market change creates a growth opportunity',
        ['Strong competitors'],
        ['Keep customers']
      )
      const lines = report.split('\n')

      expect(lines[0]).toBe('# 🌍 Real-World Adaptation Analysis')
      expect(lines).toContain('**Identified Patterns:** Change-driven situation, Opportunity evaluation situation')
      expect(lines).toContain('**Critical Factors:** Competitive environment')
      expect(lines).toContain('**Adaptation Goals:** Keep customers')
      expect(lines).toContain('#### 1. Flexible Adaptation')
      expect(lines).toContain('#### 2. Proactive Opportunity Assessment')
      expect(lines).toContain('- **Continuous Improvement**: Track regular feedback loops and performance metrics')
    })

    it('skips non-string factors and goals', () => {
      const factors: unknown[] = ['Tight timeline', null, 42, 'Strong competitors']
      const goals: unknown[] = [undefined, 'Keep customers']
      const report = functions.realWorldAdaptation(
        'A change',
        factors,
        goals
      )
      const lines = report.split('\n')

      expect(lines).toContain('**Critical Factors:** Time constraint, Competitive environment')
      expect(lines).toContain('**Adaptation Goals:** Keep customers')
    })

    it('handles a context with no known patterns', () => {
      const lines = functions.realWorldAdaptation('', null, null).split('\n')
      expect(lines).toContain('_No specific adaptation patterns detected._')
      expect(lines).toContain('**Adaptation Goals:** none')
    })
  })

  describe('user memory and plugin info', () => {
    it('counts calls per user and shows the agent state', () => {
      const user = { id: 'user-1', name: 'Test User' }
      functions.enhancedThinking('What is TypeScript?', { user })
      functions.agenticPlanning('Ship it', [], 'short', user)
      functions.discoverAndUseTools('plan the week', [], { id: 'user-2' })

      expect(agent.contextMemory.get('user-1')?.calls).toBe(2)
      expect(agent.contextMemory.get('user-1')?.lastEntryPoint).toBe('agentic_planning')

      const lines = functions.getPluginInfo().split('\n')
      expect(lines[0]).toBe('# 🧠 Deliberate Plugin')
      expect(lines).toContain('- **Learned Patterns**: 2')
      expect(lines).toContain('- **Available Tools**: 3')
      expect(lines).toContain('- **Thinking History**: 5 steps')
      expect(lines).toContain('- **Tracked Goals**: 1')
      expect(lines).toContain('- **Known Users**: 2')
    })
  })
})
