import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Agent, normalizeReasoningDepth } from './agent.js'
import type { LogProvider, ToolCapability } from './types.js'

const NOW = new Date('2026-01-01T00:00:00.000Z')
const DAY_MS = 24 * 60 * 60 * 1000

function createMockLogger(): LogProvider {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    onThinkingStep: vi.fn(),
    onToolUse: vi.fn(),
    onComplete: vi.fn()
  }
}

function capability(name: string, description: string): ToolCapability {
  return { name, description, parameters: {}, usageExamples: [], effectivenessScore: 0 }
}

describe('Agent', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(NOW)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('construction', () => {
    it('starts empty with the default tools', () => {
      const agent = new Agent()
      expect(agent.thinkingHistory).toEqual([])
      expect(agent.goals).toEqual([])
      expect(agent.learnedPatterns.size).toBe(0)
      expect([...agent.availableTools.keys()]).toEqual(['web_search', 'code_analysis', 'planning'])
      expect(agent.reasoningDepth).toBe(3)
      expect(agent.criticalThinkingEnabled).toBe(true)
    })

    it('lets configured tools replace or extend the defaults', () => {
      const agent = new Agent({
        tools: [capability('planning', 'Custom planner'), capability('translate', 'Translate text')]
      })
      expect(agent.availableTools.size).toBe(4)
      expect(agent.availableTools.get('planning')?.description).toBe('Custom planner')
    })

    it('clamps the configured reasoning depth', () => {
      expect(new Agent({ reasoningDepth: 9 }).reasoningDepth).toBe(5)
      expect(new Agent({ reasoningDepth: 0 }).reasoningDepth).toBe(1)
      expect(new Agent({ reasoningDepth: 2.6 }).reasoningDepth).toBe(3)
      expect(new Agent({ reasoningDepth: Number.NaN }).reasoningDepth).toBe(3)
    })

    it('does not share tool descriptors between agents', () => {
      const first = new Agent()
      first.useToolsIntelligently('search', first.identifySuitableTools('search'))
      expect(new Agent().availableTools.get('web_search')?.effectivenessScore).toBe(0)
    })
  })

  describe('normalizeReasoningDepth', () => {
    it('rejects non-finite values', () => {
      expect(normalizeReasoningDepth(Number.POSITIVE_INFINITY)).toBeUndefined()
      expect(normalizeReasoningDepth(4)).toBe(4)
    })
  })

  describe('configure', () => {
    it('keeps the current depth and warns on an invalid value', () => {
      const logger = createMockLogger()
      const agent = new Agent({ logger, reasoningDepth: 4 })
      agent.configure({ reasoningDepth: Number.NaN })
      expect(agent.reasoningDepth).toBe(4)
      expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid reasoning depth: NaN')
    })

    it('toggles critical thinking', () => {
      const agent = new Agent()
      agent.configure({ criticalThinking: false })
      expect(agent.criticalThinkingEnabled).toBe(false)
    })
  })

  describe('addThinkingStep', () => {
    it('records a timestamped step and reports it to the logger', () => {
      const logger = createMockLogger()
      const agent = new Agent({ logger })

      const step = agent.addThinkingStep('analysis', 'Test analysis', 0.9)

      expect(step).toEqual({
        phase: 'analysis',
        content: 'Test analysis',
        timestamp: NOW.getTime(),
        confidence: 0.9,
        dependencies: []
      })
      expect(agent.thinkingHistory).toEqual([step])
      expect(logger.onThinkingStep).toHaveBeenCalledWith(step)
    })

    it('clamps confidence into [0, 1]', () => {
      const agent = new Agent()
      expect(agent.addThinkingStep('analysis', 'high', 1.5).confidence).toBe(1)
      expect(agent.addThinkingStep('analysis', 'low', -0.2).confidence).toBe(0)
      expect(agent.addThinkingStep('analysis', 'default').confidence).toBe(0.8)
    })
  })

  describe('chainOfThoughtReasoning', () => {
    it('runs all five phases with critical thinking enabled', () => {
      const agent = new Agent()
      const result = agent.chainOfThoughtReasoning('What is TypeScript?')

      expect(result.reasoningChain.map(s => s.phase)).toEqual([
        'analysis',
        'planning',
        'execution',
        'evaluation',
        'reflection'
      ])
      expect(result.reasoningChain[0].content).toBe(
        'Query analysis: question type, simple complexity. Key concepts: What, TypeScript'
      )
      expect(result.reasoningChain[1].content).toBe(
        'Execution plan: 2-step approach. Required steps: Formulate a direct answer; Verify the answer'
      )
      expect(result.reasoningChain[2].content).toBe('Plan execution result: 2 steps completed')
      expect(result.reasoningChain[4].content).toBe(
        'Lessons learned: Steps were completed with a generally high confidence level'
      )
      expect(result.reasoningChain[4].dependencies).toEqual(['analysis', 'planning', 'execution', 'evaluation'])
      expect(result.finalAnswer).toBe(
        'All steps completed successfully. A reliable conclusion was reached through thorough analysis and evaluation.'
      )
      expect(result.confidenceScore).toBeCloseTo(0.93)
      expect(result.thinkingProcess.startsWith('🧠 **Thinking Process:**')).toBe(true)
    })

    it('records a query pattern keyed by word count', () => {
      const agent = new Agent()
      agent.chainOfThoughtReasoning('What is TypeScript?')

      expect(agent.learnedPatterns.get('query_type_3_words')).toEqual([{
        kind: 'query',
        queryLength: 19,
        stepsTaken: 4,
        success: true,
        timestamp: NOW.getTime()
      }])
    })

    it('skips evaluation when critical thinking is off', () => {
      const agent = new Agent({ criticalThinking: false })
      const result = agent.chainOfThoughtReasoning('What is TypeScript?')

      expect(result.reasoningChain.map(s => s.phase)).toEqual(['analysis', 'planning', 'execution', 'reflection'])
      expect(result.reasoningChain[3].content).toBe('Lessons learned: The process went as expected')
      expect(agent.learnedPatterns.get('query_type_3_words')?.[0]).toMatchObject({ stepsTaken: 3, success: false })
    })

    it('limits key concepts by reasoning depth', () => {
      const agent = new Agent({ reasoningDepth: 1 })
      const result = agent.chainOfThoughtReasoning('alpha beta gamma delta epsilon')
      expect(result.reasoningChain[0].content).toBe(
        'Query analysis: explanation type, simple complexity. Key concepts: alpha, beta, gamma'
      )
    })

    it('keeps growing history and patterns across calls', () => {
      const agent = new Agent()
      agent.chainOfThoughtReasoning('first query')
      agent.chainOfThoughtReasoning('second query')
      agent.chainOfThoughtReasoning('a third longer query')

      expect(agent.thinkingHistory).toHaveLength(15)
      expect(agent.learnedPatterns.get('query_type_2_words')).toHaveLength(2)
      expect(agent.learnedPatterns.get('query_type_4_words')).toHaveLength(1)
    })

    it('handles an empty query', () => {
      const agent = new Agent()
      const result = agent.chainOfThoughtReasoning('')
      expect(result.reasoningChain[0].content).toBe('Query analysis: explanation type, simple complexity. Key concepts: none')
      expect(agent.learnedPatterns.has('query_type_0_words')).toBe(true)
    })
  })

  describe('useToolsIntelligently', () => {
    it('uses every selected tool and bumps known tools', () => {
      const logger = createMockLogger()
      const agent = new Agent({ logger })
      const tools = agent.identifySuitableTools('search the web for code', [
        { name: 'review_api', description: 'code review' }
      ])

      const usage = agent.useToolsIntelligently('search the web for code', tools)

      expect(usage.summary).toBe('3/3 tools used successfully')
      expect(usage.successRate).toBe(1)
      expect(usage.newPatterns).toBe(1)
      expect(usage.toolResults.map(r => r.result)).toEqual([
        "'web_search' tool used successfully",
        "'code_analysis' tool used successfully",
        "'review_api' tool used successfully"
      ])
      expect(agent.availableTools.get('web_search')).toMatchObject({ effectivenessScore: 0.1, lastUsed: NOW.getTime() })
      expect(agent.availableTools.has('review_api')).toBe(false)
      expect(logger.onToolUse).toHaveBeenCalledTimes(3)
    })

    it('opens a pattern bucket only once per word count', () => {
      const agent = new Agent()
      expect(agent.useToolsIntelligently('plan my week', []).newPatterns).toBe(1)
      expect(agent.useToolsIntelligently('plan your week', []).newPatterns).toBe(0)
      expect(agent.learnedPatterns.get('task_type_3_words')).toHaveLength(2)
    })

    it('reports a zero success rate when nothing was selected', () => {
      const agent = new Agent()
      const usage = agent.useToolsIntelligently('zzz', [])
      expect(usage.summary).toBe('0/0 tools used successfully')
      expect(usage.successRate).toBe(0)
      expect(agent.learnedPatterns.get('task_type_1_words')).toEqual([{
        kind: 'task',
        successfulTools: [],
        taskComplexity: 0,
        successRate: 0,
        timestamp: NOW.getTime()
      }])
    })

    it('caps effectiveness at 1 and starts the proven-tool bonus past 0.5', () => {
      const agent = new Agent()
      const webSearch = agent.identifySuitableTools('web').filter(t => t.name === 'web_search')

      for (let i = 0; i < 6; i++) {
        agent.useToolsIntelligently('web', webSearch)
      }
      expect(agent.availableTools.get('web_search')?.effectivenessScore).toBe(0.6)
      expect(agent.identifySuitableTools('xyz').map(t => [t.name, t.relevanceScore])).toEqual([['web_search', 0.5]])

      for (let i = 0; i < 10; i++) {
        agent.useToolsIntelligently('web', webSearch)
      }
      expect(agent.availableTools.get('web_search')?.effectivenessScore).toBe(1)
    })
  })

  describe('trackGoal', () => {
    it('registers a pending goal with the plan steps as sub-goals', () => {
      const agent = new Agent()
      const analysis = agent.analyzeObjective('Launch the beta', ['Budget', 'Team of three'], 'medium')
      const plan = agent.createStrategicPlan(analysis)

      const goal = agent.trackGoal('Launch the beta', analysis, plan)

      expect(goal).toEqual({
        id: 'goal_1',
        description: 'Launch the beta',
        priority: 2,
        deadline: NOW.getTime() + 9 * DAY_MS,
        status: 'pending',
        subGoals: ['Preparation', 'Implementation', 'Evaluation'],
        progress: 0
      })
      expect(agent.trackGoal('Again', analysis, plan).id).toBe('goal_2')
    })
  })

  describe('rememberUser', () => {
    it('ignores calls without a user id', () => {
      const agent = new Agent()
      expect(agent.rememberUser(undefined, 'plugin_info')).toBeUndefined()
      expect(agent.rememberUser({ name: 'Anonymous' }, 'plugin_info')).toBeUndefined()
      expect(agent.contextMemory.size).toBe(0)
    })

    it('counts calls per user and keeps the last entry point', () => {
      const agent = new Agent()
      agent.rememberUser({ id: 'user-1', name: 'Test User' }, 'enhanced_thinking')
      const memory = agent.rememberUser({ id: 'user-1' }, 'agentic_planning')

      expect(memory).toEqual({
        userId: 'user-1',
        name: 'Test User',
        calls: 2,
        lastEntryPoint: 'agentic_planning',
        lastSeen: NOW.getTime()
      })
    })
  })
})
