/**
 * Shared constants used across the agent, the report templates and the host functions.
 * Separated to avoid circular dependencies.
 */

import type { ReasoningPhase } from './types.js'

/** Prefix of every user-visible error string */
export const ERROR_PREFIX = '❌'

export const DEFAULT_REASONING_DEPTH = 3
export const MIN_REASONING_DEPTH = 1
export const MAX_REASONING_DEPTH = 5

/** Upper bound on tools returned by discovery */
export const MAX_SUITABLE_TOOLS = 5

export const PHASE_EMOJI: Record<ReasoningPhase, string> = {
  analysis: '🔍',
  planning: '📋',
  execution: '⚡',
  evaluation: '🎯',
  reflection: '🪞'
}

/** Substrings marking a query as a question */
export const QUESTION_WORDS = ['what', 'how', 'why', 'who', 'where', 'when', 'which']

/** Substrings that push a query or objective straight to complex */
export const COMPLEXITY_KEYWORDS = ['analy', 'evaluat', 'compar']

/** Seconds budgeted per plan step */
export const SECONDS_PER_STEP = 30
