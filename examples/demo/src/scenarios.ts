/**
 * Canned demo scenarios, one per entry point
 */

import type { PluginFunctions, UserContext } from '../../../src/index.js'

export interface Scenario {
  key: string
  title: string
  run: (functions: PluginFunctions, user: UserContext) => string
}

export const scenarios: Scenario[] = [
  {
    key: '1',
    title: 'Enhanced thinking',
    run: (functions, user) =>
      functions.enhancedThinking('How can we compare two caching strategies for a busy API?', {
        reasoningDepth: 4,
        enableCriticalThinking: true,
        user
      })
  },
  {
    key: '2',
    title: 'Tool discovery and use',
    run: (functions, user) =>
      functions.discoverAndUseTools(
        'search the web for code review practices',
        [
          { name: 'review_api', description: 'Automated code review for pull requests' },
          { name: 'weather_api', description: 'Weather forecast data' }
        ],
        user
      )
  },
  {
    key: '3',
    title: 'Agentic planning',
    run: (functions, user) =>
      functions.agenticPlanning(
        'Improve website performance',
        ['Budget: $10K', 'Time: 2 months'],
        'medium',
        user
      )
  },
  {
    key: '4',
    title: 'Real-world adaptation',
    run: (functions, user) =>
      functions.realWorldAdaptation(
        'A market change opens a growth opportunity while a supply problem persists',
        ['Tight timeline', 'Limited resources', 'New competitors'],
        ['Keep existing customers', 'Enter one new segment'],
        user
      )
  },
  {
    key: '5',
    title: 'Plugin info',
    run: functions => functions.getPluginInfo()
  }
]
