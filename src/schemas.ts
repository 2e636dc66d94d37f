/**
 * Input schemas for host-supplied arguments.
 * Use z.infer<> for the parsed shapes.
 */

import { z } from 'zod'

export const TimeHorizonSchema = z.enum(['short', 'medium', 'long'])

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

export const UserContextSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  email: z.string().optional(),
  role: z.string().optional()
}).passthrough()

export const ExternalApiSchema = z.object({
  name: z.string().min(1, 'API name cannot be empty'),
  description: z.string().optional(),
  parameters: z.record(z.unknown()).optional()
}).passthrough()

/** null and undefined both read as "not given" */
const optionalText = z.string().nullish().transform(value => value ?? '')
// Non-string entries are dropped one by one rather than failing the call
const optionalList = z.array(z.unknown()).nullish().transform(value => keepStrings(value ?? []))
const optionalNumber = z.number().nullish().transform(value => value ?? undefined)
const optionalBoolean = z.boolean().nullish().transform(value => value ?? undefined)

/**
 * Keep the string entries of a host-supplied list
 */
export function keepStrings(values: readonly unknown[]): string[] {
  return values.filter((value): value is string => typeof value === 'string')
}

export const ThinkingInputSchema = z.object({
  query: optionalText,
  reasoning_depth: optionalNumber,
  enable_critical_thinking: optionalBoolean
})
export type ThinkingInput = z.infer<typeof ThinkingInputSchema>

export const ToolDiscoveryInputSchema = z.object({
  task_description: optionalText,
  // Entries are validated one by one so that a bad entry is skipped, not fatal
  available_apis: z.array(z.unknown()).nullish().transform(value => value ?? [])
})
export type ToolDiscoveryInput = z.infer<typeof ToolDiscoveryInputSchema>

export const PlanningInputSchema = z.object({
  objective: optionalText,
  constraints: optionalList,
  time_horizon: z.string().nullish().transform(value => value ?? 'short')
})
export type PlanningInput = z.infer<typeof PlanningInputSchema>

export const AdaptationInputSchema = z.object({
  context: optionalText,
  environmental_factors: optionalList,
  adaptation_goals: optionalList
})
export type AdaptationInput = z.infer<typeof AdaptationInputSchema>

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}
