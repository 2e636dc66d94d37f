/**
 * Text helpers shared by the heuristics.
 */

/**
 * Count whitespace-separated words
 */
export function countWords(text: string): number {
  const trimmed = text.trim()
  if (!trimmed) return 0
  return trimmed.split(/\s+/).length
}

/**
 * Lower-cased whitespace-separated words
 */
export function splitKeywords(text: string): string[] {
  const trimmed = text.trim().toLowerCase()
  if (!trimmed) return []
  return trimmed.split(/\s+/)
}

/**
 * True when the lower-cased text contains any of the needles
 */
export function containsAny(text: string, needles: readonly string[]): boolean {
  const lower = text.toLowerCase()
  return needles.some(needle => lower.includes(needle))
}

/**
 * Format a [0, 1] ratio as a percentage with one decimal, e.g. 0.85 → "85.0%"
 */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

/**
 * "code_analysis" → "Code Analysis"
 */
export function titleCase(text: string): string {
  return text
    .replace(/_/g, ' ')
    .split(' ')
    .map(word => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ')
}

/**
 * Join a list for display, falling back when it is empty
 */
export function joinOrNone(items: readonly string[], separator: string = ', ', fallback: string = 'none'): string {
  return items.length > 0 ? items.join(separator) : fallback
}
