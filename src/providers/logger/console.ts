/**
 * Console Logger Provider
 *
 * Default logger implementation using console.
 */

import type { EntryPoint, LogProvider, ThinkingStep, ToolUseRecord } from '../../types.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface ConsoleLoggerConfig {
  level?: LogLevel
  prefix?: string
  timestamps?: boolean
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

export class ConsoleLogger implements LogProvider {
  private level: number
  private prefix: string
  private timestamps: boolean

  constructor(config: ConsoleLoggerConfig = {}) {
    this.level = LOG_LEVELS[config.level || 'info']
    this.prefix = config.prefix || '[Deliberate]'
    this.timestamps = config.timestamps ?? true
  }

  private formatMessage(level: LogLevel, message: string): string {
    const parts: string[] = []
    if (this.timestamps) {
      parts.push(new Date().toISOString())
    }
    parts.push(this.prefix)
    parts.push(`[${level.toUpperCase()}]`)
    parts.push(message)
    return parts.join(' ')
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.level
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message), data ?? '')
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message), data ?? '')
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message), data ?? '')
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message), data ?? '')
    }
  }

  onThinkingStep(step: ThinkingStep): void {
    this.debug(`Thinking step: ${step.phase} (confidence ${step.confidence})`, step.content)
  }

  onToolUse(record: ToolUseRecord): void {
    const status = record.success ? 'success' : 'error'
    this.debug(`Tool used: ${record.tool} (${status})`, record.result)
  }

  onComplete(entryPoint: EntryPoint, durationMs: number): void {
    this.info(`Completed ${entryPoint} in ${durationMs}ms`)
  }
}
