/**
 * Logger utility for structured logging with sensitive data filtering
 * Every entry is a single JSON line on stderr, leaving stdout to the program's own output
 */

import * as crypto from 'node:crypto'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'] as const

/**
 * Log entry structure for consistent formatting
 */
interface StructuredLogEntry {
  timestamp: string
  level: LogLevel
  context: string
  message: string
  metadata?: Record<string, unknown>
  sessionId: string
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default: info) */
  level?: LogLevel
}

/**
 * Logger class for structured logging with sensitive data protection
 */
export class Logger {
  private readonly sensitivePatterns = [
    /api[_-]?key[^\s]*[:=]\s*([^\s]+)/gi,
    /password[^\s]*[:=]\s*([^\s]+)/gi,
    /bearer\s+([a-zA-Z0-9\-._~+/]+=*)/gi,
    /secret[^\s]*[:=]\s*([^\s]+)/gi,
    /token[^\s]*[:=]\s*([^\s]+)/gi,
  ]

  private readonly keyBasedSensitivePatterns = [
    /api[_-]?key/i,
    /secret/i,
    /password/i,
    /token/i,
    /credential/i,
  ]

  private readonly minLevel: LogLevel
  private readonly sessionId: string

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.level ?? 'info'
    this.sessionId = crypto.randomUUID().substring(0, 8)
  }

  /**
   * Log a debug message (never in production)
   * @param context Module or pipeline stage where the log originates
   */
  debug(context: string, message: string, metadata?: Record<string, unknown>): void {
    if (process.env['NODE_ENV'] === 'production') return
    this.writeLog('debug', context, message, metadata)
  }

  info(context: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeLog('info', context, message, metadata)
  }

  warn(context: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeLog('warn', context, message, metadata)
  }

  /**
   * Log an error message
   * @param context Module or pipeline stage where the log originates
   * @param message Log message
   * @param error Optional error; its name, message and (outside production) stack are recorded
   * @param metadata Optional metadata object
   */
  error(context: string, message: string, error?: Error, metadata?: Record<string, unknown>): void {
    const enhancedMetadata = {
      ...metadata,
      ...(error && {
        errorName: error.name,
        errorMessage: this.sanitizeString(error.message),
        errorStack: process.env['NODE_ENV'] !== 'production' ? error.stack : undefined,
      }),
    }
    this.writeLog('error', context, message, enhancedMetadata)
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel)
  }

  private writeLog(
    level: LogLevel,
    context: string,
    message: string,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return

    const logEntry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context,
      message: this.sanitizeString(message),
      ...(metadata && { metadata: this.sanitizeMetadata(metadata) }),
      sessionId: this.sessionId,
    }

    console.error(JSON.stringify(logEntry))
  }

  /**
   * Redact the value part of `key=value` style secrets embedded in text
   */
  private sanitizeString(input: string): string {
    let sanitized = input

    for (const pattern of this.sensitivePatterns) {
      sanitized = sanitized.replace(pattern, (match: string, group1: string) =>
        match.replace(group1, '[REDACTED]')
      )
    }

    return sanitized
  }

  private sanitizeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(metadata)) {
      if (this.isSensitiveKey(key)) {
        sanitized[key] = '[REDACTED]'
      } else if (typeof value === 'string') {
        sanitized[key] = this.sanitizeString(value)
      } else if (isPlainRecord(value)) {
        sanitized[key] = this.sanitizeMetadata(value)
      } else {
        sanitized[key] = value
      }
    }

    return sanitized
  }

  private isSensitiveKey(key: string): boolean {
    return this.keyBasedSensitivePatterns.some((pattern) => pattern.test(key))
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
