/**
 * Error classes for the two-track package
 * Raised for contract violations and configuration problems, never for pipeline failures
 */

/**
 * Structured error format for consistent error reporting
 */
export interface StructuredError {
  code: string
  message: string
  suggestion: string
  timestamp: string
  context?: Record<string, unknown>
}

/**
 * Base class for all package errors with structured error support
 */
export abstract class BaseError extends Error {
  abstract readonly code: string
  abstract readonly suggestion: string
  readonly timestamp: string
  readonly context: Record<string, unknown> | undefined

  constructor(message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = this.constructor.name
    this.timestamp = new Date().toISOString()
    this.context = context
  }

  toStructuredError(): StructuredError {
    return {
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      timestamp: this.timestamp,
      ...(this.context && { context: this.context }),
    }
  }
}

/**
 * Raised synchronously when a Result constructor receives an argument it cannot wrap
 */
export class InputValidationError extends BaseError {
  readonly code = 'INPUT_VALIDATION_ERROR'

  constructor(
    message: string,
    public readonly suggestion: string,
    context?: Record<string, unknown>
  ) {
    super(message, context)
  }
}

/**
 * Error for configuration failures
 */
export class ConfigError extends BaseError {
  readonly code = 'CONFIG_ERROR'

  constructor(
    message: string,
    public readonly suggestion: string,
    context?: Record<string, unknown>
  ) {
    super(message, context)
  }
}
