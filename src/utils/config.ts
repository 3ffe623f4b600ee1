/**
 * Configuration management for the demo driver
 * Reads environment variables and validates them into a Result
 */

import type { Failure, Result } from '../types/result'
import { failure, isError, success } from '../types/result'
import { BaseError, ConfigError } from './errors'
import { LOG_LEVELS, type LogLevel, type Logger } from './logger'

/**
 * Configuration interface
 */
export interface Config {
  logLevel: LogLevel
  sampleSize: number // How many generated values the stream scenario processes
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG = {
  logLevel: 'info',
  sampleSize: 10,
} as const

const MAX_SAMPLE_SIZE = 1000

/**
 * Validates the configuration
 * @param config The configuration to validate
 * @returns Result containing the validated config, or a Failure caused by a ConfigError
 */
export function validateConfig(config: Config): Result<Config> {
  if (!LOG_LEVELS.includes(config.logLevel)) {
    return failure(
      new ConfigError(
        `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`,
        'Set LOG_LEVEL to debug, info, warn or error',
        { logLevel: config.logLevel }
      )
    )
  }

  if (
    !Number.isInteger(config.sampleSize) ||
    config.sampleSize < 1 ||
    config.sampleSize > MAX_SAMPLE_SIZE
  ) {
    return failure(
      new ConfigError(
        `DEMO_SAMPLE_SIZE must be an integer between 1 and ${MAX_SAMPLE_SIZE}`,
        'Set DEMO_SAMPLE_SIZE to a whole number of values to generate (e.g., 10)',
        { sampleSize: config.sampleSize }
      )
    )
  }

  return success(config)
}

/**
 * Loads configuration from environment variables
 * @returns Result containing config, or a Failure caused by a ConfigError
 */
export function getConfig(): Result<Config> {
  const rawLevel = process.env['LOG_LEVEL']
  const rawSampleSize = process.env['DEMO_SAMPLE_SIZE']

  const logLevel = LOG_LEVELS.find((level) => level === rawLevel?.toLowerCase())
  if (rawLevel && !logLevel) {
    return failure(
      new ConfigError(
        `Unknown LOG_LEVEL: ${rawLevel}`,
        'Set LOG_LEVEL to debug, info, warn or error',
        { logLevel: rawLevel }
      )
    )
  }

  const config: Config = {
    logLevel: logLevel ?? DEFAULT_CONFIG.logLevel,
    sampleSize: rawSampleSize ? Number(rawSampleSize) : DEFAULT_CONFIG.sampleSize,
  }

  return validateConfig(config)
}

/**
 * Log a configuration Failure with the structured error, suggestion included, as metadata
 * @param logger Logger to write to
 * @param failed The Failure returned by getConfig or validateConfig
 */
export function logConfigFailure(logger: Logger, failed: Failure): void {
  const cause = failed.cause
  logger.error(
    'config',
    failed.errorMessage(),
    isError(cause) ? cause : undefined,
    cause instanceof BaseError ? { ...cause.toStructuredError() } : undefined
  )
}
