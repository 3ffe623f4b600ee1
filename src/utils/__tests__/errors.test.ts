import { describe, expect, it } from 'vitest'
import { BaseError, ConfigError, InputValidationError } from '../errors'

describe('errors', () => {
  describe('InputValidationError', () => {
    it('should carry its code, suggestion and class name', () => {
      // Act
      const error = new InputValidationError('Failure message must not be empty', 'Pass a message')

      // Assert
      expect(error).toBeInstanceOf(BaseError)
      expect(error).toBeInstanceOf(Error)
      expect(error.name).toBe('InputValidationError')
      expect(error.code).toBe('INPUT_VALIDATION_ERROR')
      expect(error.suggestion).toBe('Pass a message')
    })
  })

  describe('toStructuredError', () => {
    it('should include context only when present', () => {
      // Arrange
      const withContext = new ConfigError('Unknown LOG_LEVEL: loud', 'Set LOG_LEVEL', {
        logLevel: 'loud',
      })
      const withoutContext = new ConfigError('Bad config', 'Fix it')

      // Act
      const structured = withContext.toStructuredError()
      const bare = withoutContext.toStructuredError()

      // Assert
      expect(structured).toEqual({
        code: 'CONFIG_ERROR',
        message: 'Unknown LOG_LEVEL: loud',
        suggestion: 'Set LOG_LEVEL',
        timestamp: withContext.timestamp,
        context: { logLevel: 'loud' },
      })
      expect(bare).not.toHaveProperty('context')
      expect(Number.isNaN(Date.parse(bare.timestamp))).toBe(false)
    })
  })
})
