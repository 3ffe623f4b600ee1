import { describe, expect, it } from 'vitest'
import { chain, drain, failure, lift, processEach, success, transform } from '../index'

describe('package entry point', () => {
  it('should compose the public API end to end', () => {
    // Arrange
    const printed: string[] = []
    const halve = chain(
      lift((value: number) => {
        if (value % 2 !== 0) throw new Error(`Cannot halve ${value}`)
        return value / 2
      })
    )
      .andThen(transform((half: number) => `half=${half}`))
      .andThen(
        drain(
          (text: string) => printed.push(text),
          (failed) => printed.push(failed.errorMessage())
        )
      )

    // Act
    processEach([4, 7], halve.toFunction())

    // Assert
    expect(printed).toEqual(['half=2', 'Error: Cannot halve 7'])
  })

  it('should export both constructors', () => {
    // Act & Assert
    expect(success('Jim').toString()).toBe('Success(Jim)')
    expect(failure('bad input').toString()).toBe('Failure(bad input)')
  })
})
