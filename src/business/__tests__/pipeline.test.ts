import { describe, expect, it, vi } from 'vitest'
import type { Failure, Result } from '../../types/result'
import { failure, success } from '../../types/result'
import { drain, lift, tap, transform } from '../combinators'
import { chain, processEach, processEachConcurrently } from '../pipeline'

const evenOnly = (value: number): Result<number> =>
  value % 2 === 0 ? success(value) : failure('Could not get an odd value')

describe('pipeline', () => {
  describe('chain', () => {
    it('should compose stages left to right', () => {
      // Arrange
      const pipeline = chain((value: number) => value + 1)
        .andThen((value) => value * 10)
        .andThen((value) => `#${value}`)

      // Act & Assert
      expect(pipeline.apply(1)).toBe('#20')
      expect(pipeline.apply(4)).toBe('#50')
    })

    it('should leave the original chain unchanged when extended', () => {
      // Arrange
      const base = chain((value: number) => value * 2)

      // Act
      const extended = base.andThen((value) => value + 1)

      // Assert
      expect(base.apply(3)).toBe(6)
      expect(extended.apply(3)).toBe(7)
    })

    it('should stop calling lifted stages after the first Failure', () => {
      // Arrange
      const second = vi.fn((value: number) => value + 1)
      const third = vi.fn((value: number) => String(value))
      const seen: string[] = []
      const pipeline = chain(
        lift((text: string) => {
          const value = Number.parseInt(text, 10)
          if (Number.isNaN(value)) throw new Error(`Not a number: ${text}`)
          return value
        })
      )
        .andThen(transform(second))
        .andThen(transform(third))
        .andThen(
          tap(
            (value: string) => seen.push(`ok ${value}`),
            (failed) => seen.push(`failed ${failed.errorMessage()}`)
          )
        )

      // Act
      const result = pipeline.apply('abc')

      // Assert
      expect(result.asFailure()?.errorMessage()).toBe('Error: Not a number: abc')
      expect(second).not.toHaveBeenCalled()
      expect(third).not.toHaveBeenCalled()
      expect(seen).toEqual(['failed Error: Not a number: abc'])
    })

    it('should expose the chain as a plain function', () => {
      // Arrange
      const toText = chain(evenOnly).andThen(transform((value: number) => String(value)))

      // Act
      const results = [2, 3].map(toText.toFunction())

      // Assert
      expect(results.map((result) => result.toString())).toEqual([
        'Success(2)',
        'Failure(Could not get an odd value)',
      ])
    })
  })

  describe('processEach', () => {
    it('should isolate each element from its siblings', () => {
      // Arrange
      const successes: string[] = []
      const failures: Failure[] = []
      const toText = chain(evenOnly).andThen(transform((value: number) => String(value)))
      const printed = toText.andThen(
        tap(
          (value: string) => successes.push(value),
          (failed) => failures.push(failed)
        )
      )

      // Act
      const results = processEach([2, 3, 4], printed.toFunction())

      // Assert
      expect(results.map((result) => result.toString())).toEqual([
        'Success(2)',
        'Failure(Could not get an odd value)',
        'Success(4)',
      ])
      expect(successes).toEqual(['2', '4'])
      expect(failures.map((failed) => failed.errorMessage())).toEqual([
        'Could not get an odd value',
      ])
    })

    it('should accept any iterable', () => {
      // Arrange
      const inputs = new Set([1, 2])

      // Act
      const results = processEach(inputs, evenOnly)

      // Assert
      expect(results.map((result) => result.ok)).toEqual([false, true])
    })

    it('should let a terminal handler fault escape', () => {
      // Arrange
      const consume = drain(
        (value: number) => {
          if (value === 4) throw new Error('printer jammed')
        },
        () => {}
      )

      // Act & Assert
      expect(() => processEach([2, 4], chain(evenOnly).andThen(consume).toFunction())).toThrow(
        'printer jammed'
      )
    })
  })

  describe('processEachConcurrently', () => {
    it('should collect outputs in input order whatever the completion order', async () => {
      // Arrange
      const completed: number[] = []
      const slowFirst = (value: number): Promise<Result<string>> =>
        new Promise((resolve) => {
          setTimeout(
            () => {
              completed.push(value)
              resolve(transform((even: number) => String(even))(evenOnly(value)))
            },
            value === 2 ? 20 : 0
          )
        })

      // Act
      const results = await processEachConcurrently([2, 3, 4], slowFirst)

      // Assert
      expect(completed[completed.length - 1]).toBe(2)
      expect(results.map((result) => result.toString())).toEqual([
        'Success(2)',
        'Failure(Could not get an odd value)',
        'Success(4)',
      ])
    })

    it('should run synchronous stages as separate tasks', async () => {
      // Act
      const results = await processEachConcurrently([1, 2], evenOnly)

      // Assert
      expect(results.map((result) => result.ok)).toEqual([false, true])
    })

    it('should reject when a stage throws outside the Result boundary', async () => {
      // Arrange
      const stage = (value: number): Result<number> => {
        if (value > 1) throw new Error('stage exploded')
        return success(value)
      }

      // Act & Assert
      await expect(processEachConcurrently([1, 2], stage)).rejects.toThrow('stage exploded')
    })
  })
})
