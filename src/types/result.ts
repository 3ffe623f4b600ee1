/**
 * Two-track Result type
 * A Result is exactly one of a Success carrying a value or a Failure carrying a diagnostic message
 */

import { types } from 'node:util'
import { InputValidationError } from '../utils/errors'

const UNKNOWN_FAULT_MESSAGE = 'Unknown error'

/**
 * The Success track: carries the value produced by a pipeline stage
 */
export interface Success<T> {
  readonly ok: true
  readonly value: T
  /**
   * The carried value, which may legitimately be null or undefined when T allows it
   */
  get(): T
  asSuccess(): Success<T>
  asFailure(): undefined
  toString(): string
}

/**
 * The Failure track: carries a non-empty diagnostic message and, for caught faults, the fault itself
 */
export interface Failure {
  readonly ok: false
  readonly cause?: unknown
  errorMessage(): string
  asSuccess(): undefined
  asFailure(): Failure
  toString(): string
}

/**
 * Result type that represents either a Success with a value or a Failure with a message
 */
export type Result<T> = Success<T> | Failure

class SuccessValue<T> implements Success<T> {
  readonly ok = true as const

  constructor(readonly value: T) {
    Object.freeze(this)
  }

  get(): T {
    return this.value
  }

  asSuccess(): Success<T> {
    return this
  }

  asFailure(): undefined {
    return undefined
  }

  toString(): string {
    return `Success(${String(this.value)})`
  }
}

/**
 * Failure for an explicit rejection, such as a validator turning a value away
 */
export class MessageFailure implements Failure {
  readonly ok = false as const
  readonly cause = undefined

  constructor(private readonly message: string) {
    Object.freeze(this)
  }

  errorMessage(): string {
    return this.message
  }

  asSuccess(): undefined {
    return undefined
  }

  asFailure(): Failure {
    return this
  }

  toString(): string {
    return `Failure(${this.message})`
  }
}

/**
 * Failure for a fault caught at a function-call boundary
 * The message is derived from the fault once, at construction
 */
export class CauseFailure implements Failure {
  readonly ok = false as const
  private readonly message: string

  constructor(readonly cause: unknown) {
    this.message = describeCause(cause)
    Object.freeze(this)
  }

  errorMessage(): string {
    return this.message
  }

  /**
   * The fault followed by every predecessor linked through `Error.cause`
   */
  causeChain(): unknown[] {
    const chain: unknown[] = []
    const seen = new Set<unknown>()
    let current: unknown = this.cause

    while (!seen.has(current)) {
      chain.push(current)
      seen.add(current)
      if (!isError(current) || current.cause === undefined) break
      current = current.cause
    }

    return chain
  }

  asSuccess(): undefined {
    return undefined
  }

  asFailure(): Failure {
    return this
  }

  toString(): string {
    return `Failure(${this.message})`
  }
}

/**
 * True for Error instances from this realm and native errors from any other (vm contexts, workers)
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value)
}

/**
 * Describe a thrown value the way it would print: `Name: message` for errors
 * Never throws; faults raised while reading the value fall back to a generic message
 */
export function describeCause(cause: unknown): string {
  let text: string
  try {
    text = isError(cause) ? describeError(cause) : String(cause)
  } catch {
    // throwing getters, objects without a string form
    return UNKNOWN_FAULT_MESSAGE
  }
  return text.length > 0 ? text : UNKNOWN_FAULT_MESSAGE
}

function describeError(error: Error): string {
  const name = error.name ? String(error.name) : ''
  const message = error.message ? String(error.message) : ''
  if (!message) return name
  return name ? `${name}: ${message}` : message
}

/**
 * Create a successful Result
 * @param value The value to carry, absent values included
 */
export function success<T>(value: T): Success<T> {
  return new SuccessValue(value)
}

/**
 * Create a failed Result
 * @param messageOrCause A non-empty rejection message, or the Error that caused the failure
 * @throws InputValidationError when given an empty message or something that is neither a string nor an Error
 */
export function failure(message: string): Failure
export function failure(cause: Error): Failure
export function failure(messageOrCause: string | Error): Failure
export function failure(messageOrCause: string | Error): Failure {
  if (typeof messageOrCause === 'string') {
    if (messageOrCause.length === 0) {
      throw new InputValidationError(
        'Failure message must not be empty',
        'Pass a message describing why the value was rejected'
      )
    }
    return new MessageFailure(messageOrCause)
  }

  if (isError(messageOrCause)) {
    return new CauseFailure(messageOrCause)
  }

  throw new InputValidationError(
    `failure() expects a message or an Error, received ${describeType(messageOrCause)}`,
    'Pass a non-empty string or an Error instance',
    { receivedType: describeType(messageOrCause) }
  )
}

/**
 * Wrap any thrown value, Error or not, in a Failure
 */
export function fromCaught(thrown: unknown): Failure {
  return new CauseFailure(thrown)
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.ok
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.ok
}

/**
 * Fold a Result into a single value by branching on its track
 * @param result The Result to inspect
 * @param branches Handler per track; exactly one is called
 * @returns Whatever the chosen handler returns
 */
export function match<T, U>(
  result: Result<T>,
  branches: { success: (value: T) => U; failure: (failure: Failure) => U }
): U {
  return result.ok ? branches.success(result.value) : branches.failure(result)
}

function describeType(value: unknown): string {
  return value === null ? 'null' : typeof value
}
