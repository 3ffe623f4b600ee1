/**
 * Combinators that lift plain functions onto the two-track Result
 * Faults thrown by lifted functions become Failures; faults thrown by handlers propagate
 */

import type { Failure, Result } from '../types/result'
import { fromCaught, success } from '../types/result'

/**
 * Turn a plain function into one returning a Result
 * Anything `fn` throws, Error or not, is captured as a Failure holding the thrown value
 * @param fn Function to lift
 * @returns Function yielding `success(fn(p))`, or a Failure if `fn` throws
 */
export function lift<P, R>(fn: (p: P) => R): (p: P) => Result<R> {
  return (p) => {
    try {
      return success(fn(p))
    } catch (error) {
      return fromCaught(error)
    }
  }
}

/**
 * Apply a plain function to the Success track
 * A Failure is returned as the very same object, so its message and cause are untouched
 * @param fn Function applied to the carried value
 */
export function transform<P, R>(fn: (p: P) => R): (result: Result<P>) => Result<R> {
  const lifted = lift(fn)
  return (result) => (result.ok ? lifted(result.value) : result)
}

/**
 * Chain a stage that already returns a Result, such as a validator
 */
export function bind<P, R>(fn: (p: P) => Result<R>): (result: Result<P>) => Result<R> {
  return (result) => {
    if (!result.ok) return result

    try {
      return fn(result.value)
    } catch (error) {
      return fromCaught(error)
    }
  }
}

/**
 * Terminal consumer: route a Result to exactly one of two handlers
 * Handler faults are not caught
 * @param onSuccess Called with the carried value on the Success track
 * @param onFailure Called with the Failure otherwise
 */
export function drain<P>(
  onSuccess: (value: P) => void,
  onFailure: (failure: Failure) => void
): (result: Result<P>) => void {
  return (result) => {
    if (result.ok) {
      onSuccess(result.value)
    } else {
      onFailure(result)
    }
  }
}

/**
 * Inline consumer: like `drain`, then hands the same Result on down the chain
 */
export function tap<P>(
  onSuccess: (value: P) => void,
  onFailure: (failure: Failure) => void
): (result: Result<P>) => Result<P> {
  const consume = drain(onSuccess, onFailure)
  return (result) => {
    consume(result)
    return result
  }
}
