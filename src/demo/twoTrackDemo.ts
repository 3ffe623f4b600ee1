/**
 * Console walkthrough of the two-track Result
 * Three scenarios: an imperative check, a chain of lifted functions, and a stream of inputs
 */

import { randomInt } from 'node:crypto'
import { drain, lift, tap, transform } from '../business/combinators'
import { chain, processEachConcurrently } from '../business/pipeline'
import type { Failure, Result } from '../types/result'
import { failure, success } from '../types/result'
import type { Config } from '../utils/config'
import { Logger } from '../utils/logger'

export type LineWriter = (line: string) => void

export interface DemoOptions {
  write?: LineWriter
  logger?: Logger
  now?: () => Date
  values?: readonly number[]
}

// Timestamps between the epoch and 2100-01-01
const MAX_GENERATED_TIMESTAMP = 4_102_444_800_000

const ODD_VALUE_MESSAGE = 'Could not get an odd value'

/**
 * Produce the current date, or a Failure when asked to fail
 */
export function doSomethingWithFailure(
  shouldSucceed: boolean,
  now: () => Date = () => new Date()
): Result<Date> {
  return shouldSucceed ? success(now()) : failure('Got a failure')
}

/**
 * Inspect each Result imperatively through its accessors
 */
export function simpleSucceedOrFail(write: LineWriter, now?: () => Date): void {
  const succeeded = doSomethingWithFailure(true, now).asSuccess()
  if (succeeded) {
    write(`Success: ${succeeded.get().toISOString()}`)
  }

  const failed = doSomethingWithFailure(false, now).asFailure()
  if (failed) {
    write(`Failed: ${failed.errorMessage()}`)
  }
}

/**
 * Build a chain once and apply it to both a succeeding and a failing input
 */
export function seriesOfFunctions(write: LineWriter, now: () => Date = () => new Date()): void {
  const dateAsString = chain(
    lift((shouldSucceed: boolean) => {
      if (shouldSucceed) return now()
      throw new Error('Could not get Date')
    })
  ).andThen(transform((date: Date) => date.toISOString()))

  const printed = dateAsString.andThen(tap(goodPrinter(write), boomPrinter(write)))

  printed.apply(true)
  printed.apply(false)
}

/**
 * Push every value through validate, transform and print stages, each value on its own task
 */
export async function usingStreams(
  values: readonly number[],
  write: LineWriter,
  logger: Logger
): Promise<void> {
  // only even values are allowed through
  const validator = (value: number): Result<number> =>
    value % 2 === 0 ? success(value) : failure(ODD_VALUE_MESSAGE)

  const wiretap = tap(
    (value: string) => logger.debug('demo-stream', `Seeing ${value} pass by`),
    (failed) => logger.debug('demo-stream', `Seeing ${failed.toString()} pass by`)
  )

  const stream = chain(validator)
    .andThen(transform((timestamp: number) => new Date(timestamp)))
    .andThen(transform((date: Date) => date.toISOString()))
    .andThen(wiretap)
    .andThen(drain(goodPrinter(write), boomPrinter(write)))

  await processEachConcurrently(values, stream.toFunction())
}

/**
 * Random timestamps for the stream scenario
 */
export function generateValues(count: number): number[] {
  return Array.from({ length: count }, () => randomInt(MAX_GENERATED_TIMESTAMP))
}

/**
 * Run all three scenarios in order
 */
export async function runDemo(config: Config, options: DemoOptions = {}): Promise<void> {
  const write = options.write ?? ((line: string) => console.log(line))
  const logger = options.logger ?? new Logger({ level: config.logLevel })
  const values = options.values ?? generateValues(config.sampleSize)

  logger.info('demo', 'Running two-track demo', { sampleSize: values.length })

  simpleSucceedOrFail(write, options.now)
  seriesOfFunctions(write, options.now)
  await usingStreams(values, write, logger)

  logger.info('demo', 'Two-track demo finished')
}

function goodPrinter(write: LineWriter): (value: string) => void {
  return (value) => write(`Good: ${value}`)
}

function boomPrinter(write: LineWriter): (failure: Failure) => void {
  return (failed) => write(`Boom: ${failed.errorMessage()}`)
}
