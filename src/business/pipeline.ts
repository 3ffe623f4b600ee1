/**
 * Pipeline helpers for composing lifted stages and running them over many inputs
 */

/**
 * A function composed left to right, built once and applied many times
 */
export class Chain<I, O> {
  constructor(private readonly fn: (input: I) => O) {}

  /**
   * Append a stage that receives this chain's output
   */
  andThen<N>(next: (value: O) => N): Chain<I, N> {
    const fn = this.fn
    return new Chain((input: I) => next(fn(input)))
  }

  apply(input: I): O {
    return this.fn(input)
  }

  /**
   * The chain as a plain function, for use with `map`, `forEach` and the like
   */
  toFunction(): (input: I) => O {
    return (input) => this.fn(input)
  }
}

/**
 * Start a chain from its first stage
 */
export function chain<I, O>(first: (input: I) => O): Chain<I, O> {
  return new Chain(first)
}

/**
 * Apply a stage to each input independently
 * @param inputs Elements to process
 * @param stage Usually a chain of lifted functions; a Failure for one element never reaches another
 * @returns One output per input, in input order
 */
export function processEach<I, O>(inputs: Iterable<I>, stage: (input: I) => O): O[] {
  return Array.from(inputs, (input) => stage(input))
}

/**
 * Schedule the stage for every input as its own task
 * Completion order between elements is unspecified; outputs are collected in input order
 * @param inputs Elements to process
 * @param stage Stage to run per element, synchronous or asynchronous
 */
export function processEachConcurrently<I, O>(
  inputs: Iterable<I>,
  stage: (input: I) => O | PromiseLike<O>
): Promise<Awaited<O>[]> {
  return Promise.all(Array.from(inputs, (input) => Promise.resolve().then(() => stage(input))))
}
