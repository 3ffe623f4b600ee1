export { bind, drain, lift, tap, transform } from './business/combinators'
export { Chain, chain, processEach, processEachConcurrently } from './business/pipeline'
export type { Failure, Result, Success } from './types/result'
export {
  CauseFailure,
  describeCause,
  failure,
  fromCaught,
  isError,
  isFailure,
  isSuccess,
  match,
  MessageFailure,
  success,
} from './types/result'
export { BaseError, ConfigError, InputValidationError } from './utils/errors'
export type { StructuredError } from './utils/errors'
export { getConfig, logConfigFailure, validateConfig } from './utils/config'
export type { Config } from './utils/config'
