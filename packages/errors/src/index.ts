export {
  BaseError,
  type BaseErrorOptions,
  describeError,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { AbortedError, type AbortedErrorCode } from "./core/kinds/aborted-error"
export {
  PARTIAL_FAILURE_SAMPLE_LIMIT,
  PartialFailureError,
  type PartialFailureErrorCode,
} from "./core/kinds/partial-failure-error"
export {
  RetryExhaustedError,
  type RetryExhaustedErrorCode,
} from "./core/kinds/retry-exhausted-error"
export { ValidationError, type ValidationErrorCode } from "./core/kinds/validation-error"
export { errorChain, findInChain } from "./core/utils/error-chain"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
