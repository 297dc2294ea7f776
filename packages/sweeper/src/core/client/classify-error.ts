import { errorChain } from "@mpusweep/errors"

export type StorageErrorClass = "not_found" | "retryable" | "fatal"

const NOT_FOUND_NAMES = new Set(["NoSuchBucket", "NoSuchUpload", "NoSuchKey", "NotFound"])

export const RETRYABLE_TOKENS = [
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalError",
  "SlowDown",
  "TooManyRequests",
  "RequestTimeTooSkewed",
] as const

const TRANSIENT_NETWORK_CODES = new Set([
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
])

const TIMEOUT_NAMES = new Set(["TimeoutError", "RequestTimeoutException"])

function isTransientNetworkError(error: Error): boolean {
  if (TIMEOUT_NAMES.has(error.name)) return true

  return "code" in error && typeof error.code === "string" && TRANSIENT_NETWORK_CODES.has(error.code)
}

function hasRetryableToken(error: Error): boolean {
  const text = `${error.name}: ${error.message}`
  return RETRYABLE_TOKENS.some((token) => text.includes(token))
}

/**
 * Three-way split of provider failures, looking through wrapped causes.
 * A missing resource wins over anything retryable further down the chain.
 */
export function classifyStorageError(error: unknown): StorageErrorClass {
  const links = errorChain(error).filter((link): link is Error => link instanceof Error)

  if (links.some((link) => NOT_FOUND_NAMES.has(link.name))) return "not_found"
  if (links.some((link) => isTransientNetworkError(link) || hasRetryableToken(link))) {
    return "retryable"
  }

  return "fatal"
}
