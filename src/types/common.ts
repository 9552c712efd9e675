/**
 * Common Types
 *
 * Shared result and error types used across the invoker, runner and CLI.
 */

// Result Types
export type ApiErrorType =
  | 'rate_limit'
  | 'quota'
  | 'auth'
  | 'not_found'
  | 'network'
  | 'timeout'
  | 'server'
  | 'invalid_response'
  | 'invalid_request'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  /** Server-suggested wait before the next request, in milliseconds */
  readonly retryAfterMs?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }
