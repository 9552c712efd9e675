/**
 * HTTP Utilities
 *
 * Typed fetch wrapper plus uniform mapping of HTTP and network failures
 * onto ApiError, shared by all provider clients.
 */

import type { Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Check if HTTP requests should be blocked.
 * True when running tests in CI, or when LABEL_SWEEP_OFFLINE=true.
 */
function shouldBlockHttpRequests(): boolean {
  return (isCI() && isTestMode()) || process.env.LABEL_SWEEP_OFFLINE === 'true'
}

/**
 * Error thrown when an HTTP request is made while requests are blocked.
 */
export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    const reason = isCI() && isTestMode() ? 'running tests in CI' : 'LABEL_SWEEP_OFFLINE=true'
    super(`HTTP request to ${url} blocked: ${reason}.`)
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when HTTP requests are blocked
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

export interface RequestSignal {
  readonly signal: AbortSignal
  /** True once the per-request timeout has fired */
  readonly timedOut: () => boolean
  readonly dispose: () => void
}

/**
 * Combine a per-request timeout with an optional caller signal.
 * Call dispose() when the request settles to clear the timer.
 */
export function createRequestSignal(timeoutMs: number, outer?: AbortSignal): RequestSignal {
  const controller = new AbortController()
  let timedOut = false

  const timer = setTimeout(() => {
    timedOut = true
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`))
  }, timeoutMs)

  const onOuterAbort = (): void => controller.abort(outer?.reason)
  if (outer?.aborted) {
    controller.abort(outer.reason)
  } else {
    outer?.addEventListener('abort', onOuterAbort, { once: true })
  }

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer)
      outer?.removeEventListener('abort', onOuterAbort)
    }
  }
}

/** `"retryDelay": "27s"` in a JSON error body */
const RETRY_DELAY_JSON = /"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/
/** `retry_delay { seconds: 27 }` in a text-format error */
const RETRY_DELAY_PROTO = /retry_delay\s*\{\s*seconds:\s*(\d+)/

/**
 * Parse a retry hint into milliseconds.
 *
 * Accepts a Retry-After header (delta seconds or HTTP date) and falls back to a
 * `"retryDelay": "27s"` hint inside the error body.
 */
export function parseRetryAfterMs(
  header: string | null,
  body: string,
  now: number = Date.now()
): number | undefined {
  if (header) {
    const trimmed = header.trim()
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
      return Math.round(Number.parseFloat(trimmed) * 1000)
    }
    const date = Date.parse(trimmed)
    if (!Number.isNaN(date)) {
      return Math.max(0, date - now)
    }
  }

  const bodyMatch = body.match(RETRY_DELAY_JSON) ?? body.match(RETRY_DELAY_PROTO)
  if (bodyMatch?.[1]) {
    return Math.round(Number.parseFloat(bodyMatch[1]) * 1000)
  }

  return undefined
}

const INVALID_KEY_PATTERN = /API[_ ]KEY[_ ]INVALID|API key not valid|invalid[_ ]api[_ ]key/i
const QUOTA_PATTERN = /RESOURCE_EXHAUSTED|quota/i

/**
 * Handle HTTP error responses uniformly across all provider clients.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()
  const status = response.status

  if (status === 429) {
    const retryAfterMs = parseRetryAfterMs(response.headers.get('retry-after'), errorText)
    return {
      ok: false,
      error: {
        type: QUOTA_PATTERN.test(errorText) ? 'quota' : 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfterMs
      }
    }
  }

  if (status === 401 || status === 403 || (status === 400 && INVALID_KEY_PATTERN.test(errorText))) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  if (status === 404) {
    return { ok: false, error: { type: 'not_found', message: `Not found: ${errorText}` } }
  }

  if (status === 408) {
    return { ok: false, error: { type: 'timeout', message: `Request timeout: ${errorText}` } }
  }

  if (status >= 500) {
    return {
      ok: false,
      error: { type: 'server', message: `API error ${status}: ${errorText}` }
    }
  }

  return {
    ok: false,
    error: { type: 'invalid_request', message: `API error ${status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all provider clients.
 */
export function handleNetworkError(error: unknown, timedOut = false): Result<never> {
  // Blocking is a configuration state; retrying cannot get the request through
  if (error instanceof BlockedHttpRequestError) {
    return { ok: false, error: { type: 'invalid_request', message: error.message } }
  }
  const message = error instanceof Error ? error.message : String(error)
  if (timedOut) {
    return { ok: false, error: { type: 'timeout', message: `Timeout: ${message}` } }
  }
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}
