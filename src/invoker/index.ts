/**
 * Service Invoker
 *
 * Performs one classification call for a work unit, validates the response
 * into a Verdict, and classifies every failure into the taxonomy:
 *
 * - rate_limited: quota or rate exhaustion, may carry a retry-after
 * - transient: network, timeout, server errors
 * - schema_invalid: a response arrived but is not a valid verdict
 * - fatal: configuration or authorization errors; aborts the pass
 *
 * The invoker never writes to the log.
 */

import type { ApiError, ApiErrorType, FailureKind, Sample, Verdict, WorkUnit } from '../types'
import { getApiKeyEnvVar, resolveModel, type ServiceProvider } from './models'
import { callProvider } from './providers'
import { parseVerdictResponse } from './response-parser'

export {
  DEFAULT_MODEL_ID,
  getApiKeyEnvVar,
  getRequiredApiKeyEnvVar,
  getRpmTable,
  getValidModelIds,
  type ModelInfo,
  resolveModel,
  type ServiceProvider
} from './models'
export { callProvider, DEFAULT_TIMEOUT_MS, type ProviderCallConfig } from './providers'
export { parseVerdictResponse, type VerdictParseResult } from './response-parser'

/** Raw responses stored on schema failures are cut to this length */
const MAX_RAW_RESPONSE_CHARS = 2000

export interface InvocationRequest {
  readonly unit: WorkUnit
  readonly sample: Sample
  /** Pre-formatted request text */
  readonly requestText: string
  readonly modelId: string
  readonly signal?: AbortSignal | undefined
}

export interface InvocationFailure {
  readonly kind: FailureKind
  readonly message: string
  readonly retryAfterMs?: number | undefined
  readonly rawResponse?: string | undefined
}

export type InvocationResult =
  | { readonly ok: true; readonly verdict: Verdict; readonly rawResponse: string }
  | { readonly ok: false; readonly failure: InvocationFailure }

/**
 * Anything that can judge a unit. The orchestrator depends only on this.
 */
export interface ServiceInvoker {
  invoke(request: InvocationRequest): Promise<InvocationResult>
}

export interface InvokerConfig {
  /** API keys by provider. Missing keys are read from the environment. */
  readonly apiKeys?: Partial<Record<ServiceProvider, string>> | undefined
  readonly temperature?: number | undefined
  readonly maxOutputTokens?: number | undefined
  readonly timeoutMs?: number | undefined
}

const FAILURE_KIND_BY_ERROR: Record<ApiErrorType, FailureKind> = {
  rate_limit: 'rate_limited',
  quota: 'rate_limited',
  network: 'transient',
  timeout: 'transient',
  server: 'transient',
  invalid_response: 'schema_invalid',
  auth: 'fatal',
  not_found: 'fatal',
  invalid_request: 'fatal'
}

/**
 * Map a provider ApiError onto the failure taxonomy.
 */
export function classifyApiError(error: ApiError): InvocationFailure {
  return {
    kind: FAILURE_KIND_BY_ERROR[error.type],
    message: error.message,
    retryAfterMs: error.retryAfterMs
  }
}

function fatal(message: string): InvocationResult {
  return { ok: false, failure: { kind: 'fatal', message } }
}

function resolveApiKey(
  provider: ServiceProvider,
  apiKeys: Partial<Record<ServiceProvider, string>>
): string | undefined {
  return apiKeys[provider] ?? process.env[getApiKeyEnvVar(provider)]
}

/**
 * Create an invoker backed by the HTTP provider clients.
 *
 * @example
 * ```ts
 * const invoker = createInvoker({ apiKeys: { gemini: process.env.GEMINI_API_KEY } })
 * const result = await invoker.invoke({ unit, sample, requestText, modelId: 'gemini-2.5-flash-lite' })
 * ```
 */
export function createInvoker(config: InvokerConfig = {}): ServiceInvoker {
  const apiKeys = config.apiKeys ?? {}

  return {
    async invoke(request: InvocationRequest): Promise<InvocationResult> {
      const model = resolveModel(request.modelId)
      if (!model) {
        return fatal(`Unknown model: ${request.modelId}`)
      }

      const apiKey = resolveApiKey(model.provider, apiKeys)
      if (!apiKey) {
        return fatal(`Missing API key: set ${getApiKeyEnvVar(model.provider)}`)
      }

      const response = await callProvider(request.requestText, {
        provider: model.provider,
        apiKey,
        apiModel: model.apiModel,
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        timeoutMs: config.timeoutMs,
        signal: request.signal
      })

      if (!response.ok) {
        return { ok: false, failure: classifyApiError(response.error) }
      }

      const parsed = parseVerdictResponse(response.value)
      if (!parsed.ok) {
        return {
          ok: false,
          failure: {
            kind: 'schema_invalid',
            message: `Invalid verdict: ${parsed.reason}`,
            rawResponse: parsed.rawText.slice(0, MAX_RAW_RESPONSE_CHARS)
          }
        }
      }

      return { ok: true, verdict: parsed.verdict, rawResponse: response.value }
    }
  }
}
