/**
 * AI Provider API Clients
 *
 * HTTP clients for Gemini, Anthropic, OpenAI and OpenRouter.
 * Each returns the raw response text; parsing happens in the invoker.
 */

import {
  createRequestSignal,
  emptyResponseError,
  type HttpResponse,
  handleHttpError,
  handleNetworkError,
  httpFetch
} from '../http'
import type { Result } from '../types'
import type { ServiceProvider } from './models'

export const DEFAULT_TIMEOUT_MS = 60_000
export const DEFAULT_TEMPERATURE = 0.7
export const DEFAULT_MAX_OUTPUT_TOKENS = 2048

export interface ProviderCallConfig {
  readonly provider: ServiceProvider
  readonly apiKey: string
  readonly apiModel: string
  readonly temperature?: number | undefined
  readonly maxOutputTokens?: number | undefined
  readonly timeoutMs?: number | undefined
  /** Caller cancellation; combined with the per-request timeout */
  readonly signal?: AbortSignal | undefined
}

interface GeminiResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> }
    finishReason?: string
  }>
}

interface AnthropicResponse {
  content: Array<{ type: string; text: string }>
}

interface OpenAIResponse {
  choices: Array<{ message: { content: string | null } }>
}

type ResponseReader = (response: HttpResponse) => Promise<string | undefined>

/**
 * POST a JSON body and extract text, mapping every failure onto ApiError.
 */
async function postForText(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  config: ProviderCallConfig,
  readText: ResponseReader
): Promise<Result<string>> {
  const request = createRequestSignal(config.timeoutMs ?? DEFAULT_TIMEOUT_MS, config.signal)

  try {
    const response = await httpFetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: request.signal
    })

    if (!response.ok) return await handleHttpError(response)

    const text = await readText(response)
    return text ? { ok: true, value: text } : emptyResponseError()
  } catch (error) {
    if (error instanceof SyntaxError) {
      return {
        ok: false,
        error: { type: 'invalid_response', message: `Malformed API response: ${error.message}` }
      }
    }
    return handleNetworkError(error, request.timedOut())
  } finally {
    request.dispose()
  }
}

/**
 * Call the Gemini generateContent API.
 */
async function callGemini(prompt: string, config: ProviderCallConfig): Promise<Result<string>> {
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(config.apiModel)}:generateContent`

  return postForText(
    url,
    { 'x-goog-api-key': config.apiKey },
    {
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: {
        temperature: config.temperature ?? DEFAULT_TEMPERATURE,
        topP: 0.8,
        topK: 40,
        maxOutputTokens: config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        responseMimeType: 'application/json'
      }
    },
    config,
    async (response) => {
      const data = (await response.json()) as GeminiResponse
      const parts = data.candidates?.[0]?.content?.parts ?? []
      return parts.map((p) => p.text ?? '').join('')
    }
  )
}

/**
 * Call Anthropic Claude API.
 */
async function callAnthropic(prompt: string, config: ProviderCallConfig): Promise<Result<string>> {
  return postForText(
    'https://api.anthropic.com/v1/messages',
    { 'x-api-key': config.apiKey, 'anthropic-version': '2023-06-01' },
    {
      model: config.apiModel,
      max_tokens: config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
      temperature: config.temperature ?? DEFAULT_TEMPERATURE,
      messages: [{ role: 'user', content: prompt }]
    },
    config,
    async (response) => {
      const data = (await response.json()) as AnthropicResponse
      return data.content[0]?.text
    }
  )
}

/**
 * Call OpenAI-compatible API (OpenAI or OpenRouter).
 */
async function callOpenAICompatible(
  url: string,
  prompt: string,
  config: ProviderCallConfig
): Promise<Result<string>> {
  return postForText(
    url,
    { Authorization: `Bearer ${config.apiKey}` },
    {
      model: config.apiModel,
      messages: [{ role: 'user', content: prompt }],
      max_completion_tokens: config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
      response_format: { type: 'json_object' }
    },
    config,
    async (response) => {
      const data = (await response.json()) as OpenAIResponse
      return data.choices[0]?.message?.content ?? undefined
    }
  )
}

/**
 * Call a single AI provider and return its raw text.
 */
export async function callProvider(
  prompt: string,
  config: ProviderCallConfig
): Promise<Result<string>> {
  switch (config.provider) {
    case 'gemini':
      return callGemini(prompt, config)
    case 'anthropic':
      return callAnthropic(prompt, config)
    case 'openai':
      return callOpenAICompatible('https://api.openai.com/v1/chat/completions', prompt, config)
    case 'openrouter':
      return callOpenAICompatible('https://openrouter.ai/api/v1/chat/completions', prompt, config)
    default:
      return {
        ok: false,
        error: { type: 'invalid_request', message: `Unknown provider: ${String(config.provider)}` }
      }
  }
}
