/**
 * Model Resolution
 *
 * Maps simple model IDs to providers, API model names and request ceilings.
 */

/** Provider type for classification APIs. */
export type ServiceProvider = 'gemini' | 'openai' | 'anthropic' | 'openrouter'

export interface ModelInfo {
  readonly provider: ServiceProvider
  readonly apiModel: string
  /** Provider-enforced requests per minute */
  readonly rpm: number
  readonly description: string
}

/**
 * Model ID to provider/API model mapping.
 * Simple convention: model ID determines provider.
 */
const MODEL_MAP: Record<string, ModelInfo> = {
  'gemini-2.5-flash-lite': {
    provider: 'gemini',
    apiModel: 'gemini-2.5-flash-lite',
    rpm: 15,
    description: 'Gemini 2.5 Flash Lite'
  },
  'gemini-2.5-flash': {
    provider: 'gemini',
    apiModel: 'gemini-2.5-flash',
    rpm: 10,
    description: 'Gemini 2.5 Flash'
  },
  'gemini-1.5-flash': {
    provider: 'gemini',
    apiModel: 'gemini-1.5-flash-latest',
    rpm: 15,
    description: 'Gemini 1.5 Flash (Latest)'
  },
  'gemini-1.5-pro': {
    provider: 'gemini',
    apiModel: 'gemini-1.5-pro-latest',
    rpm: 2,
    description: 'Gemini 1.5 Pro (Latest)'
  },
  'gemini-2.5-flash-or': {
    provider: 'openrouter',
    apiModel: 'google/gemini-2.5-flash',
    rpm: 20,
    description: 'Gemini 2.5 Flash via OpenRouter'
  },
  'haiku-4.5': {
    provider: 'anthropic',
    apiModel: 'claude-haiku-4-5',
    rpm: 50,
    description: 'Claude Haiku 4.5'
  },
  'gpt-5-mini': {
    provider: 'openai',
    apiModel: 'gpt-5-mini',
    rpm: 500,
    description: 'GPT-5 mini'
  }
}

export const DEFAULT_MODEL_ID = 'gemini-2.5-flash-lite'

/**
 * Get all valid model IDs.
 */
export function getValidModelIds(): string[] {
  return Object.keys(MODEL_MAP)
}

/**
 * Resolve a simple model ID to provider, API model and RPM.
 * @param modelId Simple model ID (e.g., 'gemini-2.5-flash-lite', 'haiku-4.5')
 * @returns Model info, or null if unknown
 */
export function resolveModel(modelId: string): ModelInfo | null {
  return MODEL_MAP[modelId] ?? null
}

/**
 * Built-in RPM table for the rate limiter.
 */
export function getRpmTable(): Record<string, number> {
  return Object.fromEntries(Object.entries(MODEL_MAP).map(([id, info]) => [id, info.rpm]))
}

/**
 * Environment variable holding the API key for a provider.
 */
export function getApiKeyEnvVar(provider: ServiceProvider): string {
  switch (provider) {
    case 'gemini':
      return 'GEMINI_API_KEY'
    case 'openrouter':
      return 'OPENROUTER_API_KEY'
    case 'anthropic':
      return 'ANTHROPIC_API_KEY'
    case 'openai':
      return 'OPENAI_API_KEY'
  }
}

/**
 * Get the required API key environment variable for a model.
 */
export function getRequiredApiKeyEnvVar(modelId: string): string | null {
  const resolved = resolveModel(modelId)
  return resolved ? getApiKeyEnvVar(resolved.provider) : null
}
