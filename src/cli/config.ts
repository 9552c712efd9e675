/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/label-sweep/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or LABEL_SWEEP_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { DEFAULT_MODEL_ID, DEFAULT_TIMEOUT_MS } from '../invoker'
import { DEFAULT_RPM, DEFAULT_SAFETY_FACTOR } from '../rate-limit'

type StringKey = 'model' | 'logDir'
type NumberKey =
  | 'runs'
  | 'safetyFactor'
  | 'defaultRpm'
  | 'maxInPassRetries'
  | 'requestTimeoutMs'
  | 'temperature'
type BooleanKey = 'honorRetryAfter'
type RpmTableKey = 'rpmOverrides'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Model ID from the built-in model table */
  model?: string | undefined
  /** Directory for result logs */
  logDir?: string | undefined
  /** Runs per sample */
  runs?: number | undefined
  /** Multiplier over the theoretical request interval */
  safetyFactor?: number | undefined
  /** RPM for models without a table entry */
  defaultRpm?: number | undefined
  /** Extra attempts per unit within one pass */
  maxInPassRetries?: number | undefined
  /** Per-request timeout */
  requestTimeoutMs?: number | undefined
  temperature?: number | undefined
  /** Wait out server retry-after hints */
  honorRetryAfter?: boolean | undefined
  /** RPM by model ID, overriding the model table */
  rpmOverrides?: Record<string, number> | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

/** Config keys that accept string values */
const STRING_KEYS: readonly StringKey[] = ['model', 'logDir']
/** Config keys that accept number values */
const NUMBER_KEYS: readonly NumberKey[] = [
  'runs',
  'safetyFactor',
  'defaultRpm',
  'maxInPassRetries',
  'requestTimeoutMs',
  'temperature'
]
/** Config keys that accept boolean values */
const BOOLEAN_KEYS: readonly BooleanKey[] = ['honorRetryAfter']
/** Config keys that accept model=rpm lists */
const RPM_TABLE_KEYS: readonly RpmTableKey[] = ['rpmOverrides']

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  model: `Model to run, or a comma list run in order (default: ${DEFAULT_MODEL_ID})`,
  logDir: 'Directory for result logs (default: ./results)',
  runs: 'Independent runs per sample (default: 3)',
  safetyFactor: `Multiplier over 60/rpm between requests, at least 1 (default: ${DEFAULT_SAFETY_FACTOR})`,
  defaultRpm: `Requests per minute for models not in the table (default: ${DEFAULT_RPM})`,
  maxInPassRetries: 'Extra attempts per unit before moving on (default: 0)',
  requestTimeoutMs: `Per-request timeout in ms (default: ${DEFAULT_TIMEOUT_MS})`,
  temperature: 'Sampling temperature (default: 0.7)',
  honorRetryAfter: 'Wait out retry-after hints from the service (default: true)',
  rpmOverrides: 'Per-model RPM, e.g. gemini-2.5-flash=10,haiku-4.5=40'
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function isStringKey(key: string): key is StringKey {
  return STRING_KEYS.some((k) => k === key)
}

function isNumberKey(key: string): key is NumberKey {
  return NUMBER_KEYS.some((k) => k === key)
}

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((k) => k === key)
}

function isRpmTableKey(key: string): key is RpmTableKey {
  return RPM_TABLE_KEYS.some((k) => k === key)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Get the type of a config key (derived from key arrays).
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (isBooleanKey(key)) return 'boolean'
  if (isNumberKey(key)) return 'number'
  if (isRpmTableKey(key)) return 'model=rpm list'
  return 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for label-sweep.
 * Uses ~/.config/label-sweep on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'label-sweep')
}

/**
 * Get the config file path.
 * Priority: configFile arg > LABEL_SWEEP_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.LABEL_SWEEP_CONFIG) {
    return process.env.LABEL_SWEEP_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep the known, well-typed keys of a parsed config file.
 */
export function normalizeConfig(raw: unknown): Config {
  const config: Config = {}
  if (!isRecord(raw)) return config

  for (const key of STRING_KEYS) {
    const value = raw[key]
    if (typeof value === 'string') config[key] = value
  }
  for (const key of NUMBER_KEYS) {
    const value = raw[key]
    if (typeof value === 'number' && Number.isFinite(value)) config[key] = value
  }
  for (const key of BOOLEAN_KEYS) {
    const value = raw[key]
    if (typeof value === 'boolean') config[key] = value
  }
  for (const key of RPM_TABLE_KEYS) {
    const value = raw[key]
    if (isRecord(value)) {
      const table: Record<string, number> = {}
      for (const [model, rpm] of Object.entries(value)) {
        if (typeof rpm === 'number' && rpm > 0) table[model] = rpm
      }
      config[key] = table
    }
  }
  if (typeof raw.updatedAt === 'string') config.updatedAt = raw.updatedAt

  return config
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist.
 *
 * @throws ConfigError if the file is not valid JSON
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid config file ${path}: ${reason}`)
  }
  return normalizeConfig(raw)
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a comma list of model=rpm pairs.
 */
export function parseRpmTable(value: string): Record<string, number> {
  const table: Record<string, number> = {}
  for (const entry of value.split(',')) {
    const trimmed = entry.trim()
    if (!trimmed) continue
    const [model, rpmText] = trimmed.split('=').map((part) => part.trim())
    const rpm = Number(rpmText)
    if (!model || !rpmText || !Number.isFinite(rpm) || rpm <= 0) {
      throw new ConfigError(`Invalid model=rpm entry: ${trimmed}`)
    }
    table[model] = rpm
  }
  return table
}

/**
 * Return a copy of config with one key set from its string form.
 *
 * @throws ConfigError if the value does not parse for the key's type
 */
export function applyConfigValue(config: Config, key: ConfigKey, value: string): Config {
  const next: Config = { ...config }

  if (isBooleanKey(key)) {
    next[key] = value === 'true' || value === '1' || value === 'yes'
  } else if (isNumberKey(key)) {
    const parsed = Number(value)
    if (!value.trim() || !Number.isFinite(parsed)) {
      throw new ConfigError(`${key} must be a number, got "${value}"`)
    }
    next[key] = parsed
  } else if (isRpmTableKey(key)) {
    next[key] = parseRpmTable(value)
  } else {
    next[key] = value
  }

  return next
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  if (isRecord(value)) {
    return Object.entries(value)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(',')
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return isStringKey(key) || isBooleanKey(key) || isNumberKey(key) || isRpmTableKey(key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...BOOLEAN_KEYS, ...NUMBER_KEYS, ...RPM_TABLE_KEYS].sort()
}

/**
 * Set a single config value from its string form and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(applyConfigValue(config, key, value), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * Effective settings for a run, every key filled in.
 */
export interface Settings {
  readonly model: string
  readonly logDir: string
  readonly runs: number
  readonly safetyFactor: number
  readonly defaultRpm: number
  readonly maxInPassRetries: number
  readonly requestTimeoutMs: number
  readonly temperature: number
  readonly honorRetryAfter: boolean
  readonly rpmOverrides: Readonly<Record<string, number>>
}

export const DEFAULT_SETTINGS: Settings = {
  model: DEFAULT_MODEL_ID,
  logDir: 'results',
  runs: 3,
  safetyFactor: DEFAULT_SAFETY_FACTOR,
  defaultRpm: DEFAULT_RPM,
  maxInPassRetries: 0,
  requestTimeoutMs: DEFAULT_TIMEOUT_MS,
  temperature: 0.7,
  honorRetryAfter: true,
  rpmOverrides: {}
}

/**
 * Merge settings. Priority: overrides (CLI flags) > config file > defaults.
 */
export function resolveSettings(config: Config | null, overrides: Config = {}): Settings {
  const file = config ?? {}
  return {
    model: overrides.model ?? file.model ?? DEFAULT_SETTINGS.model,
    logDir: overrides.logDir ?? file.logDir ?? DEFAULT_SETTINGS.logDir,
    runs: overrides.runs ?? file.runs ?? DEFAULT_SETTINGS.runs,
    safetyFactor: overrides.safetyFactor ?? file.safetyFactor ?? DEFAULT_SETTINGS.safetyFactor,
    defaultRpm: overrides.defaultRpm ?? file.defaultRpm ?? DEFAULT_SETTINGS.defaultRpm,
    maxInPassRetries:
      overrides.maxInPassRetries ?? file.maxInPassRetries ?? DEFAULT_SETTINGS.maxInPassRetries,
    requestTimeoutMs:
      overrides.requestTimeoutMs ?? file.requestTimeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs,
    temperature: overrides.temperature ?? file.temperature ?? DEFAULT_SETTINGS.temperature,
    honorRetryAfter:
      overrides.honorRetryAfter ?? file.honorRetryAfter ?? DEFAULT_SETTINGS.honorRetryAfter,
    rpmOverrides: { ...file.rpmOverrides, ...overrides.rpmOverrides }
  }
}
