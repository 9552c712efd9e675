/**
 * Tests for CLI Configuration
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  applyConfigValue,
  ConfigError,
  DEFAULT_SETTINGS,
  formatConfigValue,
  getConfigPath,
  getConfigType,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  normalizeConfig,
  parseRpmTable,
  resolveSettings,
  saveConfig,
  setConfigValue,
  unsetConfigValue
} from './config'

describe('config', () => {
  let tempDir: string
  let configPath: string
  let originalEnv: string | undefined

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'label-sweep-config-test-'))
    configPath = join(tempDir, 'config.json')
    originalEnv = process.env.LABEL_SWEEP_CONFIG
    delete process.env.LABEL_SWEEP_CONFIG
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
    if (originalEnv !== undefined) {
      process.env.LABEL_SWEEP_CONFIG = originalEnv
    } else {
      delete process.env.LABEL_SWEEP_CONFIG
    }
  })

  describe('getConfigPath', () => {
    it('returns explicit config file path when provided', () => {
      expect(getConfigPath('/custom/path/config.json')).toBe('/custom/path/config.json')
    })

    it('returns env var path when set', () => {
      process.env.LABEL_SWEEP_CONFIG = '/env/config.json'
      expect(getConfigPath()).toBe('/env/config.json')
    })

    it('returns default XDG path when no override', () => {
      const path = getConfigPath()
      expect(path).toContain(join('.config', 'label-sweep', 'config.json'))
    })

    it('explicit path takes precedence over env var', () => {
      process.env.LABEL_SWEEP_CONFIG = '/env/config.json'
      expect(getConfigPath('/explicit/config.json')).toBe('/explicit/config.json')
    })
  })

  describe('loadConfig', () => {
    it('returns null for non-existent file', async () => {
      const config = await loadConfig(configPath)
      expect(config).toBeNull()
    })

    it('loads valid config file', async () => {
      await writeFile(configPath, JSON.stringify({ model: 'gemini-1.5-pro' }))
      const config = await loadConfig(configPath)
      expect(config).toEqual({ model: 'gemini-1.5-pro' })
    })

    it('throws ConfigError for invalid JSON', async () => {
      await writeFile(configPath, 'not valid json')
      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError)
    })

    it('loads all config fields', async () => {
      const fullConfig = {
        model: 'haiku-4.5',
        logDir: '/data/results',
        runs: 5,
        safetyFactor: 1.25,
        defaultRpm: 10,
        maxInPassRetries: 2,
        requestTimeoutMs: 30000,
        temperature: 0.2,
        honorRetryAfter: false,
        rpmOverrides: { 'haiku-4.5': 40 },
        updatedAt: '2025-01-01T00:00:00.000Z'
      }
      await writeFile(configPath, JSON.stringify(fullConfig))
      const config = await loadConfig(configPath)
      expect(config).toEqual(fullConfig)
    })
  })

  describe('normalizeConfig', () => {
    it('drops unknown keys and mistyped values', () => {
      expect(
        normalizeConfig({
          model: 'gemini-2.5-flash',
          runs: 'five',
          honorRetryAfter: 'yes',
          rpmOverrides: { good: 12, bad: -1, worse: 'x' },
          homeCountry: 'NZ'
        })
      ).toEqual({ model: 'gemini-2.5-flash', rpmOverrides: { good: 12 } })
    })

    it('returns an empty config for non-objects', () => {
      expect(normalizeConfig([1, 2])).toEqual({})
      expect(normalizeConfig(null)).toEqual({})
    })
  })

  describe('saveConfig', () => {
    it('saves config to file', async () => {
      await saveConfig({ model: 'gpt-5-mini' }, configPath)
      const content = await readFile(configPath, 'utf-8')
      const saved = JSON.parse(content)
      expect(saved.model).toBe('gpt-5-mini')
      expect(saved.updatedAt).toBeDefined()
    })

    it('creates parent directories', async () => {
      const nestedPath = join(tempDir, 'nested', 'dir', 'config.json')
      await saveConfig({ runs: 3 }, nestedPath)
      expect(existsSync(nestedPath)).toBe(true)
    })

    it('preserves existing fields when saving', async () => {
      await saveConfig({ model: 'haiku-4.5', runs: 4 }, configPath)
      const config = await loadConfig(configPath)
      expect(config?.model).toBe('haiku-4.5')
      expect(config?.runs).toBe(4)
    })
  })

  describe('setConfigValue', () => {
    it('sets a new value in empty config', async () => {
      await setConfigValue('model', 'gemini-1.5-flash', configPath)
      const config = await loadConfig(configPath)
      expect(config?.model).toBe('gemini-1.5-flash')
    })

    it('updates an existing value', async () => {
      await saveConfig({ runs: 3 }, configPath)
      await setConfigValue('runs', '10', configPath)
      const config = await loadConfig(configPath)
      expect(config?.runs).toBe(10)
    })

    it('preserves other values when setting', async () => {
      await saveConfig({ model: 'haiku-4.5', runs: 5 }, configPath)
      await setConfigValue('logDir', '/new/results', configPath)
      const config = await loadConfig(configPath)
      expect(config?.model).toBe('haiku-4.5')
      expect(config?.runs).toBe(5)
      expect(config?.logDir).toBe('/new/results')
    })

    it('handles boolean values', async () => {
      await setConfigValue('honorRetryAfter', 'false', configPath)
      const config = await loadConfig(configPath)
      expect(config?.honorRetryAfter).toBe(false)
    })

    it('handles rpm tables', async () => {
      await setConfigValue('rpmOverrides', 'gemini-2.5-flash=8, haiku-4.5=40', configPath)
      const config = await loadConfig(configPath)
      expect(config?.rpmOverrides).toEqual({ 'gemini-2.5-flash': 8, 'haiku-4.5': 40 })
    })

    it('rejects a non-numeric number', async () => {
      await expect(setConfigValue('runs', 'many', configPath)).rejects.toThrow(
        'runs must be a number, got "many"'
      )
      expect(existsSync(configPath)).toBe(false)
    })
  })

  describe('unsetConfigValue', () => {
    it('removes a value from config', async () => {
      await saveConfig({ model: 'haiku-4.5', runs: 5 }, configPath)
      await unsetConfigValue('model', configPath)
      const config = await loadConfig(configPath)
      expect(config?.model).toBeUndefined()
      expect(config?.runs).toBe(5)
    })

    it('handles unsetting non-existent key', async () => {
      await saveConfig({ model: 'haiku-4.5' }, configPath)
      await unsetConfigValue('logDir', configPath)
      const config = await loadConfig(configPath)
      expect(config?.model).toBe('haiku-4.5')
    })

    it('creates config file if it does not exist', async () => {
      await unsetConfigValue('model', configPath)
      expect(existsSync(configPath)).toBe(true)
    })
  })

  describe('applyConfigValue', () => {
    it('parses string values', () => {
      expect(applyConfigValue({}, 'model', 'gemini-1.5-pro')).toEqual({ model: 'gemini-1.5-pro' })
      expect(applyConfigValue({}, 'logDir', './out')).toEqual({ logDir: './out' })
    })

    it('parses boolean values', () => {
      expect(applyConfigValue({}, 'honorRetryAfter', 'true').honorRetryAfter).toBe(true)
      expect(applyConfigValue({}, 'honorRetryAfter', '1').honorRetryAfter).toBe(true)
      expect(applyConfigValue({}, 'honorRetryAfter', 'yes').honorRetryAfter).toBe(true)
      expect(applyConfigValue({}, 'honorRetryAfter', 'false').honorRetryAfter).toBe(false)
      expect(applyConfigValue({}, 'honorRetryAfter', 'no').honorRetryAfter).toBe(false)
    })

    it('parses decimal numbers', () => {
      expect(applyConfigValue({}, 'safetyFactor', '1.25').safetyFactor).toBe(1.25)
      expect(applyConfigValue({}, 'temperature', '0').temperature).toBe(0)
    })

    it('rejects an empty number', () => {
      expect(() => applyConfigValue({}, 'defaultRpm', ' ')).toThrow(ConfigError)
    })

    it('does not modify the input', () => {
      const config = { runs: 3 }
      applyConfigValue(config, 'runs', '7')
      expect(config).toEqual({ runs: 3 })
    })
  })

  describe('parseRpmTable', () => {
    it('parses model=rpm pairs', () => {
      expect(parseRpmTable('a=15,b=2.5')).toEqual({ a: 15, b: 2.5 })
    })

    it('skips empty entries', () => {
      expect(parseRpmTable('a=15,,')).toEqual({ a: 15 })
    })

    it.each(['a', 'a=', '=5', 'a=0', 'a=fast'])('rejects %s', (value) => {
      expect(() => parseRpmTable(value)).toThrow(`Invalid model=rpm entry: ${value}`)
    })
  })

  describe('formatConfigValue', () => {
    it('formats string values', () => {
      expect(formatConfigValue('haiku-4.5')).toBe('haiku-4.5')
    })

    it('formats boolean values', () => {
      expect(formatConfigValue(true)).toBe('true')
      expect(formatConfigValue(false)).toBe('false')
    })

    it('formats rpm tables', () => {
      expect(formatConfigValue({ a: 15, b: 2 })).toBe('a=15,b=2')
    })
  })

  describe('isValidConfigKey', () => {
    it('returns true for valid keys', () => {
      expect(isValidConfigKey('model')).toBe(true)
      expect(isValidConfigKey('runs')).toBe(true)
      expect(isValidConfigKey('honorRetryAfter')).toBe(true)
      expect(isValidConfigKey('rpmOverrides')).toBe(true)
    })

    it('returns false for invalid keys', () => {
      expect(isValidConfigKey('invalid')).toBe(false)
      expect(isValidConfigKey('updatedAt')).toBe(false)
      expect(isValidConfigKey('')).toBe(false)
    })
  })

  describe('getValidConfigKeys', () => {
    it('returns all valid config keys sorted', () => {
      expect(getValidConfigKeys()).toEqual([
        'defaultRpm',
        'honorRetryAfter',
        'logDir',
        'maxInPassRetries',
        'model',
        'requestTimeoutMs',
        'rpmOverrides',
        'runs',
        'safetyFactor',
        'temperature'
      ])
    })
  })

  describe('getConfigType', () => {
    it('names the value type of each key', () => {
      expect(getConfigType('model')).toBe('string')
      expect(getConfigType('runs')).toBe('number')
      expect(getConfigType('honorRetryAfter')).toBe('boolean')
      expect(getConfigType('rpmOverrides')).toBe('model=rpm list')
    })
  })

  describe('resolveSettings', () => {
    it('uses defaults without config', () => {
      expect(resolveSettings(null)).toEqual(DEFAULT_SETTINGS)
    })

    it('prefers overrides over the config file', () => {
      const settings = resolveSettings(
        { model: 'haiku-4.5', runs: 5, rpmOverrides: { a: 1, b: 2 } },
        { runs: 7, rpmOverrides: { b: 3 } }
      )

      expect(settings.model).toBe('haiku-4.5')
      expect(settings.runs).toBe(7)
      expect(settings.rpmOverrides).toEqual({ a: 1, b: 3 })
      expect(settings.safetyFactor).toBe(1.1)
    })
  })
})
