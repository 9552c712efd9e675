/**
 * Config Command
 *
 * `label-sweep config` prints every setting with its effective value and
 * where it comes from; `set` and `unset` edit the config file.
 */

import type { CLIArgs } from '../args'
import {
  type Config,
  ConfigError,
  type ConfigKey,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  resolveSettings,
  setConfigValue,
  unsetConfigValue
} from '../config'
import type { Logger } from '../logger'

export interface SettingRow {
  readonly key: ConfigKey
  readonly value: string
  readonly source: 'file' | 'default'
}

export function buildSettingRows(config: Config | null): SettingRow[] {
  const settings = resolveSettings(config)
  return getValidConfigKeys().map((key) => ({
    key,
    value: formatConfigValue(settings[key]),
    source: config?.[key] === undefined ? 'default' : 'file'
  }))
}

export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<number> {
  switch (args.configAction) {
    case 'list':
      await listSettings(args.configFile, logger)
      return 0
    case 'set':
      return setSetting(args, logger)
    case 'unset':
      return unsetSetting(args, logger)
  }
}

async function listSettings(configFile: string | undefined, logger: Logger): Promise<void> {
  const rows = buildSettingRows(await loadConfig(configFile))
  const width = Math.max(...rows.map((row) => row.key.length))

  logger.log(`\nConfig file: ${getConfigPath(configFile)}\n`)
  for (const row of rows) {
    const marker = row.source === 'default' ? '  (default)' : ''
    logger.log(`  ${row.key.padEnd(width)}  ${row.value || '(none)'}${marker}`)
  }
}

function requireKey(key: string | undefined, usage: string, logger: Logger): ConfigKey | null {
  if (!key) {
    logger.error(`Missing key. Usage: ${usage}`)
    return null
  }
  if (!isValidConfigKey(key)) {
    logger.error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
    return null
  }
  return key
}

async function setSetting(args: CLIArgs, logger: Logger): Promise<number> {
  const usage = 'label-sweep config set <key> <value>'
  const key = requireKey(args.configKey, usage, logger)
  if (!key) return 1
  if (args.configValue === undefined) {
    logger.error(`Missing value. Usage: ${usage}`)
    return 1
  }

  try {
    await setConfigValue(key, args.configValue, args.configFile)
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message)
      return 1
    }
    throw error
  }

  const saved = await loadConfig(args.configFile)
  logger.success(`${key} = ${formatConfigValue(saved?.[key])}`)
  return 0
}

async function unsetSetting(args: CLIArgs, logger: Logger): Promise<number> {
  const key = requireKey(args.configKey, 'label-sweep config unset <key>', logger)
  if (!key) return 1
  await unsetConfigValue(key, args.configFile)
  logger.success(`${key} reset to default`)
  return 0
}
