/**
 * Models Command
 *
 * List the built-in model table with request limits.
 */

import { getRpmTable, getValidModelIds, resolveModel } from '../../invoker'
import { RateLimiter } from '../../rate-limit'
import { formatDurationMs } from '../../runner'
import type { CLIArgs } from '../args'
import { loadConfig, resolveSettings } from '../config'
import type { Logger } from '../logger'

export interface ModelRow {
  readonly id: string
  readonly provider: string
  readonly rpm: number
  readonly interval: string
  readonly description: string
}

/**
 * One row per known model, with RPM overrides and safety factor applied.
 */
export function buildModelRows(
  rpmOverrides: Readonly<Record<string, number>>,
  safetyFactor: number
): ModelRow[] {
  const limiter = new RateLimiter({ rpmByModel: { ...getRpmTable(), ...rpmOverrides }, safetyFactor })

  return getValidModelIds().flatMap((id) => {
    const info = resolveModel(id)
    if (!info) return []
    return [
      {
        id,
        provider: info.provider,
        rpm: limiter.rpm(id),
        interval: formatDurationMs(limiter.minimumIntervalMs(id)),
        description: info.description
      }
    ]
  })
}

export async function cmdModels(args: CLIArgs, logger: Logger): Promise<number> {
  const settings = resolveSettings(await loadConfig(args.configFile))
  const rows = buildModelRows(settings.rpmOverrides, settings.safetyFactor)
  const idWidth = Math.max(...rows.map((r) => r.id.length))

  logger.log(`\nModels (safety factor ${settings.safetyFactor}):\n`)
  for (const row of rows) {
    const marker = row.id === settings.model ? '*' : ' '
    logger.log(
      `${marker} ${row.id.padEnd(idWidth)}  ${row.provider.padEnd(10)}  ${String(row.rpm).padStart(4)} RPM  every ${row.interval.padEnd(6)}  ${row.description}`
    )
  }
  return 0
}
