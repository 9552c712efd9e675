/**
 * Stats Command
 *
 * Summarize an existing result log without calling any model.
 */

import { existsSync } from 'node:fs'
import { formatLogSummary, summarizeLog } from '../../log-stats'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'

export async function cmdStats(args: CLIArgs, logger: Logger): Promise<number> {
  if (!existsSync(args.input)) {
    logger.error(`Log not found: ${args.input}`)
    return 1
  }

  const summary = await summarizeLog(args.input, args.runs)
  logger.log(formatLogSummary(summary, args.verbose ? Number.POSITIVE_INFINITY : 5))
  return 0
}
