#!/usr/bin/env node
/**
 * label-sweep CLI
 *
 * Local driver for the batch engine.
 * Handles file I/O, signal handling, progress reporting and exit codes.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdModels } from './cli/commands/models'
import { cmdRun } from './cli/commands/run'
import { cmdStats } from './cli/commands/stats'
import { createLogger } from './cli/logger'

async function main(): Promise<number> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'run':
        return await cmdRun(args, logger)

      case 'stats':
        return await cmdStats(args, logger)

      case 'models':
        return await cmdModels(args, logger)

      case 'config':
        return await cmdConfig(args, logger)

      default:
        logger.error(`Unknown command: ${args.command}. Run 'label-sweep --help' for usage.`)
        return 1
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    return 1
  }
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
