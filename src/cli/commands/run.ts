/**
 * Run Command
 *
 * One resumable pass: load samples → scan the log → call the model for every
 * missing (sample, run) → append results → print the pass report.
 *
 * `-m a,b` runs one pass per model in order, each with its own log, and ends
 * with a per-model summary. An aborted pass stops the remaining models.
 */

import { join } from 'node:path'
import {
  createInvoker,
  getApiKeyEnvVar,
  getRpmTable,
  type ModelInfo,
  resolveModel
} from '../../invoker'
import { buildWorkPlan, remainingUnits } from '../../plan'
import { scanProgress } from '../../progress'
import { createRequestBuilder, DEFAULT_TEMPLATE, loadTemplate } from '../../prompt'
import { RateLimiter } from '../../rate-limit'
import {
  formatDurationMs,
  formatPassReport,
  type PassOutcome,
  type PassResult,
  runPass
} from '../../runner'
import { datasetName, loadSamplesFromCsv } from '../../samples'
import { formatUnit, type Sample } from '../../types'
import type { CLIArgs } from '../args'
import { loadConfig, resolveSettings, type Settings } from '../config'
import type { Logger } from '../logger'

/** Exit code when the pass stopped with units still missing */
export const EXIT_PARTIAL = 2

/**
 * Model ID made safe for file names: `gemini-2.5-flash` → `gemini_2.5_flash`.
 */
export function modelSafeName(modelId: string): string {
  return modelId.replace(/[/\\:\s-]+/g, '_')
}

/**
 * Default log location: `<logDir>/<model>_<dataset>.jsonl`.
 */
export function defaultLogPath(logDir: string, modelId: string, samplesPath: string): string {
  return join(logDir, `${modelSafeName(modelId)}_${datasetName(samplesPath)}.jsonl`)
}

/**
 * Split a `-m` value into model IDs: `"a, b,a"` → `['a', 'b']`.
 */
export function parseModelList(value: string): string[] {
  const ids = value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0)
  return [...new Set(ids)]
}

export function exitCodeFor(outcome: PassOutcome): number {
  switch (outcome.status) {
    case 'completed':
      return 0
    case 'partially_completed':
      return EXIT_PARTIAL
    case 'aborted':
      return 1
  }
}

/**
 * Exit code over several passes: any abort wins, then any partial pass.
 */
export function combinedExitCode(outcomes: readonly PassOutcome[]): number {
  const codes = outcomes.map(exitCodeFor)
  if (codes.includes(1)) return 1
  if (codes.includes(EXIT_PARTIAL)) return EXIT_PARTIAL
  return 0
}

function outcomeLabel(outcome: PassOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return 'completed'
    case 'partially_completed':
      return outcome.cancelled ? 'cancelled' : 'partial'
    case 'aborted':
      return 'aborted'
  }
}

/**
 * Per-model table printed after a multi-model run.
 * Models never reached (after an abort or Ctrl+C) are listed as not run.
 */
export function formatModelSummary(results: readonly PassResult[], notRun: readonly string[]): string {
  const ids = [...results.map((r) => r.report.modelId), ...notRun]
  const width = Math.max(...ids.map((id) => id.length))
  const lines = ['Model summary:']

  for (const { outcome, report } of results) {
    const failures = Object.values(report.failuresByKind).reduce((sum, n) => sum + n, 0)
    lines.push(
      `  ${report.modelId.padEnd(width)}  ${outcomeLabel(outcome).padEnd(9)}  ` +
        `${report.successes} ok, ${failures} failed, ${report.incompleteUnits.length} remaining`
    )
  }
  for (const id of notRun) {
    lines.push(`  ${id.padEnd(width)}  not run`)
  }
  return lines.join('\n')
}

function createRateLimiter(settings: Settings): RateLimiter {
  return new RateLimiter({
    rpmByModel: { ...getRpmTable(), ...settings.rpmOverrides },
    defaultRpm: settings.defaultRpm,
    safetyFactor: settings.safetyFactor,
    honorRetryAfter: settings.honorRetryAfter
  })
}

interface ModelTarget {
  readonly id: string
  readonly info: ModelInfo
  readonly logPath: string
}

async function showDryRun(
  samples: readonly Sample[],
  settings: Settings,
  target: ModelTarget,
  limiter: RateLimiter,
  logger: Logger
): Promise<void> {
  const plan = buildWorkPlan(samples, settings.runs)
  const scan = await scanProgress(target.logPath)
  const remaining = remainingUnits(plan, scan.completed)
  const intervalMs = limiter.minimumIntervalMs(target.id)

  logger.log('\n📊 Pass Plan (dry run)')
  logger.log(`   Planned units: ${plan.length}`)
  logger.log(`   Already complete: ${plan.length - remaining.length}`)
  logger.log(`   Remaining: ${remaining.length}`)
  logger.log(`   Malformed log lines: ${scan.warnings.length}`)
  logger.log(`   Minimum time: ${formatDurationMs(remaining.length * intervalMs)}`)
  for (const unit of remaining.slice(0, 5)) {
    logger.verbose(`next: ${formatUnit(unit)}`)
  }
}

function describeTarget(target: ModelTarget, limiter: RateLimiter, logger: Logger): void {
  logger.log(`\n   Model: ${target.id} (${target.info.provider}, ${limiter.rpm(target.id)} RPM)`)
  logger.log(`   Interval: ${formatDurationMs(limiter.minimumIntervalMs(target.id))}`)
  logger.log(`   Log: ${target.logPath}`)
}

/**
 * Execute the run command.
 *
 * @returns Process exit code: 0 completed, 2 partially completed, 1 aborted
 */
export async function cmdRun(args: CLIArgs, logger: Logger): Promise<number> {
  const config = await loadConfig(args.configFile)
  const settings = resolveSettings(config, {
    model: args.model,
    runs: args.runs,
    logDir: args.logDir,
    maxInPassRetries: args.maxRetries
  })

  const modelIds = parseModelList(settings.model)
  if (modelIds.length === 0) {
    logger.error('No model given. Pass -m <id> or set one with `label-sweep config set model <id>`.')
    return 1
  }
  if (args.logFile && modelIds.length > 1) {
    logger.error('--log takes a single model; use --log-dir to run several models')
    return 1
  }

  const targets: ModelTarget[] = []
  for (const id of modelIds) {
    const info = resolveModel(id)
    if (!info) {
      logger.error(`Unknown model: ${id}. Run 'label-sweep models' to list models.`)
      return 1
    }
    const logPath = args.logFile ?? defaultLogPath(settings.logDir, id, args.input)
    targets.push({ id, info, logPath })
  }

  const samples = loadSamplesFromCsv(args.input, {
    id: args.idColumn,
    payload: args.textColumn,
    referenceLabel: args.labelColumn
  })
  const template = args.template ? loadTemplate(args.template) : DEFAULT_TEMPLATE
  const buildRequest = createRequestBuilder(template)
  // Surface template errors before any call is made
  for (const sample of samples) {
    buildRequest(sample)
  }

  const limiter = createRateLimiter(settings)
  const modelCount = targets.length > 1 ? ` × ${targets.length} models` : ''
  logger.log(`\n🏷️  label-sweep: ${samples.length} samples × ${settings.runs} runs${modelCount}`)

  if (args.dryRun) {
    for (const target of targets) {
      describeTarget(target, limiter, logger)
      await showDryRun(samples, settings, target, limiter, logger)
    }
    return 0
  }

  const missingKeys = [...new Set(targets.map((t) => getApiKeyEnvVar(t.info.provider)))].filter(
    (envVar) => !process.env[envVar]
  )
  if (missingKeys.length > 0) {
    logger.error(`Missing API key: set ${missingKeys.join(', ')}`)
    return 1
  }

  const controller = new AbortController()
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130)
    }
    logger.warn('Interrupted: stopping after the current unit (Ctrl+C again to quit now)')
    controller.abort()
  }
  process.on('SIGINT', onSigint)

  const invoker = createInvoker({
    temperature: settings.temperature,
    timeoutMs: settings.requestTimeoutMs
  })

  try {
    const results: PassResult[] = []
    for (const target of targets) {
      describeTarget(target, limiter, logger)
      const result = await runPass({
        samples,
        runCount: settings.runs,
        modelId: target.id,
        logPath: target.logPath,
        invoker,
        buildRequest,
        rateLimiter: limiter,
        maxInPassRetries: settings.maxInPassRetries,
        signal: controller.signal,
        onStateChange: (state) => logger.verbose(`state: ${state}`),
        onWarning: (warning) => logger.warn(`Skipping log line ${warning.line}: ${warning.reason}`),
        onUnitStart: ({ unit, attempt, waitedMs }) => {
          const retry = attempt > 1 ? ` (attempt ${attempt})` : ''
          logger.verbose(`${formatUnit(unit)}${retry} after ${formatDurationMs(waitedMs)} wait`)
        },
        onUnitComplete: ({ record, position, total }) => logger.unit(record, position, total)
      })
      results.push(result)

      logger.log('')
      const text = formatPassReport(result.outcome, result.report)
      if (result.outcome.status === 'aborted') {
        logger.error(text)
      } else {
        logger.log(text)
      }
      if (result.outcome.status === 'aborted' || controller.signal.aborted) {
        break
      }
    }

    if (targets.length > 1) {
      const notRun = targets.slice(results.length).map((t) => t.id)
      logger.log(`\n${formatModelSummary(results, notRun)}`)
    }

    const exitCode = combinedExitCode(results.map((r) => r.outcome))
    if (exitCode === 0) {
      logger.success('All units complete')
    }
    return exitCode
  } finally {
    process.off('SIGINT', onSigint)
  }
}
