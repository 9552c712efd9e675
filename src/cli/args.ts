/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export interface CLIArgs {
  command: string
  input: string
  quiet: boolean
  verbose: boolean
  dryRun: boolean
  configFile: string | undefined
  /** For run: request template file */
  template: string | undefined
  model: string | undefined
  runs: number | undefined
  /** For run: explicit log file (overrides <logDir>/<model>_<dataset>.jsonl) */
  logFile: string | undefined
  logDir: string | undefined
  maxRetries: number | undefined
  idColumn: string | undefined
  textColumn: string | undefined
  labelColumn: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: 'list' | 'set' | 'unset'
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Run repeated LLM label checks over a sample set, resumably and within rate limits.

Every sample is judged N times. Results are appended to a JSONL log; rerunning the
same command picks up where the last pass stopped.

Examples:
  $ label-sweep run samples.csv --template prompt.txt -m gemini-2.5-flash-lite -r 3
  $ label-sweep run samples.csv -m gemini-2.5-flash-lite,haiku-4.5
  $ label-sweep stats results/gemini_2.5_flash_lite_samples.jsonl --runs 3
  $ label-sweep models`

function createProgram(): Command {
  const program = new Command()
    .name('label-sweep')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set LABEL_SWEEP_CONFIG)')

  // ============ RUN ============
  program
    .command('run')
    .description('Run one pass over every sample × run not yet in the log')
    .argument('<samples>', 'Samples CSV (columns: sample_id, text, label)')
    .option('-t, --template <file>', 'Request template ({payload}, {reference_label}, {meta.<col>})')
    .option('-m, --model <ids>', 'Model ID, or a comma list run one after another (see `label-sweep models`)')
    .option('-r, --runs <num>', 'Runs per sample')
    .option('-l, --log <file>', 'Result log file (single model only)')
    .option('--log-dir <dir>', 'Directory for the default log file')
    .option('--max-retries <num>', 'Extra attempts per unit within this pass')
    .option('--id-column <name>', 'Sample ID column', 'sample_id')
    .option('--text-column <name>', 'Sample text column', 'text')
    .option('--label-column <name>', 'Reference label column', 'label')
    .option('--dry-run', 'Show the plan and remaining work without API calls')

  // ============ STATS ============
  program
    .command('stats')
    .description('Summarize a result log')
    .argument('<log>', 'Result log (.jsonl)')
    .option('-r, --runs <num>', 'Expected runs per sample, to report incomplete samples')

  // ============ MODELS ============
  program.command('models').description('List known models with their request limits')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  label-sweep config                                  List current settings
  label-sweep config set model gemini-1.5-pro         Set the default model
  label-sweep config set rpmOverrides gemini-1.5-pro=1
  label-sweep config unset logDir                     Remove custom log directory`
    )

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalInt(value: unknown): number | undefined {
  return typeof value === 'string' ? Number.parseInt(value, 10) : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    input,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    dryRun: opts.dryRun === true,
    configFile: optionalString(opts.configFile),
    template: optionalString(opts.template),
    model: optionalString(opts.model),
    runs: optionalInt(opts.runs),
    logFile: optionalString(opts.log),
    logDir: optionalString(opts.logDir),
    maxRetries: optionalInt(opts.maxRetries),
    idColumn: optionalString(opts.idColumn),
    textColumn: optionalString(opts.textColumn),
    labelColumn: optionalString(opts.labelColumn),
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): 'list' | 'set' | 'unset' {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

function buildConfigCLIArgs(
  action: string | undefined,
  key: string | undefined,
  value: string | undefined,
  opts: Record<string, unknown>
): CLIArgs {
  const base = buildCLIArgs('config', '', opts)
  return {
    ...base,
    configAction: parseConfigAction(action),
    configKey: key,
    configValue: value
  }
}

/**
 * Attach action handlers that capture the parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    cmd.action((input?: string) => {
      capture(buildCLIArgs(cmd.name(), input ?? '', cmd.optsWithGlobals()))
    })
  }

  const configCmd = program.commands.find((c) => c.name() === 'config')
  if (configCmd) {
    configCmd.action((action?: string, key?: string, value?: string) => {
      capture(buildConfigCLIArgs(action, key, value, configCmd.optsWithGlobals()))
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    // Subcommands don't inherit exitOverride once created
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
      cmd.configureOutput({ writeErr: () => {} })
    }
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help/version and on usage errors
    if (!result) {
      return buildCLIArgs('help', '', {})
    }
  }

  return result ?? buildCLIArgs('help', '', {})
}
