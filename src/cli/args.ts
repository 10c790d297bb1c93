/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  input: string
  output: string
  failures: string
  /** Forward only: false when --no-web-search was given */
  webSearch: boolean
  dryRun: boolean
  /** Reverse only: overrides the configured camera_type */
  cameraType: string | undefined
  /** Reverse only: overrides the configured reported_by tag */
  batchTag: string | undefined
  quiet: boolean
  verbose: boolean
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

export const DEFAULT_GEOCODE_OUTPUT = 'clean_camera_import.csv'
export const DEFAULT_GEOCODE_FAILURES = 'camera_import_failures.csv'
export const DEFAULT_REVERSE_OUTPUT = 'reverse_camera_import.csv'
export const DEFAULT_REVERSE_FAILURES = 'reverse_camera_import_failures.csv'

const DESCRIPTION = `Locate surveillance-camera records for a city-wide camera map.

Forward geocodes shop/address tables into import-ready coordinates, and
reverse geocodes coordinate lists into street addresses.

Examples:
  $ camera-locator geocode cameras.csv
  $ camera-locator geocode cameras.csv --no-web-search -o import.csv
  $ camera-locator reverse coordinates.csv --batch-tag reverse_import_2026-10-19
  $ camera-locator config set googleSearchCx my-engine-id`

function createProgram(): Command {
  const program = new Command()
    .name('camera-locator')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output (every lookup attempt)')
    .option('--config-file <path>', 'Config file path (or set CAMERA_LOCATOR_CONFIG)')

  // ============ GEOCODE (shop/address → coordinates) ============
  program
    .command('geocode')
    .description('Forward geocode a Business Name / Apparent Address CSV')
    .argument('<input>', 'Input CSV (header row, then business name and address columns)')
    .option('-o, --output <file>', 'Resolved rows CSV', DEFAULT_GEOCODE_OUTPUT)
    .option('--failures <file>', 'Unresolved rows CSV', DEFAULT_GEOCODE_FAILURES)
    .option('--no-web-search', 'Skip the web search fallback')
    .option('--dry-run', 'Parse the input and show counts without any lookups')

  // ============ REVERSE (coordinates → street address) ============
  program
    .command('reverse')
    .description('Reverse geocode a CSV with Latitude and Longitude columns')
    .argument('<input>', 'Input CSV with Latitude and Longitude header columns')
    .option('-o, --output <file>', 'Resolved rows CSV', DEFAULT_REVERSE_OUTPUT)
    .option('--failures <file>', 'Unresolved rows CSV', DEFAULT_REVERSE_FAILURES)
    .option('--camera-type <type>', 'camera_type for every row (default: config or nopd)')
    .option('--batch-tag <tag>', 'reported_by tag for every row (default: reverse_import_<date>)')
    .option('--dry-run', 'Parse the input and show counts without any lookups')

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
  camera-locator config                                  List current settings
  camera-locator config set googleSearchApiKey test-key  Enable web search (with googleSearchCx)
  camera-locator config set requestIntervalMs 1500       Slow down every service
  camera-locator config unset batchTag                   Back to the dated default`
    )

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  const isReverse = commandName === 'reverse'
  return {
    command: commandName,
    input,
    output:
      typeof opts.output === 'string'
        ? opts.output
        : isReverse
          ? DEFAULT_REVERSE_OUTPUT
          : DEFAULT_GEOCODE_OUTPUT,
    failures:
      typeof opts.failures === 'string'
        ? opts.failures
        : isReverse
          ? DEFAULT_REVERSE_FAILURES
          : DEFAULT_GEOCODE_FAILURES,
    webSearch: opts.webSearch !== false,
    dryRun: opts.dryRun === true,
    cameraType: optionalString(opts.cameraType),
    batchTag: optionalString(opts.batchTag),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
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
 * optsWithGlobals() includes global options from the parent program.
 */
function captureArgs(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    if (cmd.name() === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        capture(buildConfigCLIArgs(action, key, value, cmd.optsWithGlobals()))
      })
    } else {
      cmd.action((input: string) => {
        capture(buildCLIArgs(cmd.name(), input ?? '', cmd.optsWithGlobals()))
      })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help/version
  }

  return result ?? buildCLIArgs('help', '', {})
}
