/**
 * CLI Helpers
 *
 * Shared utilities for CLI commands.
 */

import { basename } from 'node:path'
import { VERSION } from '../index'
import type { ResolutionAttempt } from '../types'
import type { CLIArgs } from './args'
import { loadConfig, resolveSettings, type Settings } from './config'
import { readInputFile } from './io'
import type { Logger } from './logger'

// ============================================================================
// Formatting
// ============================================================================

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return `${text.slice(0, maxLength - 3)}...`
}

export function formatCoordinates(latitude: number, longitude: number): string {
  return `(${latitude}, ${longitude})`
}

export function formatAttempt(attempt: ResolutionAttempt): string {
  const base = `${attempt.strategy} ${attempt.service}: "${attempt.query}"`
  return attempt.error ? `${base} failed (${attempt.error.message})` : base
}

// ============================================================================
// Command Initialization
// ============================================================================

interface CommandInitResult {
  settings: Settings
  /** Raw input table */
  text: string
}

/**
 * Initialize a command: validate input, log header, resolve settings, read the input table.
 */
export async function initCommand(
  commandName: string,
  args: CLIArgs,
  logger: Logger
): Promise<CommandInitResult> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  logger.log(`\nCamera Locator ${commandName} v${VERSION}`)
  logger.log(`\n📁 ${basename(args.input)}`)

  const text = await readInputFile(args.input)
  const config = await loadConfig(args.configFile)
  const settings = resolveSettings(config, process.env, {
    batchTag: args.batchTag,
    cameraType: args.cameraType
  })

  return { settings, text }
}
