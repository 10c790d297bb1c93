#!/usr/bin/env node
/**
 * Camera Locator CLI
 *
 * Local orchestrator for the core library.
 * Handles file I/O, progress reporting, and per-service rate limiting.
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdGeocode } from './cli/commands/geocode'
import { cmdReverse } from './cli/commands/reverse'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'geocode':
        await cmdGeocode(args, logger)
        break

      case 'reverse':
        await cmdReverse(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'camera-locator --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
