/**
 * Reverse Command
 *
 * Reverse geocodes a coordinate table into import rows with street addresses.
 */

import { runReverseBatch } from '../../batch/index'
import { exportToCSV } from '../../export/index'
import { parseCoordinateTable } from '../../input/index'
import { REVERSE_COLUMNS } from '../../types'
import type { CLIArgs } from '../args'
import { createReverseServices, createServiceContext } from '../context'
import { formatCoordinates, initCommand } from '../helpers'
import { writeOutputFile } from '../io'
import type { Logger } from '../logger'

export async function cmdReverse(args: CLIArgs, logger: Logger): Promise<void> {
  const { settings, text } = await initCommand('Reverse', args, logger)

  const parsed = parseCoordinateTable(text)
  for (const warning of parsed.warnings) {
    logger.warn(warning)
  }
  logger.log(`   ${parsed.records.length} coordinates (${parsed.skipped} rows skipped)`)

  // Dry run: show counts and exit
  if (args.dryRun) {
    logger.log('\n📊 Reverse Geocoding Estimate (dry run)')
    logger.log(`   Coordinates to look up: ${parsed.records.length}`)
    logger.log(`   Rows skipped: ${parsed.skipped}`)
    logger.log(`   camera_type: ${settings.cameraType}`)
    logger.log(`   reported_by: ${settings.batchTag}`)
    return
  }

  // Reverse lookups never use web search
  const ctx = createServiceContext(settings, { webSearch: false })

  logger.log('')
  const batch = await runReverseBatch(parsed.records, createReverseServices(ctx), {
    cameraType: settings.cameraType,
    batchTag: settings.batchTag,
    onRecordStart: ({ index, total, record }) => {
      logger.progress(formatCoordinates(record.latitude, record.longitude), index + 1, total)
    },
    onRecordComplete: ({ outcome }) => {
      if (outcome.kind === 'resolved') {
        logger.verbose(`street address: "${outcome.streetAddress}"`)
      } else if (outcome.error) {
        logger.warn(`${outcome.reason} (${outcome.error.message})`)
      } else {
        logger.verbose(outcome.reason)
      }
    }
  })

  await writeOutputFile(args.output, exportToCSV(REVERSE_COLUMNS, batch.resolved))
  await writeOutputFile(args.failures, exportToCSV(REVERSE_COLUMNS, batch.unresolved))

  // Summary
  logger.log('\n📊 Reverse Geocoding Results')
  logger.success(`Resolved: ${batch.resolved.length} → ${args.output}`)
  if (batch.unresolved.length > 0) {
    logger.log(`   Unresolved: ${batch.unresolved.length} → ${args.failures}`)
    for (const row of batch.unresolved) {
      logger.log(`     - (${row.latitude}, ${row.longitude})`)
    }
  } else {
    logger.log(`   Unresolved: 0 → ${args.failures}`)
  }
}
