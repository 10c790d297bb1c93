/**
 * Geocode Command
 *
 * Forward geocodes a Business Name / Apparent Address table.
 * Resolved rows go to the import file; the rest to the failures file for manual work.
 */

import { runForwardBatch } from '../../batch/index'
import { exportToCSV } from '../../export/index'
import { parseForwardTable } from '../../input/index'
import { RESOLVED_COLUMNS, UNRESOLVED_COLUMNS } from '../../types'
import type { CLIArgs } from '../args'
import { createResolverServices, createServiceContext } from '../context'
import { formatAttempt, initCommand, truncate } from '../helpers'
import { writeOutputFile } from '../io'
import type { Logger } from '../logger'

const LABEL_LENGTH = 60

export async function cmdGeocode(args: CLIArgs, logger: Logger): Promise<void> {
  const { settings, text } = await initCommand('Geocode', args, logger)

  const parsed = parseForwardTable(text)
  for (const warning of parsed.warnings) {
    logger.warn(warning)
  }
  logger.log(`   ${parsed.records.length} records (${parsed.skipped} rows skipped)`)

  // Dry run: show counts and exit
  if (args.dryRun) {
    logger.log('\n📊 Geocoding Estimate (dry run)')
    logger.log(`   Records to resolve: ${parsed.records.length}`)
    logger.log(`   Rows skipped: ${parsed.skipped}`)
    return
  }

  const ctx = createServiceContext(settings, { webSearch: args.webSearch })
  if (ctx.countryWarning) {
    logger.warn(ctx.countryWarning)
  }
  if (ctx.webSearchDisabledReason) {
    logger.log(`   Web search fallback disabled: ${ctx.webSearchDisabledReason}`)
  }

  logger.log('')
  const batch = await runForwardBatch(parsed.records, createResolverServices(ctx), {
    onRecordStart: ({ index, total, record }) => {
      const label = record.businessName || record.apparentAddress
      logger.progress(truncate(label, LABEL_LENGTH), index + 1, total)
    },
    onRecordComplete: ({ outcome }) => {
      for (const attempt of outcome.attempts) {
        if (attempt.error) {
          logger.warn(formatAttempt(attempt))
        } else {
          logger.verbose(formatAttempt(attempt))
        }
      }
      if (outcome.kind === 'resolved') {
        logger.verbose(
          `resolved via ${outcome.strategy}: ${outcome.fix.latitude}, ${outcome.fix.longitude}`
        )
      } else {
        logger.verbose(outcome.reason)
      }
    }
  })

  await writeOutputFile(args.output, exportToCSV(RESOLVED_COLUMNS, batch.resolved))
  await writeOutputFile(args.failures, exportToCSV(UNRESOLVED_COLUMNS, batch.unresolved))

  // Summary
  logger.log('\n📊 Geocoding Results')
  logger.success(`Resolved: ${batch.resolved.length} → ${args.output}`)
  if (batch.unresolved.length > 0) {
    logger.log(`   Manual geocoding needed: ${batch.unresolved.length} → ${args.failures}`)
    for (const row of batch.unresolved) {
      logger.log(`     - ${row.associated_shop || '(no name)'}: ${row.street_address || '(no address)'}`)
    }
  } else {
    logger.log(`   Unresolved: 0 → ${args.failures}`)
  }
}
