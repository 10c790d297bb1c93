/**
 * Input Tables
 *
 * Parse the two CSV inputs into records. Unusable rows are skipped and
 * counted; rows that look like data but cannot be read produce a warning.
 * Only an unreadable file is fatal, never a single bad row.
 */

import { parse } from 'csv-parse/sync'
import type { CoordinateInputRecord, ForwardInputRecord } from '../types'

export interface ParsedInput<T> {
  readonly records: T[]
  /** Rows dropped without appearing in any output */
  readonly skipped: number
  readonly warnings: string[]
}

const FORWARD_COLUMN_COUNT = 2

interface RawTable {
  readonly rows: string[][]
  /** Records the parser could not read */
  readonly malformed: number
  readonly warnings: string[]
}

function readRows(text: string): RawTable {
  const warnings: string[] = []
  let malformed = 0
  const rows: string[][] = parse(text, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
    on_skip: (err) => {
      malformed++
      warnings.push(`Skipping malformed row: ${err ? err.message : 'unreadable record'}`)
    }
  })
  return { rows, malformed, warnings }
}

/**
 * Parse the shop/address table: column 0 is the business name, column 1 the
 * apparent address. The header row is skipped.
 */
export function parseForwardTable(text: string): ParsedInput<ForwardInputRecord> {
  const table = readRows(text)
  const [, ...rows] = table.rows
  const records: ForwardInputRecord[] = []
  let skipped = table.malformed

  for (const row of rows) {
    const padded = [...row]
    while (padded.length < FORWARD_COLUMN_COUNT) {
      padded.push('')
    }
    const businessName = (padded[0] ?? '').trim()
    const apparentAddress = (padded[1] ?? '').trim().replace(/,+$/, '').trim()

    if (!businessName && !apparentAddress) {
      skipped++
      continue
    }
    records.push({ businessName, apparentAddress })
  }

  return { records, skipped, warnings: table.warnings }
}

function parseCoordinate(value: string): number | null {
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Parse the coordinate table, locating `Latitude` and `Longitude` by header name.
 */
export function parseCoordinateTable(text: string): ParsedInput<CoordinateInputRecord> {
  const table = readRows(text)
  const [header = [], ...rows] = table.rows
  const columns = header.map((name) => name.trim())
  const latIndex = columns.indexOf('Latitude')
  const lonIndex = columns.indexOf('Longitude')

  if (latIndex === -1 || lonIndex === -1) {
    return {
      records: [],
      skipped: rows.length + table.malformed,
      warnings: [...table.warnings, 'Input has no Latitude/Longitude columns; every row skipped']
    }
  }

  const records: CoordinateInputRecord[] = []
  const warnings = [...table.warnings]
  let skipped = table.malformed

  for (const row of rows) {
    const rawLat = (row[latIndex] ?? '').trim()
    const rawLon = (row[lonIndex] ?? '').trim()
    if (!rawLat && !rawLon) {
      skipped++
      continue
    }
    if (!rawLat || !rawLon) {
      skipped++
      warnings.push(`Skipping missing coordinates: lat=${JSON.stringify(rawLat)} lon=${JSON.stringify(rawLon)}`)
      continue
    }

    const latitude = parseCoordinate(rawLat)
    const longitude = parseCoordinate(rawLon)
    if (latitude === null || longitude === null) {
      skipped++
      warnings.push(`Skipping invalid coordinates: lat=${JSON.stringify(rawLat)} lon=${JSON.stringify(rawLon)}`)
      continue
    }
    records.push({ latitude, longitude })
  }

  return { records, skipped, warnings }
}
