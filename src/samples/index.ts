/**
 * Sample Source
 *
 * Loads samples from a CSV file with a header row. The id, text and label
 * columns become Sample fields; every other column goes to metadata.
 */

import { readFileSync } from 'node:fs'
import { parse } from 'csv-parse/sync'
import type { Sample } from '../types'

export interface SampleColumns {
  /** Default: sample_id */
  readonly id?: string | undefined
  /** Default: text */
  readonly payload?: string | undefined
  /** Default: label */
  readonly referenceLabel?: string | undefined
}

export const DEFAULT_COLUMNS = {
  id: 'sample_id',
  payload: 'text',
  referenceLabel: 'label'
} as const

export class SampleLoadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SampleLoadError'
  }
}

function toRows(parsed: unknown): Record<string, string>[] {
  if (!Array.isArray(parsed)) {
    throw new SampleLoadError('CSV did not parse into rows')
  }

  return parsed.map((row: unknown) => {
    const record: Record<string, string> = {}
    if (typeof row === 'object' && row !== null) {
      for (const [key, value] of Object.entries(row)) {
        if (typeof value === 'string') record[key] = value
      }
    }
    return record
  })
}

/**
 * Parse samples from CSV text.
 *
 * Rows without an id get `row_<n>` (n = 1-based data row). Duplicate ids and
 * empty text are errors.
 */
export function parseSamplesCsv(content: string, columns: SampleColumns = {}): Sample[] {
  const idColumn = columns.id ?? DEFAULT_COLUMNS.id
  const payloadColumn = columns.payload ?? DEFAULT_COLUMNS.payload
  const labelColumn = columns.referenceLabel ?? DEFAULT_COLUMNS.referenceLabel

  const rows = toRows(
    parse(content, { columns: true, skip_empty_lines: true, trim: true, bom: true })
  )

  const first = rows[0]
  if (first) {
    for (const column of [payloadColumn, labelColumn]) {
      if (!(column in first)) {
        throw new SampleLoadError(`Missing required column: ${column}`)
      }
    }
  }

  const seen = new Set<string>()
  const samples: Sample[] = []

  for (const [index, row] of rows.entries()) {
    const rowNumber = index + 1
    const id = row[idColumn] || `row_${rowNumber}`
    const payload = row[payloadColumn] ?? ''
    const referenceLabel = row[labelColumn] ?? ''

    if (seen.has(id)) {
      throw new SampleLoadError(`Duplicate sample id "${id}" at row ${rowNumber}`)
    }
    if (!payload) {
      throw new SampleLoadError(`Empty ${payloadColumn} at row ${rowNumber} (${id})`)
    }
    seen.add(id)

    const metadata: Record<string, string> = {}
    for (const [key, value] of Object.entries(row)) {
      if (key !== idColumn && key !== payloadColumn && key !== labelColumn) {
        metadata[key] = value
      }
    }

    samples.push({ id, payload, referenceLabel, metadata })
  }

  return samples
}

/**
 * Load samples from a CSV file.
 */
export function loadSamplesFromCsv(path: string, columns: SampleColumns = {}): Sample[] {
  return parseSamplesCsv(readFileSync(path, 'utf-8'), columns)
}

/**
 * Dataset name used in default log file names: the file's base name
 * without extension.
 */
export function datasetName(path: string): string {
  const base = path.split(/[\\/]/).pop() ?? path
  return base.replace(/\.[^.]+$/, '') || base
}
