import { existsSync } from 'node:fs'
import { silentLogger, type Logger } from '../logger'
import {
  CATEGORY_COLUMN,
  REQUIRED_COLUMNS,
  columnIndex,
  detectLoadOptions,
  loadTable,
  type LoadOptions,
  type RequiredColumn,
  type Table
} from './csv-service'

export type SummaryErrorCode = 'FILE_NOT_FOUND' | 'MISSING_COLUMN' | 'NO_VALID_DATA' | 'UNKNOWN'

export type Summary =
  | { kind: 'by-category'; means: Map<string, number> }
  | { kind: 'overall'; totalSum: number; averageSum: number; recordCount: number }

export type SummaryPayload =
  | { summary_by_category: Record<string, number> }
  | { total_sum: number; average_sum: number; record_count: number }

export interface ErrorPayload {
  error: string
}

export interface RowStats {
  processedRows: number
  skippedRows: number
  invalidFieldStats: Record<RequiredColumn, number>
}

export type SummaryRunResult =
  | ({ success: true; summary: Summary } & RowStats)
  | ({ success: false; errorCode: SummaryErrorCode; message: string; missingColumn?: RequiredColumn } & RowStats)

export interface SummaryRunOptions extends LoadOptions {
  logger?: Logger
}

export interface CleanRecord {
  value1: number
  value2: number
  category: string | null
}

export const NO_VALID_DATA_MESSAGE = 'No valid numeric data found for processing after cleaning.'
export const OVERFLOW_DETAIL = 'Value1 + Value2 aggregates overflow to a non-finite number.'

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const emptyStats = (): RowStats => ({
  processedRows: 0,
  skippedRows: 0,
  invalidFieldStats: { Value1: 0, Value2: 0 }
})

/**
 * Best-effort decimal parse. Anything that is not a plain finite decimal
 * literal is missing.
 */
const coerceNumeric = (value: string | undefined): number | null => {
  if (value === undefined) {
    return null
  }

  const cleaned = value.trim()
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return null
  }

  const num = Number(cleaned)
  return Number.isFinite(num) ? num : null
}

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

const cleanTable = (table: Table): { records: CleanRecord[] } & RowStats => {
  const value1Index = columnIndex(table, 'Value1')
  const value2Index = columnIndex(table, 'Value2')
  const categoryIndex = columnIndex(table, CATEGORY_COLUMN)

  const stats = emptyStats()
  const records: CleanRecord[] = []

  for (const row of table.rows) {
    stats.processedRows += 1

    const value1 = coerceNumeric(row[value1Index])
    const value2 = coerceNumeric(row[value2Index])
    if (value1 === null) {
      stats.invalidFieldStats.Value1 += 1
    }
    if (value2 === null) {
      stats.invalidFieldStats.Value2 += 1
    }
    if (value1 === null || value2 === null) {
      stats.skippedRows += 1
      continue
    }

    const category = categoryIndex >= 0 ? row[categoryIndex] ?? '' : ''
    records.push({ value1, value2, category: category === '' ? null : category })
  }

  return { records, ...stats }
}

export const summarizeRecords = (records: CleanRecord[], groupByCategory: boolean): Summary => {
  const sums = records.map((record) => ({ category: record.category, sum: record.value1 + record.value2 }))

  if (groupByCategory) {
    const groups = new Map<string, { total: number; count: number }>()
    for (const { category, sum } of sums) {
      if (category === null) {
        continue
      }
      const group = groups.get(category) ?? { total: 0, count: 0 }
      group.total += sum
      group.count += 1
      groups.set(category, group)
    }

    const means = new Map<string, number>()
    for (const key of [...groups.keys()].sort(compareKeys)) {
      const group = groups.get(key)
      if (group) {
        means.set(key, group.total / group.count)
      }
    }
    return { kind: 'by-category', means }
  }

  let totalSum = 0
  for (const { sum } of sums) {
    totalSum += sum
  }
  return {
    kind: 'overall',
    totalSum,
    averageSum: totalSum / sums.length,
    recordCount: sums.length
  }
}

const isFiniteSummary = (summary: Summary): boolean => {
  switch (summary.kind) {
    case 'by-category':
      return [...summary.means.values()].every((mean) => Number.isFinite(mean))
    case 'overall':
      return Number.isFinite(summary.totalSum) && Number.isFinite(summary.averageSum)
  }
}

export const toSummaryPayload = (summary: Summary): SummaryPayload => {
  switch (summary.kind) {
    case 'by-category':
      return { summary_by_category: Object.fromEntries(summary.means) }
    case 'overall':
      return {
        total_sum: summary.totalSum,
        average_sum: summary.averageSum,
        record_count: summary.recordCount
      }
  }
}

export const toPayload = (result: SummaryRunResult): SummaryPayload | ErrorPayload => {
  return result.success ? toSummaryPayload(result.summary) : { error: result.message }
}

export const formatPayload = (payload: SummaryPayload | ErrorPayload): string => {
  return JSON.stringify(payload, null, 2)
}

export const notFoundMessage = (sourcePath: string): string =>
  `Error: Input file '${sourcePath}' not found. Please ensure data.csv exists.`

export const missingColumnMessage = (column: RequiredColumn, sourcePath: string): string =>
  `Error: Required column '${column}' not found in '${sourcePath}'.`

export const unexpectedMessage = (error: unknown): string =>
  `An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`

export const runSummary = async (
  sourcePath: string,
  options: SummaryRunOptions = {}
): Promise<SummaryRunResult> => {
  const logger = options.logger ?? silentLogger

  const fail = (
    errorCode: SummaryErrorCode,
    message: string,
    stats: RowStats = emptyStats(),
    missingColumn?: RequiredColumn
  ): SummaryRunResult => {
    logger.warn(`${errorCode}: ${message}`)
    return { success: false, errorCode, message, missingColumn, ...stats }
  }

  try {
    if (!existsSync(sourcePath)) {
      return fail('FILE_NOT_FOUND', notFoundMessage(sourcePath))
    }

    const loadOptions = await detectLoadOptions(sourcePath, options)
    logger.debug(
      `reading ${sourcePath} as ${loadOptions.encoding} with delimiter ${JSON.stringify(loadOptions.delimiter)}`
    )
    const table = await loadTable(sourcePath, loadOptions)

    for (const column of REQUIRED_COLUMNS) {
      if (columnIndex(table, column) < 0) {
        return fail('MISSING_COLUMN', missingColumnMessage(column, sourcePath), emptyStats(), column)
      }
    }

    const { records, ...stats } = cleanTable(table)
    logger.info(
      `processed ${stats.processedRows} rows, dropped ${stats.skippedRows} ` +
        `(Value1 invalid: ${stats.invalidFieldStats.Value1}, Value2 invalid: ${stats.invalidFieldStats.Value2})`
    )

    if (records.length === 0) {
      return fail('NO_VALID_DATA', NO_VALID_DATA_MESSAGE, stats)
    }

    const hasCategory = columnIndex(table, CATEGORY_COLUMN) >= 0
    const summary = summarizeRecords(records, hasCategory)
    // JSON has no Infinity; it would print as null
    if (!isFiniteSummary(summary)) {
      return fail('UNKNOWN', unexpectedMessage(new RangeError(OVERFLOW_DETAIL)), stats)
    }
    return { success: true, summary, ...stats }
  } catch (error) {
    return fail('UNKNOWN', unexpectedMessage(error))
  }
}

export const __internal__ = {
  coerceNumeric,
  cleanTable,
  isFiniteSummary,
  compareKeys
}
