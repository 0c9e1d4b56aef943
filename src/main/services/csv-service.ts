import { createReadStream, existsSync } from 'node:fs'
import type { Readable } from 'node:stream'
import { parse, type Options } from 'csv-parse'
import { parse as parseSync } from 'csv-parse/sync'
import iconv from 'iconv-lite'
import jschardet from 'jschardet'

export const REQUIRED_COLUMNS = ['Value1', 'Value2'] as const
export const CATEGORY_COLUMN = 'Category'

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number]

export interface Table {
  header: string[]
  rows: string[][]
}

export interface LoadOptions {
  encoding?: string
  delimiter?: string
}

export interface ValidationResult {
  encoding: string
  delimiter: string
  header: string[]
  previewRows: string[][]
  requiredColumnsFound: boolean
  missingColumns: RequiredColumn[]
  hasCategory: boolean
}

interface DetectionResult {
  encoding: string
  delimiter: string
  previewRows: string[][]
}

const DEFAULT_DELIMITER = ','
const DEFAULT_ENCODING = 'utf-8'
const PREVIEW_ROWS = 10
const DELIMITER_CANDIDATES = [',', ';', '\t', '|'] as const
const DELIMITER_SAMPLE_LINES = 20
const MAX_RECORD_SIZE = 1024 * 1024

const normalizeHeader = (value: string): string => value.replace(/^\uFEFF/, '')

const normalizeEncoding = (encoding: string | null | undefined): string => {
  const lower = encoding ? encoding.toLowerCase() : DEFAULT_ENCODING
  if (lower === 'ascii' || lower === 'windows-1252') {
    return DEFAULT_ENCODING
  }
  if (lower === 'gb2312') {
    return 'gb18030'
  }
  return lower
}

/**
 * Picks the candidate that splits the header into the most consistent
 * table: the header must yield at least two cells, and every sampled line
 * of the same width adds a point. Earlier candidates win ties.
 */
const detectDelimiter = (sample: string): string => {
  const lines = sample
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(0, DELIMITER_SAMPLE_LINES)

  const [header, ...rest] = lines
  if (header === undefined) {
    return DEFAULT_DELIMITER
  }

  let best = DEFAULT_DELIMITER
  let bestScore = 0
  for (const candidate of DELIMITER_CANDIDATES) {
    const width = header.split(candidate).length
    if (width < 2) {
      continue
    }
    const score = 1 + rest.filter((line) => line.split(candidate).length === width).length
    if (score > bestScore) {
      best = candidate
      bestScore = score
    }
  }
  return best
}

const readFileHeadBuffer = async (filePath: string, maxBytes = 256 * 1024): Promise<Buffer> => {
  return await new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let total = 0

    const stream = createReadStream(filePath, { highWaterMark: 64 * 1024 })

    stream.on('data', (chunk: Buffer | string) => {
      const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
      const available = maxBytes - total
      const sliced = data.length > available ? data.subarray(0, available) : data
      chunks.push(sliced)
      total += sliced.length
      if (total >= maxBytes) {
        stream.destroy()
      }
    })

    stream.on('close', () => {
      resolve(Buffer.concat(chunks))
    })

    stream.on('error', reject)
  })
}

const rowParserOptions = (delimiter: string): Options => ({
  delimiter,
  relax_quotes: true,
  relax_column_count: true,
  skip_empty_lines: true,
  max_record_size: MAX_RECORD_SIZE
})

/**
 * Header plus at most `maxRows` data rows of an in-memory sample.
 */
const parseCsvText = (text: string, delimiter: string, maxRows: number): string[][] => {
  const rows: string[][] = parseSync(text, { ...rowParserOptions(delimiter), to: maxRows + 1 })
  return rows
}

const detectCsv = async (filePath: string, options: LoadOptions = {}): Promise<DetectionResult> => {
  const headBuffer = await readFileHeadBuffer(filePath)
  const encoding = options.encoding
    ? options.encoding.toLowerCase()
    : normalizeEncoding(jschardet.detect(headBuffer).encoding)

  const text = iconv.decode(headBuffer, encoding)
  const delimiter = options.delimiter || detectDelimiter(text)
  const previewRows = parseCsvText(text, delimiter, PREVIEW_ROWS)

  return { encoding, delimiter, previewRows }
}

const getMissingColumns = (header: string[]): RequiredColumn[] => {
  const set = new Set(header.map(normalizeHeader))
  return REQUIRED_COLUMNS.filter((column) => !set.has(column))
}

/**
 * Index of the first header cell named `name`, or -1.
 */
export const columnIndex = (table: Table, name: string): number => table.header.indexOf(name)

export const previewAndValidateCsv = async (
  filePath: string,
  options: LoadOptions = {}
): Promise<ValidationResult> => {
  if (!existsSync(filePath)) {
    return {
      encoding: options.encoding ?? DEFAULT_ENCODING,
      delimiter: options.delimiter ?? DEFAULT_DELIMITER,
      header: [],
      previewRows: [],
      requiredColumnsFound: false,
      missingColumns: [...REQUIRED_COLUMNS],
      hasCategory: false
    }
  }

  const detected = await detectCsv(filePath, options)
  const header = (detected.previewRows[0] ?? []).map(normalizeHeader)
  const missingColumns = getMissingColumns(header)

  return {
    encoding: detected.encoding,
    delimiter: detected.delimiter,
    header,
    previewRows: detected.previewRows.slice(1),
    requiredColumnsFound: missingColumns.length === 0,
    missingColumns,
    hasCategory: header.includes(CATEGORY_COLUMN)
  }
}

/**
 * Reads the whole file into memory. The first parsed row is the header.
 * Rejects when the file has no rows at all, and destroys the source stream
 * on every error.
 */
export const loadTable = async (
  filePath: string,
  options: Required<LoadOptions>,
  open: (filePath: string) => Readable = createReadStream
): Promise<Table> => {
  const rows: string[][] = []

  await new Promise<void>((resolve, reject) => {
    const decoder = iconv.decodeStream(options.encoding)
    const fileStream = open(filePath)
    const parser = parse(rowParserOptions(options.delimiter))

    const fail = (error: Error): void => {
      fileStream.destroy()
      reject(error)
    }

    parser.on('readable', () => {
      let row: string[] | null
      while ((row = parser.read()) !== null) {
        rows.push(row)
      }
    })

    parser.on('end', () => resolve())
    parser.on('error', fail)
    decoder.on('error', fail)
    fileStream.on('error', fail)

    fileStream.pipe(decoder).pipe(parser)
  })

  const [header, ...body] = rows
  if (!header) {
    throw new Error('No columns to parse from file')
  }

  return { header: header.map(normalizeHeader), rows: body }
}

export const detectLoadOptions = async (
  filePath: string,
  options: LoadOptions = {}
): Promise<Required<LoadOptions>> => {
  const { encoding, delimiter } = await detectCsv(filePath, options)
  return { encoding, delimiter }
}

export const __internal__ = {
  normalizeHeader,
  normalizeEncoding,
  detectDelimiter,
  getMissingColumns,
  parseCsvText
}
