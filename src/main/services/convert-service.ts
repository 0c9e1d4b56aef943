import { createWriteStream, existsSync } from 'node:fs'
import { basename, dirname, extname, join } from 'node:path'
import { stringify } from 'csv-stringify'
import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc'
import ExcelJS from 'exceljs'
import type { CellValue, Worksheet } from 'exceljs'
import { silentLogger, type Logger } from '../logger'
import { unexpectedMessage } from './summary-service'

dayjs.extend(utc)

export type ConvertErrorCode = 'FILE_NOT_FOUND' | 'SHEET_NOT_FOUND' | 'UNKNOWN'

export type ConvertRunResult =
  | { success: true; outputPath: string; rowCount: number }
  | { success: false; errorCode: ConvertErrorCode; message: string }

export interface ConvertOptions {
  sheet?: string
  logger?: Logger
}

const getOutputPath = (inputPath: string): string => {
  const fileName = basename(inputPath, extname(inputPath))
  return join(dirname(inputPath), `${fileName}.csv`)
}

const cellToText = (value: CellValue): string => {
  if (value === null || value === undefined) {
    return ''
  }
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : ''
  }
  if (typeof value === 'boolean') {
    return value ? 'True' : 'False'
  }
  if (value instanceof Date) {
    return dayjs.utc(value).format('YYYY-MM-DD HH:mm:ss')
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('')
  }
  if ('hyperlink' in value) {
    return value.text
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return cellToText(value.result)
  }
  // error cells
  return ''
}

const readSheetRows = (worksheet: Worksheet): string[][] => {
  const rows: string[][] = []
  const width = worksheet.columnCount

  worksheet.eachRow({ includeEmpty: false }, (row) => {
    const cells: string[] = []
    for (let column = 1; column <= width; column += 1) {
      cells.push(cellToText(row.getCell(column).value))
    }
    rows.push(cells)
  })

  return rows
}

const writeCsvFile = async (outputPath: string, rows: string[][]): Promise<void> => {
  await new Promise<void>((resolve, reject) => {
    const writer = createWriteStream(outputPath)
    const stringifier = stringify({ delimiter: ',' })

    writer.on('finish', () => resolve())
    writer.on('error', reject)
    stringifier.on('error', reject)

    stringifier.pipe(writer)

    for (const row of rows) {
      stringifier.write(row)
    }

    stringifier.end()
  })
}

export const convertWorkbookToCsv = async (
  inputPath: string,
  outputPath: string = getOutputPath(inputPath),
  options: ConvertOptions = {}
): Promise<ConvertRunResult> => {
  const logger = options.logger ?? silentLogger

  try {
    if (!existsSync(inputPath)) {
      return {
        success: false,
        errorCode: 'FILE_NOT_FOUND',
        message: `Error: Workbook '${inputPath}' not found.`
      }
    }

    const workbook = new ExcelJS.Workbook()
    await workbook.xlsx.readFile(inputPath)

    const worksheet = options.sheet ? workbook.getWorksheet(options.sheet) : workbook.worksheets[0]
    if (!worksheet) {
      return {
        success: false,
        errorCode: 'SHEET_NOT_FOUND',
        message: `Error: Worksheet '${options.sheet ?? ''}' not found in '${inputPath}'.`
      }
    }

    const rows = readSheetRows(worksheet)
    await writeCsvFile(outputPath, rows)
    logger.info(`wrote ${rows.length} rows from sheet ${worksheet.name} to ${outputPath}`)

    return { success: true, outputPath, rowCount: rows.length }
  } catch (error) {
    const message = unexpectedMessage(error)
    logger.warn(`UNKNOWN: ${message}`)
    return { success: false, errorCode: 'UNKNOWN', message }
  }
}

export const __internal__ = {
  cellToText,
  getOutputPath
}
