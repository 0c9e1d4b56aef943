import { Command, CommanderError } from 'commander'
import { normalizeDelimiter, resolveConfig, type AppConfig } from './config'
import { createLogger, type Logger, type LogLevel } from './logger'
import { previewAndValidateCsv } from './services/csv-service'
import { convertWorkbookToCsv } from './services/convert-service'
import { formatPayload, runSummary, toPayload, unexpectedMessage } from './services/summary-service'

export interface CliIo {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

interface LogFlags {
  verbose?: boolean
  quiet?: boolean
}

interface SummarizeFlags extends LogFlags {
  encoding?: string
  delimiter?: string
}

interface ConvertFlags extends LogFlags {
  sheet?: string
}

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text)
  },
  stderr: (text) => {
    process.stderr.write(text)
  }
}

const pickLevel = (flags: LogFlags, fallback: LogLevel): LogLevel => {
  if (flags.quiet) {
    return 'silent'
  }
  return flags.verbose ? 'debug' : fallback
}

const printJson = (io: CliIo, value: unknown): void => {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`)
}

export const createProgram = (
  io: CliIo,
  config: AppConfig,
  setExitCode: (code: number) => void
): Command => {
  const program = new Command()
  const loggerFor = (flags: LogFlags): Logger =>
    createLogger(pickLevel(flags, config.logLevel), { write: (line) => io.stderr(`${line}\n`) })

  program
    .name('csv-summary')
    .description('Validate a delimited file and print a JSON summary of Value1 + Value2')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text)
    })

  program
    .command('summarize', { isDefault: true })
    .description('Summarize Value1 + Value2 overall or per Category')
    .argument('[source]', 'delimited input file', config.defaultSource)
    .option('-e, --encoding <name>', 'input encoding (detected when omitted)', config.encoding)
    .option('-d, --delimiter <char>', 'field delimiter (detected when omitted)', config.delimiter)
    .option('-v, --verbose', 'log details to stderr')
    .option('-q, --quiet', 'log nothing')
    .action(async (source: string, flags: SummarizeFlags) => {
      const result = await runSummary(source, {
        encoding: flags.encoding,
        delimiter: normalizeDelimiter(flags.delimiter),
        logger: loggerFor(flags)
      })
      io.stdout(`${formatPayload(toPayload(result))}\n`)
      setExitCode(result.success ? EXIT_SUCCESS : EXIT_FAILURE)
    })

  program
    .command('inspect')
    .description('Report encoding, delimiter, header and required columns of a delimited file')
    .argument('<source>', 'delimited input file')
    .option('-e, --encoding <name>', 'input encoding (detected when omitted)', config.encoding)
    .option('-d, --delimiter <char>', 'field delimiter (detected when omitted)', config.delimiter)
    .action(async (source: string, flags: SummarizeFlags) => {
      try {
        const report = await previewAndValidateCsv(source, {
          encoding: flags.encoding,
          delimiter: normalizeDelimiter(flags.delimiter)
        })
        printJson(io, report)
        setExitCode(report.requiredColumnsFound ? EXIT_SUCCESS : EXIT_FAILURE)
      } catch (error) {
        printJson(io, { error: unexpectedMessage(error) })
        setExitCode(EXIT_FAILURE)
      }
    })

  program
    .command('convert')
    .description('Write a worksheet of an .xlsx workbook as a comma-separated file')
    .argument('<workbook>', '.xlsx workbook')
    .argument('[output]', 'output path (defaults to the workbook name with .csv)')
    .option('-s, --sheet <name>', 'worksheet name (defaults to the first sheet)')
    .option('-v, --verbose', 'log details to stderr')
    .option('-q, --quiet', 'log nothing')
    .action(async (workbook: string, output: string | undefined, flags: ConvertFlags) => {
      const result = await convertWorkbookToCsv(workbook, output, {
        sheet: flags.sheet,
        logger: loggerFor(flags)
      })
      if (result.success) {
        printJson(io, { outputPath: result.outputPath, rowCount: result.rowCount })
        setExitCode(EXIT_SUCCESS)
      } else {
        printJson(io, { error: result.message })
        setExitCode(EXIT_FAILURE)
      }
    })

  return program
}

/**
 * Runs one command and resolves to the process exit status. Never rejects.
 */
export const runCli = async (
  argv: string[],
  io: CliIo = defaultIo,
  config: AppConfig = resolveConfig()
): Promise<number> => {
  let exitCode = EXIT_SUCCESS
  const program = createProgram(io, config, (code) => {
    exitCode = code
  })

  try {
    await program.parseAsync(argv, { from: 'user' })
    return exitCode
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    io.stdout(`${formatPayload({ error: unexpectedMessage(error) })}\n`)
    return EXIT_FAILURE
  }
}
