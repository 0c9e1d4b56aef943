import { describe, expect, it } from 'vitest'
import { DEFAULT_SOURCE, normalizeDelimiter, resolveConfig } from './config'

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({})).toEqual({
      defaultSource: DEFAULT_SOURCE,
      logLevel: 'warn',
      encoding: undefined,
      delimiter: undefined
    })
  })

  it('reads overrides from the environment', () => {
    expect(
      resolveConfig({
        CSV_SUMMARY_SOURCE: 'exports/latest.csv',
        CSV_SUMMARY_LOG_LEVEL: 'DEBUG',
        CSV_SUMMARY_ENCODING: 'gb18030',
        CSV_SUMMARY_DELIMITER: ';'
      })
    ).toEqual({
      defaultSource: 'exports/latest.csv',
      logLevel: 'debug',
      encoding: 'gb18030',
      delimiter: ';'
    })
  })

  it('ignores blank values and unknown log levels', () => {
    const config = resolveConfig({
      CSV_SUMMARY_SOURCE: '   ',
      CSV_SUMMARY_LOG_LEVEL: 'chatty',
      CSV_SUMMARY_ENCODING: ''
    })
    expect(config.defaultSource).toBe('data.csv')
    expect(config.logLevel).toBe('warn')
    expect(config.encoding).toBeUndefined()
  })
})

describe('normalizeDelimiter', () => {
  it('maps tab spellings to a tab character', () => {
    expect(normalizeDelimiter('tab')).toBe('\t')
    expect(normalizeDelimiter('\\t')).toBe('\t')
    expect(normalizeDelimiter('|')).toBe('|')
    expect(normalizeDelimiter('')).toBeUndefined()
    expect(normalizeDelimiter(undefined)).toBeUndefined()
  })
})
