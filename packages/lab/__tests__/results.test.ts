import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { lastRow, parseCsvLine, readMetric } from '../src/results.js'

describe('parseCsvLine', () => {
  it('splits and trims plain fields', () => {
    expect(parseCsvLine('freq, volts ,phase')).toEqual(['freq', 'volts', 'phase'])
  })

  it('handles quoted commas and doubled quotes', () => {
    expect(parseCsvLine('a,"b,c","d ""q"""')).toEqual(['a', 'b,c', 'd "q"'])
  })

  it('keeps empty fields', () => {
    expect(parseCsvLine('1,,3')).toEqual(['1', '', '3'])
  })
})

describe('lastRow', () => {
  it('maps the header onto the last data row', () => {
    expect(lastRow('freq,volts\n100,2.5\n200,4.5\n')).toEqual({ freq: '200', volts: '4.5' })
  })

  it('ignores blank lines and CRLF endings', () => {
    expect(lastRow('freq,volts\r\n100,2.5\r\n\r\n')).toEqual({ freq: '100', volts: '2.5' })
  })

  it('returns undefined without a data row', () => {
    expect(lastRow('freq,volts\n')).toBeUndefined()
    expect(lastRow('')).toBeUndefined()
  })

  it('fills missing trailing values with empty strings', () => {
    expect(lastRow('a,b,c\n1,2\n')).toEqual({ a: '1', b: '2', c: '' })
  })
})

describe('readMetric', () => {
  let tmpDir: string

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'simforge-results-'))
  })

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true })
  })

  function write(content: string): string {
    const file = path.join(tmpDir, 'current_run.csv')
    fs.writeFileSync(file, content)
    return file
  }

  it('reads the metric from the last row', () => {
    expect(readMetric(write('freq,volts\n1e5,12\n1e6,1500.5\n'), 'volts')).toBe(1500.5)
  })

  it('returns undefined for a missing file', () => {
    expect(readMetric(path.join(tmpDir, 'absent.csv'), 'volts')).toBeUndefined()
  })

  it('returns undefined when the artifact path is a directory', () => {
    const dir = path.join(tmpDir, 'current_run.csv')
    fs.mkdirSync(dir)
    expect(readMetric(dir, 'volts')).toBeUndefined()
  })

  it('returns undefined for a missing column', () => {
    expect(readMetric(write('freq,amps\n1,2\n'), 'volts')).toBeUndefined()
  })

  it('returns undefined for an empty or non-numeric value', () => {
    expect(readMetric(write('freq,volts\n1,\n'), 'volts')).toBeUndefined()
    expect(readMetric(write('freq,volts\n1,n/a\n'), 'volts')).toBeUndefined()
  })
})
