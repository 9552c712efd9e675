import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { datasetName, loadSamplesFromCsv, parseSamplesCsv, SampleLoadError } from './index'

describe('parseSamplesCsv', () => {
  it('maps the standard columns and keeps the rest as metadata', () => {
    const csv = [
      'sample_id,text,label,source',
      'S1,Sells fresh bread and pastries,10710,survey',
      'S2,"Repairs cars, vans and trucks",45200,register'
    ].join('\n')

    expect(parseSamplesCsv(csv)).toEqual([
      {
        id: 'S1',
        payload: 'Sells fresh bread and pastries',
        referenceLabel: '10710',
        metadata: { source: 'survey' }
      },
      {
        id: 'S2',
        payload: 'Repairs cars, vans and trucks',
        referenceLabel: '45200',
        metadata: { source: 'register' }
      }
    ])
  })

  it('generates row ids when the id column is missing or empty', () => {
    const csv = 'sample_id,text,label\n,First row,1\nS2,Second row,2\n,Third row,3'

    expect(parseSamplesCsv(csv).map((s) => s.id)).toEqual(['row_1', 'S2', 'row_3'])
  })

  it('generates row ids when the file has no id column', () => {
    const csv = 'text,label\nFirst row,1\nSecond row,2'

    expect(parseSamplesCsv(csv).map((s) => s.id)).toEqual(['row_1', 'row_2'])
  })

  it('supports custom column names', () => {
    const csv = 'job_id,job_description,code\nJ1,Teaches maths,85310'

    const [sample] = parseSamplesCsv(csv, {
      id: 'job_id',
      payload: 'job_description',
      referenceLabel: 'code'
    })

    expect(sample).toEqual({
      id: 'J1',
      payload: 'Teaches maths',
      referenceLabel: '85310',
      metadata: {}
    })
  })

  it('rejects duplicate ids', () => {
    const csv = 'sample_id,text,label\nS1,One,1\nS1,Two,2'

    expect(() => parseSamplesCsv(csv)).toThrow('Duplicate sample id "S1" at row 2')
  })

  it('rejects empty text', () => {
    const csv = 'sample_id,text,label\nS1,,1'

    expect(() => parseSamplesCsv(csv)).toThrow(SampleLoadError)
    expect(() => parseSamplesCsv(csv)).toThrow('Empty text at row 1 (S1)')
  })

  it('rejects a file without the text column', () => {
    const csv = 'sample_id,description,label\nS1,One,1'

    expect(() => parseSamplesCsv(csv)).toThrow('Missing required column: text')
  })

  it('returns no samples for a header-only file', () => {
    expect(parseSamplesCsv('sample_id,text,label\n')).toEqual([])
  })
})

describe('loadSamplesFromCsv', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'label-sweep-samples-test-'))
  })

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  it('reads a file with a byte order mark', () => {
    const path = join(tempDir, 'retail.csv')
    writeFileSync(path, '\uFEFFsample_id,text,label\nS1,Sells shoes,47720\n')

    expect(loadSamplesFromCsv(path)).toEqual([
      { id: 'S1', payload: 'Sells shoes', referenceLabel: '47720', metadata: {} }
    ])
  })
})

describe('datasetName', () => {
  it.each([
    ['data/retail_sample.csv', 'retail_sample'],
    ['C:\\data\\pilot.v2.csv', 'pilot.v2'],
    ['samples', 'samples']
  ])('names %s as %s', (path, expected) => {
    expect(datasetName(path)).toBe(expected)
  })
})
