import { describe, it, expect } from 'vitest'
import { LabelPatternError, matchesLabelPattern, parseLabelPattern } from '../../../src/rate/label-pattern.js'

describe('parseLabelPattern', () => {
  it('parses an exact match', () => {
    expect(parseLabelPattern('job=api')).toEqual({ kind: 'equals', key: 'job', value: 'api' })
  })

  it('parses a regex match', () => {
    const pattern = parseLabelPattern('env=~prod|staging')
    expect(pattern.kind).toBe('regex')
    expect(pattern.key).toBe('env')
  })

  it('allows an empty value', () => {
    expect(parseLabelPattern('cluster=')).toEqual({ kind: 'equals', key: 'cluster', value: '' })
  })

  it('rejects an expression without =', () => {
    expect(() => parseLabelPattern('job')).toThrow(LabelPatternError)
    expect(() => parseLabelPattern('job')).toThrow('label filter "job" must look like key=value or key=~regex')
  })

  it('rejects an empty key', () => {
    expect(() => parseLabelPattern('=api')).toThrow('must look like key=value or key=~regex')
  })

  it('rejects an invalid label name', () => {
    expect(() => parseLabelPattern('1job=api')).toThrow('label filter "1job=api" has an invalid label name "1job"')
  })

  it('rejects a regex that does not compile', () => {
    expect(() => parseLabelPattern('job=~(api')).toThrow('label filter "job=~(api" has an invalid regex')
  })
})

describe('matchesLabelPattern', () => {
  it('compares exact values', () => {
    const pattern = parseLabelPattern('job=api')
    expect(matchesLabelPattern({ job: 'api' }, pattern)).toBe(true)
    expect(matchesLabelPattern({ job: 'api-2' }, pattern)).toBe(false)
  })

  it('anchors the regex at both ends', () => {
    const pattern = parseLabelPattern('env=~prod|staging')
    expect(matchesLabelPattern({ env: 'prod' }, pattern)).toBe(true)
    expect(matchesLabelPattern({ env: 'staging' }, pattern)).toBe(true)
    expect(matchesLabelPattern({ env: 'preprod' }, pattern)).toBe(false)
  })

  it('treats a missing label as the empty string', () => {
    expect(matchesLabelPattern({}, parseLabelPattern('team='))).toBe(true)
    expect(matchesLabelPattern({}, parseLabelPattern('team=~.+'))).toBe(false)
  })
})
