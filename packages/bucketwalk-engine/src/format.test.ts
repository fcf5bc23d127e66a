import { describe, it, expect } from 'vitest'
import { formatBytes, formatDateTime, formatPercent } from './format'

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(0)).toBe('0 B')
    expect(formatBytes(1023)).toBe('1023 B')
    expect(formatBytes(1536)).toBe('1.50 KB')
    expect(formatBytes(10 * 1024 * 1024)).toBe('10.0 MB')
  })
})

describe('formatDateTime', () => {
  it('prints UTC timestamps', () => {
    expect(formatDateTime(new Date('2024-03-05T07:08:09Z'))).toBe('2024-03-05 07:08:09')
  })

  it('prints nothing for missing or invalid dates', () => {
    expect(formatDateTime(undefined)).toBe('')
    expect(formatDateTime(new Date('nope'))).toBe('')
  })
})

describe('formatPercent', () => {
  it('floors and caps at 100', () => {
    expect(formatPercent(1, 3)).toBe('33%')
    expect(formatPercent(5, 3)).toBe('100%')
    expect(formatPercent(5, undefined)).toBeUndefined()
    expect(formatPercent(5, 0)).toBeUndefined()
  })
})
