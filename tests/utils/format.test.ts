import { describe, expect, it } from 'vitest'
import { truncateLine } from '../../src/output/console.js'
import { generateRunId } from '../../src/output/runDir.js'
import { formatDurationMs, formatScore, pluralize } from '../../src/utils/format.js'

describe('formatDurationMs', () => {
  it.each([
    [450, '450ms'],
    [1_400, '1s'],
    [59_400, '59s'],
    [60_000, '1m'],
    [125_000, '2m 5s']
  ])('formats %d', (ms, expected) => {
    expect(formatDurationMs(ms)).toBe(expected)
  })
})

describe('formatScore', () => {
  it('keeps two decimals', () => {
    expect(formatScore(0.8567)).toBe('0.86')
  })
})

describe('pluralize', () => {
  it('picks the form by count', () => {
    expect(pluralize(1, 'story', 'stories')).toBe('1 story')
    expect(pluralize(2_000, 'article')).toBe('2,000 articles')
  })
})

describe('truncateLine', () => {
  it('adds an ellipsis past the limit', () => {
    expect(truncateLine('  Rewriting the scheduler  ', 12)).toBe('Rewriting...')
    expect(truncateLine('Short', 12)).toBe('Short')
  })
})

describe('generateRunId', () => {
  it('names the run by local time', () => {
    expect(generateRunId(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02_03-04-05')
  })
})
