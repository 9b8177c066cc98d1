import { describe, expect, it } from 'vitest'
import { MOCK_CASES } from './cases.js'
import { daysBetween, filterByDate, normalizeRange, parseIsoDate, RANGE_SWAPPED_NOTE } from './dates.js'

describe('parseIsoDate', () => {
  it('accepts real calendar dates', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29')
  })

  it.each(['2023-02-29', '2024-13-01', '12/02/2024', '', null, undefined])('rejects %s', (v) => {
    expect(parseIsoDate(v)).toBeNull()
  })
})

describe('normalizeRange', () => {
  it('swaps an inverted range and reports it', () => {
    expect(normalizeRange('2024-12-31', '2023-01-01')).toEqual({ from: '2023-01-01', to: '2024-12-31', note: RANGE_SWAPPED_NOTE })
  })

  it('ignores unparsable bounds', () => {
    expect(normalizeRange('ayer', '2023-01-01')).toEqual({ from: null, to: '2023-01-01', note: null })
  })
})

describe('filterByDate', () => {
  it('uses inclusive bounds', () => {
    const kept = filterByDate([...MOCK_CASES], '2022-11-03', '2022-11-03')
    expect(kept.map((c) => c.id_cendoj)).toEqual(['28079130012022000456'])
  })

  it('keeps everything without bounds', () => {
    expect(filterByDate([...MOCK_CASES], null, null)).toHaveLength(2)
  })
})

describe('daysBetween', () => {
  it('counts whole UTC days', () => {
    expect(daysBetween('2024-02-12', new Date('2025-01-01T23:30:00Z'))).toBe(324)
  })
})
