import { describe, expect, it } from 'vitest'
import { expandQuery, normalizeText, suggestionsFor } from './text.js'

describe('normalizeText', () => {
  it('lower-cases, strips acute accents and collapses whitespace', () => {
    expect(normalizeText('  Fuera   de ORDENACIÓN ')).toBe('fuera de ordenacion')
  })

  it('leaves ñ and ü alone', () => {
    expect(normalizeText('Cataluña Güell')).toBe('cataluña güell')
  })
})

describe('expandQuery', () => {
  it('appends the synonyms of every key found in the query', () => {
    expect(expandQuery('Fuera de ordenación')).toEqual([
      'Fuera de ordenación',
      'situacion de fuera de ordenacion',
      'no ajustado a ordenacion',
      'edificacion disconforme',
      'planeamiento',
      'planeacion',
      'ordenacion urbanistica',
    ])
  })

  it('drops repeated synonyms, keeping the first occurrence', () => {
    expect(expandQuery('volumen disconforme fuera de ordenacion')).toEqual([
      'volumen disconforme fuera de ordenacion',
      'situacion de fuera de ordenacion',
      'no ajustado a ordenacion',
      'edificacion disconforme',
      'exceso de volumen',
      'planeamiento',
      'planeacion',
      'ordenacion urbanistica',
    ])
  })

  it('returns only the query when no key matches', () => {
    expect(expandQuery('licencia de obras')).toEqual(['licencia de obras'])
  })
})

describe('suggestionsFor', () => {
  it('caps suggestions at three', () => {
    expect(suggestionsFor('fuera de ordenacion')).toEqual([
      'situacion de fuera de ordenacion',
      'no ajustado a ordenacion',
      'edificacion disconforme',
    ])
  })

  it('falls back to generic advice', () => {
    expect(suggestionsFor('xyz')).toEqual(['ajusta fechas/órgano', 'prueba con términos más generales'])
  })
})
