import { describe, expect, it, vi } from 'vitest'
import { searchCases, type SearchParams } from './search.js'

const NOW = new Date('2025-01-01T12:00:00Z')
const TSJC = '0801932001202400077'
const TS = '28079130012022000456'

function params(overrides: Partial<SearchParams>): SearchParams {
  return { query: '', order: 'relevancia_desc', limit: 10, validateLinks: false, ...overrides }
}

const ids = (r: { resultados: { id_cendoj: string }[] }) => r.resultados.map((x) => x.id_cendoj)

describe('searchCases', () => {
  it('answers a single-topic query with its ruling and full link set', async () => {
    const out = await searchCases(params({ query: 'Suelo no urbanizable' }), { now: NOW })
    expect(out.total).toBe(1)
    expect(out.query).toBe('Suelo no urbanizable')
    expect(out.resultados[0]).toEqual({
      titulo: 'Licencia urbanística en suelo no urbanizable: criterios recientes',
      organo: 'Tribunal Superior de Justicia de Cataluña (TSJC)',
      sala: 'Sala de lo Contencioso-Administrativo',
      ponente: 'Ponente C',
      fecha: '2024-02-12',
      relevancia: 0.76,
      resumen:
        'Licencia urbanística en suelo no urbanizable: criterios recientes (Tribunal Superior de Justicia de Cataluña (TSJC) - Sala de lo Contencioso-Administrativo) Fecha: 2024-02-12.',
      id_cendoj: TSJC,
      roj: 'STS 1234/2024',
      ecli: 'ECLI:ES:TS:2024:1234',
      url_directo: `https://www.poderjudicial.es/search/cedula.jsp?id=${TSJC}`,
      url_estable: 'https://www.poderjudicial.es/search/indexAN.jsp',
      url_estable_secundaria: 'https://www.google.com/search?q=site%3Apoderjudicial.es+ECLI%3AES%3ATS%3A2024%3A1234+STS+1234%2F2024',
      enlace_preferido: `https://www.poderjudicial.es/search/cedula.jsp?id=${TSJC}`,
      enlace_directo_ok: null,
      estrategia_enlace: 'directo',
    })
    expect(out.nota).toBe('Info: orden: ranking híbrido (relevancia + actualidad)')
  })

  it('matches through accents', async () => {
    const out = await searchCases(params({ query: 'fuera de ORDENACIÓN' }), { now: NOW })
    expect(ids(out)).toEqual([TS])
  })

  it('re-ranks relevance ordering with recency', async () => {
    const out = await searchCases(params({ query: 'urbanizable ordenacion' }), { now: NOW })
    expect(ids(out)).toEqual([TSJC, TS])
  })

  it('keeps explicit date ordering and names it in the note', async () => {
    const out = await searchCases(params({ query: 'urbanizable ordenacion', order: 'fecha_asc' }), { now: NOW })
    expect(ids(out)).toEqual([TS, TSJC])
    expect(out.nota).toBe('Info: orden: fecha_asc')
  })

  it('applies the limit after ordering', async () => {
    const out = await searchCases(params({ query: 'urbanizable ordenacion', order: 'fecha_asc', limit: 1 }), { now: NOW })
    expect(ids(out)).toEqual([TS])
    expect(out.total).toBe(1)
  })

  it('filters by court', async () => {
    const out = await searchCases(params({ query: 'urbanizable ordenacion', organ: 'Supremo' }), { now: NOW })
    expect(ids(out)).toEqual([TS])
  })

  it('falls back to hybrid ranking over unfiltered matches when filters leave nothing', async () => {
    const out = await searchCases(
      params({ query: 'urbanizable ordenacion', organ: 'Audiencia Nacional', order: 'fecha_asc' }),
      { now: NOW }
    )
    expect(ids(out)).toEqual([TSJC, TS])
    expect(out.nota).toBe('Info: orden: ranking híbrido (relevancia + actualidad)')
  })

  it('corrects an inverted date range and reports it', async () => {
    const out = await searchCases(
      params({ query: 'urbanizable ordenacion', from: '2024-12-31', to: '2023-01-01', order: 'fecha_desc' }),
      { now: NOW }
    )
    expect(ids(out)).toEqual([TSJC])
    expect(out.nota).toBe('Info: orden: fecha_desc Se corrigió el rango de fechas (invertido).')
  })

  it('explains an empty answer with topic synonyms', async () => {
    const out = await searchCases(params({ query: 'garaje ilegal' }), { now: NOW })
    expect(out).toEqual({
      query: 'garaje ilegal',
      total: 0,
      resultados: [],
      nota:
        'Motivo: No se han encontrado resultados exactos. Acción: Ajusta términos o el rango temporal. Sugerencias: aparcamiento ilegal; cochera sin licencia Info: Se intentó ranking híbrido (relevancia + actualidad).',
    })
  })

  it('suggests generic refinements when no synonym applies', async () => {
    const out = await searchCases(params({ query: 'xyz' }), { now: NOW })
    expect(out.nota).toBe(
      'Motivo: No se han encontrado resultados exactos. Acción: Ajusta términos o el rango temporal. Sugerencias: ajusta fechas/órgano; prueba con términos más generales Info: Se intentó ranking híbrido (relevancia + actualidad).'
    )
  })

  it('switches to the stable link when the direct one fails validation', async () => {
    const checkLink = vi.fn(async (url: string) => !url.includes(TS))
    const out = await searchCases(params({ query: 'urbanizable ordenacion', order: 'fecha_desc', validateLinks: true }), {
      now: NOW,
      checkLink,
    })
    expect(checkLink).toHaveBeenCalledTimes(2)
    const [first, second] = out.resultados
    expect(first.enlace_directo_ok).toBe(true)
    expect(first.estrategia_enlace).toBe('directo')
    expect(second.enlace_directo_ok).toBe(false)
    expect(second.estrategia_enlace).toBe('estable')
    expect(second.enlace_preferido).toBe('https://www.poderjudicial.es/search/indexAN.jsp')
    expect(out.nota).toBe(
      `Info: orden: fecha_desc El enlace directo de ${TS} no respondió como esperado; se usa enlace estable (ECLI/ROJ).`
    )
  })

  it('treats a throwing link checker as a failed check', async () => {
    const out = await searchCases(params({ query: 'urbanizable', validateLinks: true }), {
      now: NOW,
      checkLink: async () => {
        throw new Error('boom')
      },
    })
    expect(out.resultados[0].estrategia_enlace).toBe('estable')
  })

  it('does not check links unless asked', async () => {
    const checkLink = vi.fn(async () => true)
    await searchCases(params({ query: 'urbanizable' }), { now: NOW, checkLink })
    expect(checkLink).not.toHaveBeenCalled()
  })
})
