import { MOCK_CASES, type CaseRecord } from './cases.js'
import { filterByDate, normalizeRange } from './dates.js'
import { directLink, secondaryStableLink, stableLink } from './links.js'
import { buildNote } from './notes.js'
import { sortByHybridScore, sortCases, type SortOrder } from './ranking.js'
import { expandQuery, normalizeText, suggestionsFor } from './text.js'

export type SearchParams = {
  query: string
  organ?: string | null
  from?: string | null
  to?: string | null
  order: SortOrder
  limit: number
  validateLinks: boolean
}

/** Resolves true when the URL answers 2xx/3xx. */
export type LinkChecker = (url: string) => Promise<boolean>

export type SearchDeps = {
  cases?: readonly CaseRecord[]
  checkLink?: LinkChecker
  now?: Date
}

export type LinkStrategy = 'directo' | 'estable'

export type SearchResult = {
  titulo: string
  organo: string
  sala: string
  ponente: string
  fecha: string
  relevancia: number
  resumen: string
  id_cendoj: string
  roj: string
  ecli: string
  url_directo: string
  url_estable: string
  url_estable_secundaria: string
  enlace_preferido: string
  enlace_directo_ok: boolean | null
  estrategia_enlace: LinkStrategy
}

export type SearchPayload = {
  query: string
  total: number
  resultados: SearchResult[]
  nota: string | null
}

export const HYBRID_LABEL = 'ranking híbrido (relevancia + actualidad)'

function matchesVariant(c: CaseRecord, variants: string[]) {
  const m = normalizeText(c.match)
  return variants.some((v) => {
    const nv = normalizeText(v)
    return m.includes(nv) || nv.includes(m)
  })
}

async function toResult(c: CaseRecord, validate: boolean, checkLink: LinkChecker | undefined) {
  const urlDirect = directLink(c.id_cendoj)
  const urlStable = stableLink()

  let directOk: boolean | null = null
  let strategy: LinkStrategy = 'directo'
  let preferred = urlDirect
  let note: string | null = null

  if (validate && checkLink) {
    directOk = await checkLink(urlDirect).catch(() => false)
    if (!directOk) {
      strategy = 'estable'
      preferred = urlStable
      note = `El enlace directo de ${c.id_cendoj} no respondió como esperado; se usa enlace estable (ECLI/ROJ).`
    }
  }

  const result: SearchResult = {
    titulo: c.titulo,
    organo: c.organo,
    sala: c.sala,
    ponente: c.ponente,
    fecha: c.fecha,
    relevancia: Math.round(c.relevancia * 100) / 100,
    resumen: c.resumen,
    id_cendoj: c.id_cendoj,
    roj: c.roj,
    ecli: c.ecli,
    url_directo: urlDirect,
    url_estable: urlStable,
    url_estable_secundaria: secondaryStableLink(c.ecli, c.roj),
    enlace_preferido: preferred,
    enlace_directo_ok: directOk,
    estrategia_enlace: strategy,
  }
  return { result, note }
}

export async function searchCases(params: SearchParams, deps: SearchDeps = {}): Promise<SearchPayload> {
  const corpus = deps.cases ?? MOCK_CASES
  const now = deps.now ?? new Date()
  const notes: string[] = []

  const range = normalizeRange(params.from, params.to)
  if (range.note) notes.push(range.note)

  const variants = expandQuery(params.query)
  const nq = normalizeText(params.query)

  let candidates = corpus.filter((c) => nq.includes(c.match) || matchesVariant(c, variants))

  if (params.organ) {
    const no = normalizeText(params.organ)
    candidates = candidates.filter((c) => normalizeText(c.organo).includes(no))
  }

  candidates = filterByDate(candidates, range.from, range.to)
  candidates = sortCases(candidates, params.order)

  let hybrid = false
  if (!candidates.length) {
    // Fallback ignores the court/date filters and ranks the loose text matches.
    const pool = corpus.filter((c) => matchesVariant(c, variants))
    if (pool.length) {
      candidates = sortByHybridScore(pool, now)
      hybrid = true
    }
  } else if (params.order === 'relevancia_desc') {
    candidates = sortByHybridScore(candidates, now)
    hybrid = true
  }

  const built = await Promise.all(
    candidates.slice(0, params.limit).map((c) => toResult(c, params.validateLinks, deps.checkLink))
  )
  const resultados = built.map((b) => b.result)
  for (const b of built) if (b.note) notes.push(b.note)

  let nota: string | null
  if (!resultados.length) {
    nota = buildNote({
      motivo: 'No se han encontrado resultados exactos.',
      accion: 'Ajusta términos o el rango temporal.',
      sugerencias: suggestionsFor(params.query),
      info: 'Se intentó ranking híbrido (relevancia + actualidad).',
    })
  } else {
    const info = buildNote({ info: `orden: ${hybrid ? HYBRID_LABEL : params.order}` })
    nota = [info, ...notes].filter(Boolean).join(' ')
  }

  return { query: params.query, total: resultados.length, resultados, nota }
}
