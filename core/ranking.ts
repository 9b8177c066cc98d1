import type { CaseRecord } from './cases.js'
import { daysBetween, parseIsoDate } from './dates.js'

export const SORT_ORDERS = ['relevancia_desc', 'fecha_desc', 'fecha_asc'] as const
export type SortOrder = (typeof SORT_ORDERS)[number]

function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n))
}

/**
 * 70% relevance + 30% recency, where recency = exp(-years since the ruling):
 * 1 for today, ~0.37 after a year, ~0.14 after two.
 */
export function hybridScore(relevance: number, fecha: string, now: Date) {
  const date = parseIsoDate(fecha)
  let recency = 0.5
  if (date) {
    const years = Math.max(0, daysBetween(date, now) / 365.25)
    recency = Math.exp(-years)
  }
  return 0.7 * clamp(relevance, 0, 1) + 0.3 * recency
}

function compare(a: string | number, b: string | number) {
  return a < b ? -1 : a > b ? 1 : 0
}

export function sortCases(cases: CaseRecord[], order: SortOrder): CaseRecord[] {
  const list = [...cases]
  if (order === 'relevancia_desc') {
    return list.sort((a, b) => compare(b.relevancia, a.relevancia) || compare(b.fecha, a.fecha))
  }
  if (order === 'fecha_desc') {
    return list.sort((a, b) => compare(b.fecha, a.fecha) || compare(b.relevancia, a.relevancia))
  }
  return list.sort((a, b) => compare(a.fecha, b.fecha) || compare(a.relevancia, b.relevancia))
}

export function sortByHybridScore(cases: CaseRecord[], now: Date): CaseRecord[] {
  const scored = cases.map((c) => ({ c, score: hybridScore(c.relevancia, c.fecha, now) }))
  return scored.sort((a, b) => b.score - a.score).map((s) => s.c)
}
