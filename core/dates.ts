import type { CaseRecord } from './cases.js'

/** Calendar date in UTC, YYYY-MM-DD. */
export type IsoDate = string

export const RANGE_SWAPPED_NOTE = 'Se corrigió el rango de fechas (invertido).'

export function parseIsoDate(s: string | null | undefined): IsoDate | null {
  const v = String(s || '').trim()
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(v)
  if (!m) return null
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])]
  const dt = new Date(Date.UTC(y, mo - 1, d))
  // Rejects 2023-02-30 and friends, which Date would roll over.
  if (dt.getUTCFullYear() !== y || dt.getUTCMonth() !== mo - 1 || dt.getUTCDate() !== d) return null
  return v
}

export type DateRange = { from: IsoDate | null; to: IsoDate | null; note: string | null }

export function normalizeRange(from: string | null | undefined, to: string | null | undefined): DateRange {
  const d1 = parseIsoDate(from)
  const d2 = parseIsoDate(to)
  if (d1 && d2 && d1 > d2) return { from: d2, to: d1, note: RANGE_SWAPPED_NOTE }
  return { from: d1, to: d2, note: null }
}

// ISO dates compare correctly as strings.
export function filterByDate(cases: CaseRecord[], from: IsoDate | null, to: IsoDate | null) {
  return cases.filter((c) => {
    if (from && c.fecha < from) return false
    if (to && c.fecha > to) return false
    return true
  })
}

export function daysBetween(from: IsoDate, now: Date) {
  const start = Date.parse(`${from}T00:00:00Z`)
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())
  return Math.round((today - start) / 86_400_000)
}
