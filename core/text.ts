import { DEFAULT_SUGGESTIONS, SYNONYMS } from './synonyms.js'

const ACCENTS: Record<string, string> = { á: 'a', é: 'e', í: 'i', ó: 'o', ú: 'u' }

export function normalizeText(s: string) {
  return String(s || '')
    .toLowerCase()
    .replace(/[áéíóú]/g, (c) => ACCENTS[c] ?? c)
    .split(/\s+/)
    .filter(Boolean)
    .join(' ')
}

function matchingKeys(q: string) {
  const nq = normalizeText(q)
  return SYNONYMS.filter(([key]) => nq.includes(key))
}

/** The raw query followed by the synonyms of every key it contains, without duplicates. */
export function expandQuery(q: string): string[] {
  const terms = [q]
  for (const [, syns] of matchingKeys(q)) terms.push(...syns)
  return [...new Set(terms)]
}

export function suggestionsFor(q: string): string[] {
  const out: string[] = []
  for (const [, syns] of matchingKeys(q)) out.push(...syns.slice(0, 3))
  return (out.length ? out : [...DEFAULT_SUGGESTIONS]).slice(0, 3)
}
